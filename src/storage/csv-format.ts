import { BalanceRecord } from './interfaces/balance-record-store.interface';

export const CSV_COLUMNS = {
  timestamp: 'Date',
  peerId: 'Peer ID',
  balance: 'Balance',
} as const;

export const CSV_HEADER = [
  CSV_COLUMNS.timestamp,
  CSV_COLUMNS.peerId,
  CSV_COLUMNS.balance,
].join(',');

const SOURCE_PREFIX = 'node_balance_';
const SOURCE_SUFFIX = '.csv';

/**
 * Collection name for a peer, e.g. `node_balance_QmPeer1.csv`
 */
export function sourceNameForPeer(peerId: string): string {
  return `${SOURCE_PREFIX}${peerId}${SOURCE_SUFFIX}`;
}

/**
 * Any visible `.csv` file in the data directory is treated as a series,
 * including combined exports that hold several peers.
 */
export function isSeriesSourceName(name: string): boolean {
  return name.endsWith(SOURCE_SUFFIX) && !name.startsWith('.');
}

/**
 * Quote a field when it contains a delimiter, quote or line break (RFC 4180)
 */
export function formatCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render a record as one complete CSV line, trailing newline included,
 * so it can be written in a single append.
 */
export function formatCsvLine(record: BalanceRecord): string {
  return (
    [record.timestamp, record.peerId, record.balance]
      .map(formatCsvField)
      .join(',') + '\n'
  );
}
