import {
  BalanceRecord,
  BalanceRecordStore,
  SeriesSource,
} from './interfaces/balance-record-store.interface';
import { CSV_HEADER, formatCsvLine, sourceNameForPeer } from './csv-format';

/**
 * In-process store with the same CSV layout as the file store.
 * Used by tests and by `BALANCE_STORE=memory` for throwaway runs.
 */
export class InMemoryBalanceRecordStore implements BalanceRecordStore {
  private readonly series = new Map<string, string>();

  append(record: BalanceRecord): Promise<void> {
    const name = sourceNameForPeer(record.peerId);
    const existing = this.series.get(name) ?? `${CSV_HEADER}\n`;
    this.series.set(name, existing + formatCsvLine(record));
    return Promise.resolve();
  }

  readSources(): Promise<SeriesSource[]> {
    const sources = [...this.series.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, text]) => ({ name, content: Buffer.from(text, 'utf-8') }));
    return Promise.resolve(sources);
  }

  /**
   * Seed a raw collection, e.g. a hand-written CSV in a test
   */
  seed(name: string, content: string): void {
    this.series.set(name, content);
  }
}
