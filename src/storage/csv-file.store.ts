import { Logger } from '@nestjs/common';
import { appendFile, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  BalanceRecord,
  BalanceRecordStore,
  BalanceStoreError,
  SeriesSource,
} from './interfaces/balance-record-store.interface';
import {
  CSV_HEADER,
  formatCsvLine,
  isSeriesSourceName,
  sourceNameForPeer,
} from './csv-format';

/**
 * CsvFileBalanceRecordStore
 *
 * One CSV file per peer inside a data directory:
 *
 *   <dir>/node_balance_<peerId>.csv
 *   Date,Peer ID,Balance
 *   2025-10-01T10:00:00Z,<peerId>,120.5
 *
 * Write path:
 * - The header is written with an exclusive-create flag, so two first
 *   reports for the same peer cannot both write it.
 * - Every record is a single appendFile call of a complete line.
 * - Appends for one peer run one after another; different peers never wait
 *   on each other.
 */
export class CsvFileBalanceRecordStore implements BalanceRecordStore {
  private readonly logger = new Logger(CsvFileBalanceRecordStore.name);
  private readonly pendingAppends = new Map<string, Promise<void>>();

  constructor(private readonly directory: string) {
    this.logger.log(`Storing balance series in ${path.resolve(directory)}`);
  }

  async append(record: BalanceRecord): Promise<void> {
    const previous = this.pendingAppends.get(record.peerId) ?? Promise.resolve();
    // A failed earlier append has already been reported to its own caller
    const next = previous
      .catch(() => undefined)
      .then(() => this.writeRecord(record));
    this.pendingAppends.set(record.peerId, next);

    try {
      await next;
    } finally {
      if (this.pendingAppends.get(record.peerId) === next) {
        this.pendingAppends.delete(record.peerId);
      }
    }
  }

  async readSources(): Promise<SeriesSource[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        // Nothing has been reported yet
        return [];
      }
      throw new BalanceStoreError('list', this.directory, toError(error));
    }

    const sources: SeriesSource[] = [];
    for (const name of names.filter(isSeriesSourceName).sort()) {
      try {
        const content = await readFile(path.join(this.directory, name));
        sources.push({ name, content });
      } catch (error) {
        throw new BalanceStoreError('read', name, toError(error));
      }
    }
    return sources;
  }

  private async writeRecord(record: BalanceRecord): Promise<void> {
    const filePath = path.join(
      this.directory,
      sourceNameForPeer(record.peerId),
    );
    await this.ensureSeries(filePath, record.peerId);

    try {
      await appendFile(filePath, formatCsvLine(record), 'utf-8');
    } catch (error) {
      throw new BalanceStoreError('append', record.peerId, toError(error));
    }
  }

  /**
   * Create the peer's file with its header line unless it already exists
   */
  private async ensureSeries(filePath: string, peerId: string): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new BalanceStoreError('create', peerId, toError(error));
    }

    try {
      await writeFile(filePath, `${CSV_HEADER}\n`, {
        encoding: 'utf-8',
        flag: 'wx',
      });
      this.logger.log(`Created series for peer ${peerId}`);
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return;
      }
      throw new BalanceStoreError('create', peerId, toError(error));
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
