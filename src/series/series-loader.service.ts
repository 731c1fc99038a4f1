import { Inject, Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import {
  BALANCE_RECORD_STORE,
  BalanceRecordStore,
  SeriesSource,
} from '../storage/interfaces/balance-record-store.interface';
import { CSV_COLUMNS } from '../storage/csv-format';
import { normalizeBalance, parseTimestamp } from './record-normalizer';
import {
  DroppedRecord,
  LoadResult,
  MergedDataset,
  Observation,
} from './series.types';

/**
 * Only the first few dropped records of a source are logged individually;
 * the rest are logged as a count and still listed in LoadResult.dropped
 */
const MAX_WARNINGS_PER_SOURCE = 5;

/**
 * Stable sort by timestamp ascending. Equal timestamps keep their relative
 * order, so sorting an already sorted dataset returns it unchanged.
 */
export function sortByTimestamp(
  observations: readonly Observation[],
): Observation[] {
  return [...observations].sort(
    (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
  );
}

/**
 * SeriesLoaderService
 *
 * Reads every per-peer series from the store and merges them into one
 * timestamp-ordered dataset.
 *
 * Malformed records (bad timestamp, non-numeric or negative balance, missing
 * peer id) are dropped one at a time and logged; they never abort the load.
 * An empty store yields an empty dataset.
 */
@Injectable()
export class SeriesLoaderService {
  private readonly logger = new Logger(SeriesLoaderService.name);

  constructor(
    @Inject(BALANCE_RECORD_STORE)
    private readonly store: BalanceRecordStore,
  ) {}

  async load(): Promise<LoadResult> {
    const sources = await this.store.readSources();

    const observations: Observation[] = [];
    const dropped: DroppedRecord[] = [];

    for (const source of sources) {
      const parsed = await this.parseSource(source);
      observations.push(...parsed.observations);
      dropped.push(...parsed.dropped);
    }

    const dataset: MergedDataset = sortByTimestamp(observations);

    this.logger.debug(
      `Loaded ${dataset.length} observations from ${sources.length} source(s), ${dropped.length} record(s) dropped`,
    );

    return {
      dataset,
      sourcesRead: sources.length,
      recordsAccepted: dataset.length,
      dropped,
    };
  }

  /**
   * Parse one CSV source into observations
   */
  private async parseSource(source: SeriesSource): Promise<{
    observations: Observation[];
    dropped: DroppedRecord[];
  }> {
    const observations: Observation[] = [];
    const dropped: DroppedRecord[] = [];

    const drop = (line: number, reason: string): void => {
      dropped.push({ source: source.name, line, reason });
      if (dropped.length <= MAX_WARNINGS_PER_SOURCE) {
        this.logger.warn(`${source.name}:${line} dropped: ${reason}`);
      }
    };

    let rows: Record<string, string>[];
    try {
      rows = await this.readCsvRows(source.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      drop(1, `unreadable source (${message})`);
      return { observations, dropped };
    }

    rows.forEach((row, index) => {
      // Row position with the header as line 1. This matches the file line
      // for series written by the store, one record per line; a quoted
      // multi-line field or a blank line shifts it for hand-edited files.
      const line = index + 2;
      const result = this.toObservation(row);
      if (typeof result === 'string') {
        drop(line, result);
      } else if (result) {
        observations.push(result);
      }
    });

    if (dropped.length > MAX_WARNINGS_PER_SOURCE) {
      this.logger.warn(
        `${source.name}: ${dropped.length - MAX_WARNINGS_PER_SOURCE} more record(s) dropped`,
      );
    }

    return { observations, dropped };
  }

  /**
   * Read CSV rows from buffer using csv-parser
   */
  private async readCsvRows(
    content: Buffer,
  ): Promise<Record<string, string>[]> {
    const rows: Record<string, string>[] = [];

    const stream = Readable.from(content).pipe(
      csvParser({
        separator: ',',
        mapHeaders: ({ header }) => header.trim(),
      }),
    );

    for await (const row of stream) {
      if (isCsvRow(row)) {
        rows.push(row);
      }
    }

    return rows;
  }

  /**
   * Map a CSV row to an observation.
   * Returns the drop reason as a string, or null for an empty row.
   */
  private toObservation(
    row: Record<string, string>,
  ): Observation | string | null {
    const rawTimestamp = (row[CSV_COLUMNS.timestamp] ?? '').trim();
    const peerId = (row[CSV_COLUMNS.peerId] ?? '').trim();
    const rawBalance = (row[CSV_COLUMNS.balance] ?? '').trim();

    if (rawTimestamp === '' && peerId === '' && rawBalance === '') {
      return null;
    }

    if (peerId === '') {
      return 'missing peer id';
    }

    const timestamp = parseTimestamp(rawTimestamp);
    if (!timestamp) {
      return `unparseable timestamp "${rawTimestamp}"`;
    }

    const balance = normalizeBalance(rawBalance);
    if (balance === null) {
      return `non-numeric balance "${rawBalance}"`;
    }
    if (balance < 0) {
      return `negative balance ${balance}`;
    }

    return { peerId, timestamp, balance };
  }
}

function isCsvRow(row: unknown): row is Record<string, string> {
  return (
    typeof row === 'object' &&
    row !== null &&
    Object.values(row).every((value) => typeof value === 'string')
  );
}
