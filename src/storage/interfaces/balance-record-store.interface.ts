/**
 * Balance Record Store - append-only per-peer time series
 *
 * The rest of the service never touches the filesystem directly: the loader
 * reads through `readSources()` and the ingest path writes through
 * `append()`. Implementations are swapped via the BALANCE_RECORD_STORE token
 * (CSV files in production, in-memory for tests).
 */

/**
 * One reported record as it arrives from a peer. Values are kept as the
 * peer sent them; normalization happens when the series is loaded.
 */
export interface BalanceRecord {
  peerId: string;
  timestamp: string;
  balance: string;
}

/**
 * A named, readable record collection (one per peer).
 * `content` is CSV text starting with the `Date,Peer ID,Balance` header.
 */
export interface SeriesSource {
  name: string;
  content: Buffer;
}

export interface BalanceRecordStore {
  /** Append one record to the peer's collection, creating it if needed */
  append(record: BalanceRecord): Promise<void>;

  /** Snapshot of every collection currently in the store */
  readSources(): Promise<SeriesSource[]>;
}

/** Injection token for the active store implementation */
export const BALANCE_RECORD_STORE = Symbol('BALANCE_RECORD_STORE');

export type StoreOperation = 'append' | 'list' | 'read' | 'create';

/**
 * Raised when the underlying medium fails. Carries the operation and the
 * collection or peer involved so the failing record shows up in logs.
 */
export class BalanceStoreError extends Error {
  constructor(
    public readonly operation: StoreOperation,
    public readonly target: string,
    public readonly originalError?: Error,
  ) {
    super(
      `[${operation}] ${target}: ${originalError?.message ?? 'store operation failed'}`,
    );
    this.name = 'BalanceStoreError';
  }
}
