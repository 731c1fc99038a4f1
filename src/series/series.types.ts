/**
 * One reported balance of a peer, after normalization.
 */
export interface Observation {
  peerId: string;
  timestamp: Date;
  /** Non-negative balance in QUIL */
  balance: number;
}

/**
 * Every peer's observations, globally ordered by timestamp ascending.
 * Ties keep the order in which the records were read.
 */
export type MergedDataset = readonly Observation[];

export interface DroppedRecord {
  source: string;
  /**
   * 1-based row position inside the source, header included. Equal to the
   * file line unless a quoted field spans lines.
   */
  line: number;
  reason: string;
}

export interface LoadResult {
  dataset: MergedDataset;
  sourcesRead: number;
  recordsAccepted: number;
  dropped: DroppedRecord[];
}
