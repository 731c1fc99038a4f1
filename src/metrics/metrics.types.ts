/**
 * Earnings estimate for one observation, derived against the peer's
 * previous observation.
 */
export interface RateSample {
  peerId: string;
  timestamp: Date;
  balance: number;
  /** Minutes since the peer's previous observation, null for its first */
  minutesSincePrevious: number | null;
  quilPerMinute: number;
  earningsPerMinuteUsd: number;
}

/**
 * One UTC hour of a peer's series.
 */
export interface HourlyBucket {
  peerId: string;
  /** Start of the hour (UTC) */
  hour: Date;
  /** Last observed balance inside the hour */
  balance: number;
  /** Change against the peer's previous bucket, 0 for its first */
  growth: number;
  earningsUsd: number;
}

export interface EarningsMetrics {
  rateSamples: RateSample[];
  hourlyBuckets: HourlyBucket[];
}
