import { PriceQuote, usdMultiplier } from '../price/price-quote';
import { MergedDataset, Observation } from '../series/series.types';
import { EarningsMetrics, HourlyBucket, RateSample } from './metrics.types';

/**
 * Metrics Engine
 *
 * Pure functions from (merged dataset, price quote) to the rate and hourly
 * tables. No I/O; the whole history is recomputed on every call.
 *
 * Both tables are built from the same two primitives: group observations by
 * peer, then diff each peer's ordered sequence pairwise.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

/**
 * Group items by peer id. Each group keeps the input order, so a
 * timestamp-sorted input gives timestamp-sorted groups.
 */
export function groupByPeer<T extends { peerId: string }>(
  items: readonly T[],
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(item.peerId);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.peerId, [item]);
    }
  }
  return groups;
}

/**
 * Delta of each element against its predecessor; null for the first.
 *
 * @example
 * pairwiseDiff([10, 12, 15], (n) => n) // [null, 2, 3]
 */
export function pairwiseDiff<T>(
  sequence: readonly T[],
  select: (item: T) => number,
): (number | null)[] {
  return sequence.map((item, index) =>
    index === 0 ? null : select(item) - select(sequence[index - 1]),
  );
}

/**
 * Start of the UTC hour containing the date
 */
export function floorToHour(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MS_PER_HOUR) * MS_PER_HOUR);
}

/**
 * QUIL per minute between two consecutive observations.
 *
 * 0 for a peer's first observation, and 0 for a repeated timestamp
 * (elapsed time of zero) instead of Infinity or NaN.
 */
export function ratePerMinute(
  balanceDelta: number | null,
  minutesDelta: number | null,
): number {
  if (balanceDelta === null || minutesDelta === null || minutesDelta === 0) {
    return 0;
  }
  return balanceDelta / minutesDelta;
}

/**
 * Convert a QUIL amount to USD. Always exactly 0 without a quote, so a
 * negative amount never turns into -0.
 */
export function toUsd(amount: number, quote: PriceQuote): number {
  const price = usdMultiplier(quote);
  return price === 0 ? 0 : amount * price;
}

/**
 * One rate sample per observation, in dataset order
 */
export function computeRateSamples(
  dataset: MergedDataset,
  quote: PriceQuote,
): RateSample[] {
  const indexed = dataset.map((observation, index) => ({
    ...observation,
    index,
  }));
  const samples: RateSample[] = [];

  for (const series of groupByPeer(indexed).values()) {
    const elapsedMs = pairwiseDiff(series, (o) => o.timestamp.getTime());
    const balanceDeltas = pairwiseDiff(series, (o) => o.balance);

    series.forEach((observation, i) => {
      const ms = elapsedMs[i];
      const minutes = ms === null ? null : ms / MS_PER_MINUTE;
      const quilPerMinute = ratePerMinute(balanceDeltas[i], minutes);

      samples[observation.index] = {
        peerId: observation.peerId,
        timestamp: observation.timestamp,
        balance: observation.balance,
        minutesSincePrevious: minutes,
        quilPerMinute,
        earningsPerMinuteUsd: toUsd(quilPerMinute, quote),
      };
    });
  }

  return samples;
}

/**
 * Hourly buckets ordered by peer id, then hour.
 *
 * A bucket's balance is the last one observed in that hour; growth is
 * measured against the peer's previous bucket and may be negative.
 */
export function computeHourlyBuckets(
  dataset: MergedDataset,
  quote: PriceQuote,
): HourlyBucket[] {
  const groups = groupByPeer(dataset);
  const buckets: HourlyBucket[] = [];

  for (const peerId of [...groups.keys()].sort()) {
    const hourly = lastBalancePerHour(groups.get(peerId) ?? []);
    const growth = pairwiseDiff(hourly, (entry) => entry.balance);

    hourly.forEach((entry, i) => {
      const delta = growth[i] ?? 0;
      buckets.push({
        peerId,
        hour: new Date(entry.hourMs),
        balance: entry.balance,
        growth: delta,
        earningsUsd: toUsd(delta, quote),
      });
    });
  }

  return buckets;
}

export function computeEarningsMetrics(
  dataset: MergedDataset,
  quote: PriceQuote,
): EarningsMetrics {
  return {
    rateSamples: computeRateSamples(dataset, quote),
    hourlyBuckets: computeHourlyBuckets(dataset, quote),
  };
}

/**
 * Collapse a peer's ordered series to its last balance per hour.
 * Map keeps first-insertion order, which is chronological here.
 */
function lastBalancePerHour(
  series: readonly Observation[],
): { hourMs: number; balance: number }[] {
  const byHour = new Map<number, number>();
  for (const observation of series) {
    byHour.set(floorToHour(observation.timestamp).getTime(), observation.balance);
  }
  return [...byHour].map(([hourMs, balance]) => ({ hourMs, balance }));
}
