import { MergedDataset, Observation } from '../series/series.types';

export const TOTAL_BALANCE_DECIMALS = 4;

/**
 * Latest observation of each peer, ordered by peer id.
 * On equal timestamps the one read later wins.
 */
export function latestPerPeer(dataset: MergedDataset): Observation[] {
  const latest = new Map<string, Observation>();
  for (const observation of dataset) {
    const current = latest.get(observation.peerId);
    if (
      !current ||
      observation.timestamp.getTime() >= current.timestamp.getTime()
    ) {
      latest.set(observation.peerId, observation);
    }
  }
  return [...latest.keys()]
    .sort()
    .flatMap((peerId) => latest.get(peerId) ?? []);
}

/**
 * Sum of every peer's latest balance, rounded half-up to 4 decimals.
 */
export function totalBalance(dataset: MergedDataset): number {
  const sum = latestPerPeer(dataset).reduce(
    (acc, observation) => acc + observation.balance,
    0,
  );
  return roundHalfUp(sum, TOTAL_BALANCE_DECIMALS);
}

/**
 * Round half-up on the number's decimal representation.
 *
 * Shifting through exponent notation avoids binary artefacts of `x * 10^n`:
 * 1.00005 rounds to 1.0001, where Math.round(1.00005 * 1e4) / 1e4 gives 1.
 * Halves round toward +Infinity, which is half-up for the non-negative
 * balances this is used for.
 */
export function roundHalfUp(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  return shiftDecimal(Math.round(shiftDecimal(value, decimals)), -decimals);
}

function shiftDecimal(value: number, places: number): number {
  const [mantissa, exponent = '0'] = String(value).split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
}
