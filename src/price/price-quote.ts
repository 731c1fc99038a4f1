/**
 * USD price of the tracked asset for one computation pass.
 *
 * `unavailable` is distinct from a real price of 0: consumers can show
 * "price unavailable" while the metrics engine treats both as zero.
 */
export type PriceQuote =
  | { status: 'available'; usd: number }
  | { status: 'unavailable'; reason: string };

export function availablePrice(usd: number): PriceQuote {
  return { status: 'available', usd };
}

export function unavailablePrice(reason: string): PriceQuote {
  return { status: 'unavailable', reason };
}

/**
 * Multiplier used for USD conversions; 0 when no quote is available
 */
export function usdMultiplier(quote: PriceQuote): number {
  return quote.status === 'available' ? quote.usd : 0;
}
