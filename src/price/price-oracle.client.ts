import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { Env } from '../config/env.validation';
import { availablePrice, PriceQuote, unavailablePrice } from './price-quote';

/**
 * Response of a CoinGecko-style `simple/price` endpoint:
 * { "wrapped-quil": { "usd": 0.12 } }
 */
const simplePriceSchema = z.record(
  z.string(),
  z.object({ usd: z.number().finite().nonnegative() }).passthrough(),
);

/**
 * HTTP client for the asset price feed.
 *
 * Never throws: a failed, slow or malformed response degrades to an
 * `unavailable` quote so the metrics pass still completes.
 */
@Injectable()
export class PriceOracleClient {
  private readonly logger = new Logger(PriceOracleClient.name);
  private readonly apiUrl: string;
  private readonly assetId: string;
  private readonly timeoutMs: number;
  private readonly retries: number;

  constructor(private readonly configService: ConfigService<Env, true>) {
    this.apiUrl = this.configService.get('PRICE_API_URL', { infer: true });
    this.assetId = this.configService.get('PRICE_ASSET_ID', { infer: true });
    this.timeoutMs = this.configService.get('PRICE_TIMEOUT_MS', {
      infer: true,
    });
    this.retries = this.configService.get('PRICE_RETRIES', { infer: true });
  }

  /**
   * Get the current USD price of the tracked asset.
   *
   * Tries once, plus up to PRICE_RETRIES more attempts, each bounded by
   * PRICE_TIMEOUT_MS.
   */
  async getQuote(): Promise<PriceQuote> {
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.retries + 1; attempt++) {
      try {
        const usd = await this.fetchPrice();
        this.logger.debug(`${this.assetId} price: ${usd} USD`);
        return availablePrice(usd);
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Price fetch attempt ${attempt}/${this.retries + 1} failed: ${lastError}`,
        );
      }
    }

    return unavailablePrice(lastError);
  }

  private async fetchPrice(): Promise<number> {
    const url = new URL(this.apiUrl);
    url.searchParams.set('ids', this.assetId);
    url.searchParams.set('vs_currencies', 'usd');

    const response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Price feed responded with ${response.status}`);
    }

    const parsed = simplePriceSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(
        `Unexpected price feed payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }

    const entry = parsed.data[this.assetId];
    if (!entry) {
      throw new Error(`Price feed has no entry for ${this.assetId}`);
    }
    return entry.usd;
  }
}
