import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { PriceOracleClient } from '../price/price-oracle.client';
import { PriceQuote } from '../price/price-quote';
import { SeriesLoaderService } from '../series/series-loader.service';
import { MergedDataset, Observation } from '../series/series.types';
import { BalanceStoreError } from '../storage/interfaces/balance-record-store.interface';
import { latestPerPeer, totalBalance } from './aggregate-summary';
import { computeEarningsMetrics } from './metrics-engine';
import { HourlyBucket, RateSample } from './metrics.types';

/**
 * Price as reported to dashboard consumers; `usd` is null when the feed
 * was unavailable for this pass.
 */
export interface PriceSummary {
  status: PriceQuote['status'];
  usd: number | null;
}

export interface MetricsResponse {
  generatedAt: Date;
  price: PriceSummary;
  totalBalance: number;
  peerCount: number;
  rateSamples: RateSample[];
  hourlyBuckets: HourlyBucket[];
}

export interface PeerBalancesResponse {
  totalBalance: number;
  peers: Observation[];
}

/**
 * MetricsService
 *
 * One full load-compute pass per request:
 * store -> series loader -> metrics engine, with the price feed joined in.
 * Nothing is cached between requests.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    private readonly seriesLoader: SeriesLoaderService,
    private readonly priceOracle: PriceOracleClient,
  ) {}

  async getMetrics(): Promise<MetricsResponse> {
    const [dataset, quote] = await Promise.all([
      this.loadDataset(),
      this.priceOracle.getQuote(),
    ]);

    const { rateSamples, hourlyBuckets } = computeEarningsMetrics(
      dataset,
      quote,
    );
    const peerCount = new Set(dataset.map((o) => o.peerId)).size;

    if (quote.status === 'unavailable') {
      this.logger.warn(`Price unavailable, USD earnings reported as 0 (${quote.reason})`);
    }

    return {
      generatedAt: new Date(),
      price: {
        status: quote.status,
        usd: quote.status === 'available' ? quote.usd : null,
      },
      totalBalance: totalBalance(dataset),
      peerCount,
      rateSamples,
      hourlyBuckets,
    };
  }

  async getLatestBalances(): Promise<PeerBalancesResponse> {
    const dataset = await this.loadDataset();
    return {
      totalBalance: totalBalance(dataset),
      peers: latestPerPeer(dataset),
    };
  }

  private async loadDataset(): Promise<MergedDataset> {
    try {
      const { dataset } = await this.seriesLoader.load();
      return dataset;
    } catch (error) {
      if (error instanceof BalanceStoreError) {
        this.logger.error(`Failed to load balance series: ${error.message}`);
        throw new InternalServerErrorException('Failed to read balance records');
      }
      throw error;
    }
  }
}
