import { Controller, Get, Logger } from '@nestjs/common';
import {
  MetricsResponse,
  MetricsService,
  PeerBalancesResponse,
} from './metrics.service';

/**
 * MetricsController
 *
 * Read side for the dashboard.
 *
 * Endpoints:
 * - GET /metrics       - rate samples, hourly buckets, total balance, price
 * - GET /metrics/peers - latest balance of every peer
 */
@Controller('metrics')
export class MetricsController {
  private readonly logger = new Logger(MetricsController.name);

  constructor(private readonly metricsService: MetricsService) {}

  /**
   * @example
   * GET /metrics
   * Response: { price: { status: "available", usd: 0.12 }, totalBalance: 12.5, ... }
   */
  @Get()
  async getMetrics(): Promise<MetricsResponse> {
    const metrics = await this.metricsService.getMetrics();
    this.logger.log(
      `GET /metrics: ${metrics.peerCount} peer(s), ${metrics.rateSamples.length} samples, ${metrics.hourlyBuckets.length} hourly buckets`,
    );
    return metrics;
  }

  @Get('peers')
  async getPeers(): Promise<PeerBalancesResponse> {
    return this.metricsService.getLatestBalances();
  }
}
