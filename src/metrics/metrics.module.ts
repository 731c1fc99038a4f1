import { Module } from '@nestjs/common';
import { PriceModule } from '../price/price.module';
import { SeriesModule } from '../series/series.module';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

/**
 * MetricsModule
 *
 * Serves earnings metrics computed from the stored series and the current
 * price. Used by the dashboard for chart data.
 */
@Module({
  imports: [SeriesModule, PriceModule],
  controllers: [MetricsController],
  providers: [MetricsService],
  exports: [MetricsService],
})
export class MetricsModule {}
