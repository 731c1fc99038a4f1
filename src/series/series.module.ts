import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { SeriesLoaderService } from './series-loader.service';

/**
 * SeriesModule
 *
 * Turns the stored per-peer CSV series into one merged dataset.
 */
@Module({
  imports: [StorageModule],
  providers: [SeriesLoaderService],
  exports: [SeriesLoaderService],
})
export class SeriesModule {}
