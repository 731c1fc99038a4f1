import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';

/**
 * IngestionModule
 *
 * Accepts balance reports from peers and appends them to the store.
 *
 * Components:
 * - IngestionController: REST endpoint for peer reports
 * - IngestionService: Writes reports through the balance record store
 */
@Module({
  imports: [StorageModule],
  controllers: [IngestionController],
  providers: [IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}
