// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type { BalanceRecordedResponse } from './ingestion.controller';
export { parseBalanceReport, PEER_ID_PATTERN } from './dto/balance-report.dto';
