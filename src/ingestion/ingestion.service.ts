import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import {
  BALANCE_RECORD_STORE,
  BalanceRecord,
  BalanceRecordStore,
  BalanceStoreError,
} from '../storage/interfaces/balance-record-store.interface';

/**
 * IngestionService - records balance reports from peers
 *
 * Each report becomes one appended record in the peer's series. Values are
 * stored exactly as reported; the series loader normalizes them on read.
 * No retries: peers report periodically, so a lost write is replaced by the
 * next report.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @Inject(BALANCE_RECORD_STORE)
    private readonly store: BalanceRecordStore,
  ) {}

  /**
   * Append a report to the peer's series
   *
   * @throws InternalServerErrorException when the store cannot be written
   */
  async recordBalance(record: BalanceRecord): Promise<void> {
    try {
      await this.store.append(record);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to record balance for peer ${record.peerId} at ${record.timestamp}: ${message}`,
      );
      if (error instanceof BalanceStoreError) {
        throw new InternalServerErrorException('Failed to record balance');
      }
      throw error;
    }

    this.logger.log(
      `Recorded balance for peer ${record.peerId}: ${record.balance} at ${record.timestamp}`,
    );
  }
}
