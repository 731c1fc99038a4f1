import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { parseBalanceReport } from './dto/balance-report.dto';

/**
 * Response DTO for the balance report endpoint
 */
export interface BalanceRecordedResponse {
  status: 'recorded';
  peerId: string;
  balance: string;
  timestamp: string;
}

/**
 * IngestionController
 *
 * Endpoint polled by worker peers to report their current balance.
 *
 * Usage:
 *   POST /update_balance
 *   Content-Type: application/json
 *   Body: { "peer_id": "...", "balance": "...", "timestamp": "..." }
 */
@Controller()
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * Record one balance report
   *
   * @returns 200 with the stored values, 400 when a field is missing or empty
   *
   * @example
   * curl -X POST http://localhost:3000/update_balance \
   *   -H "Content-Type: application/json" \
   *   -d '{"peer_id":"QmPeer1","balance":"120.5 QUIL","timestamp":"2025-10-01T10:00:00Z"}'
   */
  @Post('update_balance')
  @HttpCode(HttpStatus.OK)
  async updateBalance(@Body() body: unknown): Promise<BalanceRecordedResponse> {
    const record = parseBalanceReport(body);
    await this.ingestionService.recordBalance(record);

    return {
      status: 'recorded',
      peerId: record.peerId,
      balance: record.balance,
      timestamp: record.timestamp,
    };
  }
}
