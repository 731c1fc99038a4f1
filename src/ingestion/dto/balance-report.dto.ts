import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import { BalanceRecord } from '../../storage/interfaces/balance-record-store.interface';

const REQUIRED = 'is required';

/**
 * Peer ids name the peer's series file, so they are limited to a safe
 * character set.
 */
export const PEER_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * A report field may arrive as a string or a number. Numbers are kept as
 * their decimal text; null and blank strings count as absent.
 */
const reportField = z.preprocess(
  (value) => {
    if (value === null) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return typeof value === 'string' ? value.trim() : value;
  },
  z
    .string({
      required_error: REQUIRED,
      invalid_type_error: 'must be a string or a number',
    })
    .min(1, REQUIRED),
);

/**
 * Body of `POST /update_balance`
 *
 * {
 *   "peer_id": "QmPeer1",
 *   "balance": "120.5 QUIL",
 *   "timestamp": "2025-10-01T10:00:00Z"
 * }
 */
export const balanceReportSchema = z.object({
  peer_id: reportField.pipe(
    z
      .string()
      .regex(
        PEER_ID_PATTERN,
        'must be 1-128 letters, digits, ".", "_", ":" or "-"',
      ),
  ),
  balance: reportField,
  timestamp: reportField,
});

/**
 * Validate a raw request body into a record for the store.
 *
 * @throws BadRequestException naming the missing or invalid fields
 */
export function parseBalanceReport(body: unknown): BalanceRecord {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new BadRequestException('Request body must be a JSON object');
  }

  const result = balanceReportSchema.safeParse(body);
  if (!result.success) {
    const missing = result.error.issues
      .filter((issue) => issue.message === REQUIRED)
      .map((issue) => issue.path.join('.'));
    if (missing.length > 0) {
      throw new BadRequestException(
        `Missing required fields: ${missing.join(', ')}`,
      );
    }

    const invalid = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new BadRequestException(`Invalid fields: ${invalid}`);
  }

  return {
    peerId: result.data.peer_id,
    balance: result.data.balance,
    timestamp: result.data.timestamp,
  };
}
