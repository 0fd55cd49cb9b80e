import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ValidMessage } from '../interfaces';
import { InboundMessagePayload } from './inbound-message';
import { normalizeZonedTimestamp } from './timestamp';

/**
 * Field-level reason a payload was rejected
 */
export interface PayloadValidationError {
  field: string;
  reason: string;
}

export type PayloadValidationResult =
  | { ok: true; value: ValidMessage }
  | { ok: false; error: PayloadValidationError; messageId?: string };

/**
 * Reporting order when several fields are wrong
 */
const FIELD_ORDER = ['message_id', 'from', 'to', 'ts', 'text'];

/**
 * Parses and validates message webhook bodies.
 *
 * Expected client mistakes come back as a failed result; nothing here throws
 * for bad input.
 */
export class PayloadValidator {
  /**
   * Accepts the raw body (Buffer or string) or an already parsed value
   */
  validate(raw: unknown): PayloadValidationResult {
    let parsed: unknown = raw;

    if (Buffer.isBuffer(raw) || typeof raw === 'string') {
      try {
        parsed = JSON.parse(raw.toString());
      } catch {
        return this.fail('body', 'body is not valid JSON');
      }
    }

    if (!this.isRecord(parsed)) {
      return this.fail('body', 'body must be a JSON object');
    }

    const messageId =
      typeof parsed.message_id === 'string' && parsed.message_id.length > 0
        ? parsed.message_id
        : undefined;

    const payload = plainToInstance(InboundMessagePayload, parsed);
    const errors = validateSync(payload, { stopAtFirstError: true });

    if (errors.length > 0) {
      const [first] = [...errors].sort(
        (a, b) => FIELD_ORDER.indexOf(a.property) - FIELD_ORDER.indexOf(b.property),
      );
      const reason =
        Object.values(first.constraints ?? {})[0] ?? `${first.property} is invalid`;
      return this.fail(first.property, reason, messageId);
    }

    const ts = normalizeZonedTimestamp(payload.ts);
    if (ts === null) {
      return this.fail('ts', 'ts must be an ISO-8601 timestamp with Z or a UTC offset', messageId);
    }

    return {
      ok: true,
      value: {
        messageId: payload.message_id,
        from: payload.from,
        to: payload.to,
        ts,
        text: payload.text ?? null,
      },
    };
  }

  private fail(
    field: string,
    reason: string,
    messageId?: string,
  ): PayloadValidationResult {
    return { ok: false, error: { field, reason }, messageId };
  }

  private isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
