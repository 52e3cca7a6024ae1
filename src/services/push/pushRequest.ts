/**
 * Validation for incoming push requests
 */
import { pushPayloadSchema } from '../../types/schemas';
import { MissingFieldsError } from '../../lib/errors';
import type { PushPayload } from '../../types/prayerNotifications';

const REQUIRED_FIELDS = ['pushAddress', 'title', 'body'] as const;

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

/**
 * Validate a push request body
 *
 * Missing or blank required fields raise MissingFieldsError; any other shape
 * problem (e.g. non-string routing data) raises the ZodError.
 */
export function parsePushRequest(body: unknown): PushPayload {
  const record: Record<string, unknown> =
    typeof body === 'object' && body !== null ? { ...body } : {};

  const missing = REQUIRED_FIELDS.filter((field) => isBlank(record[field]));
  if (missing.length > 0) {
    throw new MissingFieldsError(missing);
  }

  return pushPayloadSchema.parse(record);
}
