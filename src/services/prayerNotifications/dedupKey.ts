/**
 * Dedup key derivation
 *
 * Every trigger path (daily sweep, per-user re-sync, manual run) must name a
 * given alert identically, so the queue's unique-name rule collapses repeats.
 */
import { createHash } from 'crypto';
import { NOTIFICATION_CONFIG } from '../../lib/config/notifications';
import { toEpochSeconds } from '../../lib/time';
import type { AlertKind } from '../../types/prayerNotifications';

/**
 * Fixed-length digest of a push address; raw tokens never appear in task names
 */
export function hashPushAddress(pushAddress: string): string {
  return createHash('sha256')
    .update(pushAddress)
    .digest('hex')
    .slice(0, NOTIFICATION_CONFIG.pushAddressHashLength);
}

/**
 * Escape the field separator so free-form ids cannot shift field boundaries
 */
const escapeField = (value: string): string => value.replace(/%/g, '%25').replace(/_/g, '%5F');

/**
 * @example
 * deriveKey('token-a', 'mosque-1', 'fajr', 'primary', new Date('2026-10-19T05:00:00Z'))
 * // 'prayer_fajr_primary_mosque-1_<16 hex>_1792386000'
 */
export function deriveKey(
  pushAddress: string,
  mosqueId: string,
  eventName: string,
  alertKind: AlertKind,
  fireInstant: Date
): string {
  return [
    NOTIFICATION_CONFIG.taskType,
    escapeField(eventName),
    alertKind,
    escapeField(mosqueId),
    hashPushAddress(pushAddress),
    toEpochSeconds(fireInstant),
  ].join('_');
}

export default { deriveKey, hashPushAddress };
