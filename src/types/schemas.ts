/**
 * Zod Validation Schemas - Prayer Alerts Backend
 *
 * Runtime validation for stored items read from DynamoDB and for API
 * request bodies. Stored documents are edited by the app over time, so item
 * schemas are lenient about individual prayers and strict about identity.
 */

import { z } from 'zod';
import type {
  EventInstants,
  EventPreference,
  Mosque,
  Preference,
  ScheduleEntry,
  Subscriber,
} from './prayerNotifications';
import { parseInstant } from '../lib/time';
import { NOTIFICATION_CONFIG } from '../lib/config/notifications';

const nonEmptyString = z.string().trim().min(1, 'Cannot be empty');
const dayKeySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be yyyy-MM-dd');

/**
 * One prayer inside a PrayerTimes item; bad values degrade to absent
 */
export const storedPrayerTimeSchema = z.object({
  start: z.string().optional().catch(undefined),
  jamaat: z.string().optional().catch(undefined),
});

export const prayerTimesItemSchema = z.object({
  mosqueId: nonEmptyString,
  date: dayKeySchema,
  prayers: z.record(z.string(), z.unknown()).default({}),
});

export const storedPrayerNotificationSchema = z.object({
  start: z.boolean().optional().catch(undefined),
  jamaat: z.boolean().optional().catch(undefined),
});

export const notificationSettingsItemSchema = z.object({
  userId: nonEmptyString,
  mosqueId: nonEmptyString,
  posts: z.boolean().optional().catch(undefined),
  prayerNotifications: z.record(z.string(), z.unknown()).optional(),
});

export const mosqueItemSchema = z.object({
  mosqueId: nonEmptyString,
  name: z.string().optional().catch(undefined),
});

export const userItemSchema = z.object({
  userId: nonEmptyString,
  fcmToken: z.string().nullable().optional().catch(undefined),
});

export const postItemSchema = z.object({
  postId: nonEmptyString,
  mosqueId: nonEmptyString,
  mosqueName: z.string().optional(),
  message: z.string().optional(),
});

/**
 * Push request accepted by the dispatch and direct notification endpoints
 */
export const pushPayloadSchema = z.object({
  pushAddress: nonEmptyString,
  title: nonEmptyString,
  body: nonEmptyString,
  routingData: z.record(z.string(), z.string()).optional(),
});

/**
 * Body of the authenticated per-subscriber re-sync
 */
export const syncRequestSchema = z.object({
  pushAddress: nonEmptyString,
});

export type SyncRequest = z.infer<typeof syncRequestSchema>;
export type PostRecord = z.infer<typeof postItemSchema>;

// --- Item → domain record mappers ----------------------------------------

export function toScheduleEntry(item: unknown): ScheduleEntry {
  const parsed = prayerTimesItemSchema.parse(item);
  const events: Record<string, EventInstants> = {};

  for (const [eventName, raw] of Object.entries(parsed.prayers)) {
    const times = storedPrayerTimeSchema.safeParse(raw);
    if (!times.success) continue;

    const instants: EventInstants = {};
    const primaryInstant = parseInstant(times.data.start);
    const secondaryInstant = parseInstant(times.data.jamaat);
    if (primaryInstant) instants.primaryInstant = primaryInstant;
    if (secondaryInstant) instants.secondaryInstant = secondaryInstant;
    events[eventName] = instants;
  }

  return { mosqueId: parsed.mosqueId, date: parsed.date, events };
}

export function toPreference(item: unknown): Preference {
  const parsed = notificationSettingsItemSchema.parse(item);
  const events: Record<string, EventPreference> = {};

  for (const [eventName, raw] of Object.entries(parsed.prayerNotifications ?? {})) {
    const settings = storedPrayerNotificationSchema.safeParse(raw);
    if (!settings.success) continue;

    events[eventName] = {
      alertAtPrimary: settings.data.start ?? false,
      alertAtSecondary: settings.data.jamaat ?? false,
    };
  }

  return {
    subscriberId: parsed.userId,
    mosqueId: parsed.mosqueId,
    posts: parsed.posts ?? false,
    events,
  };
}

export function toMosque(item: unknown): Mosque {
  const parsed = mosqueItemSchema.parse(item);
  const name = parsed.name?.trim();
  return {
    mosqueId: parsed.mosqueId,
    name: name || NOTIFICATION_CONFIG.fallbackMosqueName,
  };
}

export function toSubscriber(item: unknown): Subscriber {
  const parsed = userItemSchema.parse(item);
  const token = parsed.fcmToken?.trim();
  return {
    subscriberId: parsed.userId,
    pushAddress: token || null,
  };
}

/**
 * Map stored items, dropping the ones whose identity fields fail validation.
 * Errors other than validation failures propagate.
 */
export function mapValidItems<T>(
  items: Record<string, unknown>[],
  mapper: (item: unknown) => T,
  onInvalid: (item: Record<string, unknown>, error: z.ZodError) => void
): T[] {
  const mapped: T[] = [];
  for (const item of items) {
    try {
      mapped.push(mapper(item));
    } catch (error) {
      if (!(error instanceof z.ZodError)) {
        throw error;
      }
      onInvalid(item, error);
    }
  }
  return mapped;
}
