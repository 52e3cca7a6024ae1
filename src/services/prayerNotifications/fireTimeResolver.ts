/**
 * Fire-time resolution
 *
 * Turns a day's timetable and a subscriber's toggles into the future
 * instants at which alerts must be delivered. Only absolute instants are
 * compared here; civil time never enters the comparison.
 */
import { SECONDARY_ALERT_OFFSET_MS } from '../../lib/config/notifications';
import type { FireTime, Preference, ScheduleEntry } from '../../types/prayerNotifications';

/**
 * Resolve the deliveries still ahead of `now` for one (subscriber, mosque)
 *
 * Events missing from either side, disabled toggles, absent instants and
 * instants at or before `now` produce nothing.
 */
export function resolve(scheduleEntry: ScheduleEntry, preference: Preference, now: Date): FireTime[] {
  const nowMs = now.getTime();
  const fireTimes: FireTime[] = [];

  for (const [eventName, eventPreference] of Object.entries(preference.events)) {
    const instants = scheduleEntry.events[eventName];
    if (!instants) continue;

    const { primaryInstant, secondaryInstant } = instants;

    if (eventPreference.alertAtPrimary && primaryInstant && primaryInstant.getTime() > nowMs) {
      fireTimes.push({ eventName, alertKind: 'primary', fireInstant: primaryInstant });
    }

    if (eventPreference.alertAtSecondary && secondaryInstant) {
      const candidate = new Date(secondaryInstant.getTime() - SECONDARY_ALERT_OFFSET_MS);
      if (candidate.getTime() > nowMs) {
        fireTimes.push({ eventName, alertKind: 'secondary', fireInstant: candidate });
      }
    }
  }

  return fireTimes;
}

export default { resolve };
