/**
 * Notification copy for prayer alerts
 */
import { formatClockTime } from '../../lib/time';
import { NOTIFICATION_CONFIG } from '../../lib/config/notifications';
import type { FireTime, Mosque, PushPayload } from '../../types/prayerNotifications';

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Push payload for one resolved alert
 *
 * @example
 * // primary:   { title: 'East Street Mosque', body: 'Fajr at 06:00' }
 * // secondary: { title: 'East Street Mosque', body: 'Dhuhr Jamaat in 30 mins' }
 */
export function buildPrayerPayload(
  pushAddress: string,
  mosque: Mosque,
  fireTime: FireTime,
  timeZone: string
): PushPayload {
  const prayer = capitalize(fireTime.eventName);
  const body =
    fireTime.alertKind === 'primary'
      ? `${prayer} at ${formatClockTime(fireTime.fireInstant, timeZone)}`
      : `${prayer} Jamaat in ${NOTIFICATION_CONFIG.secondaryAlertOffsetMinutes} mins`;

  return {
    pushAddress,
    title: mosque.name,
    body,
    routingData: {
      type: NOTIFICATION_CONFIG.taskType,
      prayer: fireTime.eventName,
      timeType: fireTime.alertKind,
      mosqueName: mosque.name,
      mosqueId: mosque.mosqueId,
    },
  };
}
