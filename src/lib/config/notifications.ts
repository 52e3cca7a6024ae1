/**
 * Prayer notification configuration
 *
 * Fixed constants plus getters over the Lambda environment. Getters for
 * required values throw so a misconfigured function fails on first use.
 */

export const NOTIFICATION_CONFIG = {
  /** Secondary (jamaat) alerts fire this long before the congregation time */
  secondaryAlertOffsetMinutes: 30,
  /** Leading segment of every dedup key */
  taskType: 'prayer',
  /** Hex characters of the push address digest kept in a dedup key */
  pushAddressHashLength: 16,
  fallbackMosqueName: 'Your Mosque',
  defaultTimezone: 'Europe/London',
  defaultSchedulerGroup: 'prayer-notifications',
  defaultDispatchPath: '/prayer-notifications/dispatch',
} as const;

export const SECONDARY_ALERT_OFFSET_MS =
  NOTIFICATION_CONFIG.secondaryAlertOffsetMinutes * 60 * 1000;

/**
 * Civil timezone used for the day key and for formatting times in messages
 */
export const getOperatingTimezone = (): string =>
  process.env['OPERATING_TIMEZONE'] || NOTIFICATION_CONFIG.defaultTimezone;

export interface SchedulerConfig {
  groupName: string;
  targetArn: string;
  roleArn: string;
  dispatchUrl: string;
}

const requireEnv = (name: string): string => {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is not set`);
  }
  return value;
};

/**
 * EventBridge Scheduler settings for delayed dispatch jobs
 */
export const getSchedulerConfig = (): SchedulerConfig => ({
  groupName: process.env['SCHEDULER_GROUP_NAME'] || NOTIFICATION_CONFIG.defaultSchedulerGroup,
  targetArn: requireEnv('DISPATCH_FUNCTION_ARN'),
  roleArn: requireEnv('SCHEDULER_ROLE_ARN'),
  dispatchUrl: process.env['DISPATCH_URL'] || NOTIFICATION_CONFIG.defaultDispatchPath,
});

/**
 * Shared secret for the manual trigger; undefined leaves it open
 */
export const getManualTriggerSecret = (): string | undefined =>
  process.env['MANUAL_TRIGGER_SECRET'] || undefined;

export default NOTIFICATION_CONFIG;
