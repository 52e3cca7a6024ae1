/**
 * Default wiring for prayer notification sweeps
 */
import { getOperatingTimezone, getSchedulerConfig } from '../../lib/config/notifications';
import { EventBridgeTaskQueue, getSchedulerClient } from '../../lib/scheduler';
import type { ServiceLogger } from '../../lib/logger';
import { MosqueModel } from '../../models/mosque';
import { PrayerTimesModel } from '../../models/prayerTimes';
import { NotificationSettingsModel } from '../../models/notificationSettings';
import { UserModel } from '../../models/user';
import { PrayerNotificationSweeper } from './sweepOrchestrator';
import { TaskScheduler } from './taskScheduler';

export { PrayerNotificationSweeper } from './sweepOrchestrator';
export type { SweepSummary, SweepScope, SweepDependencies } from './sweepOrchestrator';

/**
 * Sweeper backed by DynamoDB and EventBridge Scheduler
 */
export function createPrayerNotificationSweeper(logger: ServiceLogger): PrayerNotificationSweeper {
  const schedulerConfig = getSchedulerConfig();
  const queue = new EventBridgeTaskQueue(getSchedulerClient(), schedulerConfig);

  return new PrayerNotificationSweeper({
    mosques: MosqueModel,
    schedules: PrayerTimesModel,
    preferences: NotificationSettingsModel,
    subscribers: UserModel,
    taskScheduler: new TaskScheduler(queue, schedulerConfig.dispatchUrl, logger),
    timeZone: getOperatingTimezone(),
    logger,
  });
}
