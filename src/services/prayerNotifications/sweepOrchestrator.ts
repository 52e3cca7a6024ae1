/**
 * Prayer Notification Sweeps
 *
 * Walks (subscriber, mosque) pairs for the current day and pushes each
 * through resolve → derive key → submit. Two scopes share the same unit of
 * work: every mosque × every subscriber (daily sweep and manual trigger),
 * or one subscriber's followed mosques (re-sync after login).
 *
 * Per-item failures are logged and counted; a sweep always runs to the end.
 * Re-running a sweep, or running several at once, is safe because every path
 * names its tasks with the same dedup key.
 */
import { v4 as uuidv4 } from 'uuid';
import { NOTIFICATION_CONFIG } from '../../lib/config/notifications';
import { toError } from '../../lib/errors';
import { toDayKey } from '../../lib/time';
import { withContext, ServiceLogger } from '../../lib/logger';
import type {
  Mosque,
  MosqueCatalogue,
  Preference,
  PreferenceStore,
  ScheduleEntry,
  ScheduleStore,
  SubmitOutcome,
  Subscriber,
  SubscriberDirectory,
  PushPayload,
} from '../../types/prayerNotifications';
import { resolve } from './fireTimeResolver';
import { deriveKey } from './dedupKey';
import { buildPrayerPayload } from './messages';

export type SweepScope = 'global' | 'subscriber';

export interface TaskSubmitter {
  submit(key: string, payload: PushPayload, fireInstant: Date): Promise<SubmitOutcome>;
}

export interface SweepDependencies {
  mosques: MosqueCatalogue;
  schedules: ScheduleStore;
  preferences: PreferenceStore;
  subscribers: SubscriberDirectory;
  taskScheduler: TaskSubmitter;
  timeZone: string;
  logger: ServiceLogger;
  clock?: () => Date;
}

export interface SweepSummary {
  runId: string;
  scope: SweepScope;
  dateKey: string;
  startedAt: Date;
  completedAt?: Date;
  scheduledCount: number;
  duplicateCount: number;
  failedCount: number;
  skippedCount: number;
  errorCount: number;
}

interface SweepRun {
  summary: SweepSummary;
  now: Date;
  logger: ServiceLogger;
}

export class PrayerNotificationSweeper {
  private readonly clock: () => Date;

  constructor(private readonly deps: SweepDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Schedule today's alerts for every subscriber at every mosque
   */
  async runGlobalSweep(): Promise<SweepSummary> {
    const run = this.startRun('global');
    const { summary, logger } = run;

    let mosques: Mosque[];
    try {
      mosques = await this.deps.mosques.listAll();
    } catch (error) {
      summary.errorCount++;
      logger.error('Failed to list mosques, nothing scheduled', toError(error));
      return this.finishRun(run);
    }

    let subscribers: Subscriber[] | undefined;

    for (const mosque of mosques) {
      let schedule: ScheduleEntry | null;
      try {
        schedule = await this.deps.schedules.getForDate(mosque.mosqueId, summary.dateKey);
      } catch (error) {
        summary.errorCount++;
        logger.error('Failed to load prayer times', toError(error), { mosqueId: mosque.mosqueId });
        continue;
      }

      if (!schedule) {
        summary.skippedCount++;
        continue;
      }

      if (!subscribers) {
        try {
          subscribers = await this.deps.subscribers.listAll();
        } catch (error) {
          summary.errorCount++;
          logger.error('Failed to list subscribers, nothing scheduled', toError(error));
          return this.finishRun(run);
        }
      }

      for (const subscriber of subscribers) {
        if (!subscriber.pushAddress) {
          summary.skippedCount++;
          continue;
        }

        try {
          const preference = await this.deps.preferences.get(subscriber.subscriberId, mosque.mosqueId);
          if (!preference) {
            summary.skippedCount++;
            continue;
          }
          await this.scheduleUnit(run, subscriber.pushAddress, mosque, schedule, preference);
        } catch (error) {
          summary.errorCount++;
          logger.error('Failed to schedule subscriber', toError(error), {
            subscriberId: subscriber.subscriberId,
            mosqueId: mosque.mosqueId,
          });
        }
      }
    }

    return this.finishRun(run);
  }

  /**
   * Schedule today's alerts for one subscriber across the mosques they follow
   */
  async runSubscriberSweep(subscriberId: string, pushAddress: string): Promise<SweepSummary> {
    const run = this.startRun('subscriber', { subscriberId });
    const { summary, logger } = run;

    let mosqueIds: string[];
    try {
      mosqueIds = await this.deps.subscribers.listFollowedMosqueIds(subscriberId);
    } catch (error) {
      summary.errorCount++;
      logger.error('Failed to list followed mosques, nothing scheduled', toError(error));
      return this.finishRun(run);
    }

    for (const mosqueId of mosqueIds) {
      try {
        const preference = await this.deps.preferences.get(subscriberId, mosqueId);
        if (!preference) {
          summary.skippedCount++;
          continue;
        }

        const schedule = await this.deps.schedules.getForDate(mosqueId, summary.dateKey);
        if (!schedule) {
          summary.skippedCount++;
          continue;
        }

        const mosque = (await this.deps.mosques.getById(mosqueId)) ?? {
          mosqueId,
          name: NOTIFICATION_CONFIG.fallbackMosqueName,
        };

        await this.scheduleUnit(run, pushAddress, mosque, schedule, preference);
      } catch (error) {
        summary.errorCount++;
        logger.error('Failed to schedule mosque for subscriber', toError(error), { mosqueId });
      }
    }

    return this.finishRun(run);
  }

  private async scheduleUnit(
    run: SweepRun,
    pushAddress: string,
    mosque: Mosque,
    schedule: ScheduleEntry,
    preference: Preference
  ): Promise<void> {
    for (const fireTime of resolve(schedule, preference, run.now)) {
      const key = deriveKey(
        pushAddress,
        mosque.mosqueId,
        fireTime.eventName,
        fireTime.alertKind,
        fireTime.fireInstant
      );
      const payload = buildPrayerPayload(pushAddress, mosque, fireTime, this.deps.timeZone);
      const outcome = await this.deps.taskScheduler.submit(key, payload, fireTime.fireInstant);

      switch (outcome.status) {
        case 'created':
          run.summary.scheduledCount++;
          break;
        case 'already_exists':
          run.summary.duplicateCount++;
          break;
        case 'failed':
          run.summary.failedCount++;
          break;
      }
    }
  }

  private startRun(scope: SweepScope, context: Record<string, unknown> = {}): SweepRun {
    const now = this.clock();
    const summary: SweepSummary = {
      runId: uuidv4(),
      scope,
      dateKey: toDayKey(now, this.deps.timeZone),
      startedAt: now,
      scheduledCount: 0,
      duplicateCount: 0,
      failedCount: 0,
      skippedCount: 0,
      errorCount: 0,
    };

    const logger = withContext(this.deps.logger, { ...context, runId: summary.runId, scope });
    logger.info('Prayer notification sweep started', {
      dateKey: summary.dateKey,
      now: now.toISOString(),
    });

    return { summary, now, logger };
  }

  private finishRun(run: SweepRun): SweepSummary {
    const { summary } = run;
    summary.completedAt = this.clock();
    run.logger.info('Prayer notification sweep completed', {
      dateKey: summary.dateKey,
      scheduledCount: summary.scheduledCount,
      duplicateCount: summary.duplicateCount,
      failedCount: summary.failedCount,
      skippedCount: summary.skippedCount,
      errorCount: summary.errorCount,
    });
    return summary;
  }
}
