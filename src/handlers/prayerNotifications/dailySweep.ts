/**
 * Daily Prayer Notification Sweep
 *
 * Runs every day at 00:30 Europe/London and schedules that day's prayer
 * alerts for every subscriber at every mosque.
 */

import { ScheduledHandler } from 'aws-lambda';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { handleWarmup } from '../../lib/warmup';
import { toError } from '../../lib/errors';
import { createPrayerNotificationSweeper } from '../../services/prayerNotifications';
import { logJobEvent, publishJobMetrics } from '../../lib/monitoring/notificationMetrics';

export const handler: ScheduledHandler = async (event, context) => {
  if (handleWarmup(event, context)) return;

  const start = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('dailySweep', event, context.awsRequestId);
  logJobEvent(context.awsRequestId, 'start', 'DAILY_SWEEP');

  try {
    const summary = await createPrayerNotificationSweeper(logger).runGlobalSweep();
    await publishJobMetrics('DAILY_SWEEP', summary);
    logJobEvent(context.awsRequestId, 'complete', 'DAILY_SWEEP', {
      runId: summary.runId,
      dateKey: summary.dateKey,
      scheduledCount: summary.scheduledCount,
      duplicateCount: summary.duplicateCount,
      errorCount: summary.errorCount,
    });
  } catch (error) {
    // Only configuration problems get here; per-item failures stay inside the sweep
    logJobEvent(context.awsRequestId, 'error', 'DAILY_SWEEP', { message: toError(error).message });
  }

  logLambdaCompletion('dailySweep', Date.now() - start, context.awsRequestId);
};

export default handler;
