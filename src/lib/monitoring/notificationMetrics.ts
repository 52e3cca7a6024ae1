/**
 * Notification Metrics & Logging Helpers
 *
 * CloudWatch metrics and structured job events for prayer notification sweeps.
 */

import { CloudWatchClient, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { createLambdaLogger } from '../logger';
import { toError } from '../errors';
import type { SweepSummary } from '../../services/prayerNotifications/sweepOrchestrator';

const cloudwatch = new CloudWatchClient({ region: process.env['AWS_REGION'] || 'eu-west-2' });
const NAMESPACE = 'PrayerAlerts/Notifications';

export type JobType = 'DAILY_SWEEP' | 'MANUAL_SWEEP' | 'SUBSCRIBER_SYNC';

/**
 * Publish sweep metrics to CloudWatch
 */
export async function publishJobMetrics(jobType: JobType, summary: SweepSummary): Promise<void> {
  const timestamp = new Date();
  const dimensions = [{ Name: 'JobType', Value: jobType }];
  const count = (MetricName: string, Value: number) => ({
    MetricName,
    Dimensions: dimensions,
    Value,
    Unit: StandardUnit.Count,
    Timestamp: timestamp,
  });

  try {
    await cloudwatch.send(
      new PutMetricDataCommand({
        Namespace: NAMESPACE,
        MetricData: [
          count('TasksScheduled', summary.scheduledCount),
          count('DuplicatesSkipped', summary.duplicateCount),
          count('Skipped', summary.skippedCount),
          count('Errors', summary.errorCount + summary.failedCount),
          {
            MetricName: 'JobDuration',
            Dimensions: dimensions,
            Value: summary.completedAt
              ? summary.completedAt.getTime() - summary.startedAt.getTime()
              : 0,
            Unit: StandardUnit.Milliseconds,
            Timestamp: timestamp,
          },
        ],
      })
    );
  } catch (err) {
    // Metrics never fail the job
    createLambdaLogger().error('Failed to publish CloudWatch metrics', toError(err), { jobType });
  }
}

/**
 * Log structured notification job event
 */
export function logJobEvent(
  requestId: string,
  event: 'start' | 'complete' | 'error',
  jobType: JobType,
  details: Record<string, unknown> = {}
): void {
  const logger = createLambdaLogger(requestId);
  const baseContext = { jobType, event, ...details };

  switch (event) {
    case 'start':
      logger.info('Notification job started', baseContext);
      break;
    case 'complete':
      logger.info('Notification job completed', baseContext);
      break;
    case 'error':
      logger.error('Notification job error', new Error(String(details['message'] ?? 'Unknown error')), baseContext);
      break;
  }
}

export default {
  publishJobMetrics,
  logJobEvent,
};
