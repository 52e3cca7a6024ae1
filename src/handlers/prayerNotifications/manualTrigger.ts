/**
 * Manual Sweep Trigger
 *
 * POST /prayer-notifications/trigger
 *
 * Runs the same global sweep as the daily schedule, for testing or resends.
 * Open by default; when MANUAL_TRIGGER_SECRET is set the caller must send it
 * in the X-Trigger-Secret header.
 */

import { APIGatewayProxyHandler } from 'aws-lambda';
import { getHeader, handleError, successResponse, unauthorizedResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { secretsMatch } from '../../lib/auth';
import { handleWarmup, warmupResponse } from '../../lib/warmup';
import { getManualTriggerSecret } from '../../lib/config/notifications';
import { createPrayerNotificationSweeper } from '../../services/prayerNotifications';
import { logJobEvent, publishJobMetrics } from '../../lib/monitoring/notificationMetrics';

export const handler: APIGatewayProxyHandler = async (event, context) => {
  if (handleWarmup(event, context)) return warmupResponse();

  const start = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('manualTrigger', event, context.awsRequestId);

  const expectedSecret = getManualTriggerSecret();
  if (expectedSecret) {
    const presented = getHeader(event.headers, 'X-Trigger-Secret');
    if (!presented || !secretsMatch(presented, expectedSecret)) {
      logger.warn('Manual trigger rejected: bad or missing secret');
      return unauthorizedResponse('Invalid trigger secret');
    }
  }

  try {
    logJobEvent(context.awsRequestId, 'start', 'MANUAL_SWEEP');
    const summary = await createPrayerNotificationSweeper(logger).runGlobalSweep();
    await publishJobMetrics('MANUAL_SWEEP', summary);
    logJobEvent(context.awsRequestId, 'complete', 'MANUAL_SWEEP', {
      runId: summary.runId,
      scheduledCount: summary.scheduledCount,
    });

    logLambdaCompletion('manualTrigger', Date.now() - start, context.awsRequestId);
    return successResponse(summary, 'Manual prayer notification scheduler triggered.');
  } catch (error) {
    logger.error('Manual prayer scheduler failed', error instanceof Error ? error : undefined);
    return handleError(error);
  }
};

export default handler;
