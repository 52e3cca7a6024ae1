/**
 * Subscriber Re-sync Handler
 *
 * POST /prayer-notifications/sync
 *
 * Called by the app after sign-in with the device's current push token.
 * Schedules the rest of today's alerts for the caller's followed mosques.
 */

import { APIGatewayProxyHandler } from 'aws-lambda';
import { handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getSubscriberContext } from '../../lib/auth';
import { handleWarmup, warmupResponse } from '../../lib/warmup';
import { syncRequestSchema } from '../../types/schemas';
import { createPrayerNotificationSweeper } from '../../services/prayerNotifications';
import { logJobEvent, publishJobMetrics } from '../../lib/monitoring/notificationMetrics';

export const handler: APIGatewayProxyHandler = async (event, context) => {
  if (handleWarmup(event, context)) return warmupResponse();

  const start = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('syncSubscriber', event, context.awsRequestId);

  try {
    const { subscriberId } = getSubscriberContext(event, logger);
    const { pushAddress } = syncRequestSchema.parse(parseJsonBody(event));

    logJobEvent(context.awsRequestId, 'start', 'SUBSCRIBER_SYNC', { subscriberId });
    const summary = await createPrayerNotificationSweeper(logger).runSubscriberSweep(
      subscriberId,
      pushAddress
    );
    await publishJobMetrics('SUBSCRIBER_SYNC', summary);
    logJobEvent(context.awsRequestId, 'complete', 'SUBSCRIBER_SYNC', {
      runId: summary.runId,
      scheduledCount: summary.scheduledCount,
    });

    logLambdaCompletion('syncSubscriber', Date.now() - start, context.awsRequestId);
    return successResponse(summary);
  } catch (error) {
    logger.error('Subscriber re-sync failed', error instanceof Error ? error : undefined);
    return handleError(error);
  }
};

export default handler;
