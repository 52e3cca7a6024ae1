/**
 * Prayer Notification Dispatch Handler
 *
 * POST /prayer-notifications/dispatch
 *
 * Invoked by EventBridge Scheduler when a prayer alert falls due (base64
 * body) or directly through API Gateway. Sends exactly one push; duplicate
 * suppression happens upstream through the schedule name.
 */

import { APIGatewayProxyHandler } from 'aws-lambda';
import { handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { handleWarmup, warmupResponse } from '../../lib/warmup';
import { parsePushRequest } from '../../services/push/pushRequest';
import { sendPush } from '../../services/push/pushSender';

export const handler: APIGatewayProxyHandler = async (event, context) => {
  if (handleWarmup(event, context)) return warmupResponse();

  const start = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('dispatchPrayerNotification', event, context.awsRequestId);

  try {
    const payload = parsePushRequest(parseJsonBody(event));
    const messageId = await sendPush(payload);

    logger.info('Prayer notification sent', {
      messageId,
      prayer: payload.routingData?.['prayer'],
      timeType: payload.routingData?.['timeType'],
      mosqueId: payload.routingData?.['mosqueId'],
    });
    logLambdaCompletion('dispatchPrayerNotification', Date.now() - start, context.awsRequestId);
    return successResponse({ messageId }, 'Success');
  } catch (error) {
    logger.error('Error sending prayer notification', error instanceof Error ? error : undefined);
    return handleError(error);
  }
};

export default handler;
