/**
 * Direct Notification Handler
 *
 * POST /notifications/direct
 *
 * Sends one push immediately, for friend, affiliation and mosque
 * application updates raised by the app.
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
  logLambdaInvocation('directNotification', event, context.awsRequestId);

  try {
    const payload = parsePushRequest(parseJsonBody(event));
    const messageId = await sendPush(payload);

    logger.info('Direct notification sent', { messageId, type: payload.routingData?.['type'] });
    logLambdaCompletion('directNotification', Date.now() - start, context.awsRequestId);
    return successResponse({ messageId }, 'Success');
  } catch (error) {
    logger.error('Error sending direct notification', error instanceof Error ? error : undefined);
    return handleError(error);
  }
};

export default handler;
