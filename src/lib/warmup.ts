/**
 * Lambda Warmup Utility
 *
 * Detects warmup pings so handlers can exit before touching DynamoDB,
 * the scheduler or Firebase.
 */

import type { Context } from 'aws-lambda';
import { logger } from './logger';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Check if the current invocation is a warmup ping
 */
export const isWarmupEvent = (event: unknown): boolean => {
  if (!isRecord(event)) {
    return false;
  }

  if (event['source'] === 'warmup.orchestrator' || event['warmup'] === true) {
    return true;
  }

  const resources = event['resources'];
  return (
    event['source'] === 'aws.events' &&
    event['detail-type'] === 'Scheduled Event' &&
    Array.isArray(resources) &&
    typeof resources[0] === 'string' &&
    resources[0].includes('warmup')
  );
};

/**
 * Returns true (and logs) when the handler should return early
 */
export const handleWarmup = (event: unknown, context: Context): boolean => {
  if (isWarmupEvent(event)) {
    logger.info('Warmup event detected - exiting early', {
      requestId: context.awsRequestId,
      functionName: context.functionName,
    });
    return true;
  }
  return false;
};

/**
 * Response to return for warmup events
 */
export const warmupResponse = () => ({
  statusCode: 200,
  headers: {
    'Content-Type': 'application/json',
  },
  body: JSON.stringify({
    message: 'Lambda warmed up successfully',
    timestamp: new Date().toISOString(),
  }),
});
