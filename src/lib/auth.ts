/**
 * Authentication Utilities - Prayer Alerts Backend
 *
 * Helper functions for extracting the calling subscriber from API Gateway events.
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import { timingSafeEqual } from 'crypto';
import { AuthenticationError } from './errors';
import { getHeader } from './response';
import type { Logger } from './logger';

/**
 * Caller identity extracted from the authorizer or a mock for local development
 */
export interface SubscriberContext {
  subscriberId: string;
  email?: string;
}

const readClaim = (claims: Record<string, unknown>, name: string): string | undefined => {
  const value = claims[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Decode JWT payload (without verification - already verified by Cognito)
 */
const decodeJWT = (token: string): Record<string, unknown> => {
  const parts = token.split('.');
  const payload = parts[1];
  if (parts.length !== 3 || !payload) {
    throw new AuthenticationError('Invalid JWT token');
  }

  try {
    const decoded: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    if (typeof decoded !== 'object' || decoded === null) {
      throw new AuthenticationError('Invalid JWT payload');
    }
    return { ...decoded };
  } catch (error) {
    if (error instanceof AuthenticationError) throw error;
    throw new AuthenticationError('Invalid JWT payload');
  }
};

const getAuthorizerClaims = (event: APIGatewayProxyEvent): Record<string, unknown> | undefined => {
  const claims: unknown = event.requestContext?.authorizer?.['claims'];
  return typeof claims === 'object' && claims !== null ? { ...claims } : undefined;
};

/**
 * Get the authenticated subscriber from an API Gateway event
 *
 * Prefers claims injected by the Cognito authorizer, falling back to the
 * Bearer token. With AWS_SAM_LOCAL=true a fixed mock subscriber is returned.
 */
export const getSubscriberContext = (
  event: APIGatewayProxyEvent,
  logger?: Pick<Logger, 'warn'>
): SubscriberContext => {
  if (process.env['AWS_SAM_LOCAL'] === 'true') {
    logger?.warn('Using mock authentication for local development');
    return { subscriberId: 'mock-user-id', email: 'test@example.com' };
  }

  let claims = getAuthorizerClaims(event);

  if (!claims) {
    const authHeader = getHeader(event.headers, 'Authorization');
    const token = authHeader?.replace(/^Bearer\s+/i, '');
    if (!token) {
      throw new AuthenticationError();
    }
    claims = decodeJWT(token);
  }

  const subscriberId = readClaim(claims, 'sub') ?? readClaim(claims, 'cognito:username');
  if (!subscriberId) {
    throw new AuthenticationError('Token has no subject');
  }

  return {
    subscriberId,
    email: readClaim(claims, 'email'),
  };
};

/**
 * Constant-time comparison of a presented secret with the expected one
 */
export const secretsMatch = (presented: string, expected: string): boolean => {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};
