/**
 * API Response Helpers - Prayer Alerts Backend
 *
 * Standardized response formats for API Gateway Lambda proxy integration.
 * Includes CORS headers, proper status codes, and error formatting.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ZodError } from 'zod';
import { logger } from './logger';
import {
  AuthenticationError,
  InvalidJsonError,
  MissingFieldsError,
  PushDispatchError,
  StoreReadError,
  toError,
} from './errors';

/**
 * Standard API error response structure
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Standard API success response structure
 */
export interface SuccessResponse<T = unknown> {
  data: T;
  message?: string;
}

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Trigger-Secret',
  'Access-Control-Allow-Methods': 'POST,OPTIONS',
  'Content-Type': 'application/json',
};

const createResponse = (statusCode: number, body: unknown): APIGatewayProxyResult => ({
  statusCode,
  headers: corsHeaders,
  body: JSON.stringify(body),
});

const errorResponse = (
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
): APIGatewayProxyResult => {
  const body: ErrorResponse = {
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
    },
  };
  return createResponse(statusCode, body);
};

/**
 * Success response with 200 status
 */
export const successResponse = <T>(data: T, message?: string): APIGatewayProxyResult => {
  const body: SuccessResponse<T> = {
    data,
    ...(message ? { message } : {}),
  };

  return createResponse(200, body);
};

/**
 * Bad request error response with 400 status
 */
export const badRequestResponse = (message: string, details?: unknown): APIGatewayProxyResult => {
  logger.warn('Bad request', { message, details });
  return errorResponse(400, 'BAD_REQUEST', message, details);
};

/**
 * Unauthorized error response with 401 status
 */
export const unauthorizedResponse = (
  message: string = 'Authentication required'
): APIGatewayProxyResult => errorResponse(401, 'UNAUTHORIZED', message);

/**
 * Service unavailable response with 503 status
 */
export const serviceUnavailableResponse = (
  message: string = 'A backing store is unavailable'
): APIGatewayProxyResult => errorResponse(503, 'SERVICE_UNAVAILABLE', message);

/**
 * Internal server error response with 500 status
 */
export const internalServerErrorResponse = (
  message: string = 'An internal error occurred',
  error?: Error
): APIGatewayProxyResult => {
  if (error) {
    logger.error('Internal server error', error);
  }

  return errorResponse(500, 'INTERNAL_SERVER_ERROR', message);
};

/**
 * Validation error response for Zod errors
 */
export const validationErrorResponse = (zodError: ZodError): APIGatewayProxyResult => {
  const formattedErrors = zodError.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  logger.warn('Validation error', { errors: formattedErrors });
  return errorResponse(400, 'VALIDATION_ERROR', 'Request validation failed', formattedErrors);
};

/**
 * Map a thrown value onto the matching response
 */
export const handleError = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof ZodError) {
    return validationErrorResponse(error);
  }

  if (error instanceof InvalidJsonError) {
    return badRequestResponse(error.message);
  }

  if (error instanceof MissingFieldsError) {
    return badRequestResponse('Missing required fields', { fields: error.fields });
  }

  if (error instanceof AuthenticationError) {
    return unauthorizedResponse(error.message);
  }

  if (error instanceof StoreReadError) {
    logger.error('Store read failed', error, { operation: error.operation });
    return serviceUnavailableResponse();
  }

  if (error instanceof PushDispatchError) {
    return internalServerErrorResponse('Failed', error);
  }

  const err = toError(error);
  return internalServerErrorResponse(err.message, err);
};

/**
 * Parse the JSON body of a proxy event, decoding base64 bodies first
 */
export const parseJsonBody = (event: Pick<APIGatewayProxyEvent, 'body' | 'isBase64Encoded'>): unknown => {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new InvalidJsonError();
  }
};

/**
 * Case-insensitive header lookup
 */
export const getHeader = (
  headers: APIGatewayProxyEvent['headers'] | null | undefined,
  name: string
): string | undefined => {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value) {
      return value;
    }
  }
  return undefined;
};
