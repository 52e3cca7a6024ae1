import type {
  APIGatewayProxyEvent,
  APIGatewayProxyHandler,
  APIGatewayProxyResult,
  Context,
} from 'aws-lambda';

export interface ApiEventOptions {
  body?: string | null;
  isBase64Encoded?: boolean;
  headers?: Record<string, string>;
  claims?: Record<string, string>;
  path?: string;
}

/**
 * Minimal API Gateway proxy event for handler tests
 */
export function buildApiEvent(options: ApiEventOptions): APIGatewayProxyEvent {
  return {
    body: options.body ?? null,
    headers: options.headers ?? {},
    multiValueHeaders: {},
    httpMethod: 'POST',
    isBase64Encoded: options.isBase64Encoded ?? false,
    path: options.path ?? '/',
    pathParameters: null,
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    resource: options.path ?? '/',
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      authorizer: options.claims ? { claims: options.claims } : undefined,
      protocol: 'HTTP/1.1',
      httpMethod: 'POST',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: 'jest',
        userArn: null,
      },
      path: options.path ?? '/',
      stage: 'test',
      requestId: 'test-request',
      requestTimeEpoch: 1768456800000,
      resourceId: 'test-resource',
      resourcePath: options.path ?? '/',
    },
  };
}

export const testContext: Context = {
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'test-function',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:eu-west-2:123456789012:function:test-function',
  memoryLimitInMB: '256',
  awsRequestId: 'test-request-id',
  logGroupName: '/aws/lambda/test-function',
  logStreamName: 'test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => undefined,
  fail: () => undefined,
  succeed: () => undefined,
};

/**
 * Unsigned JWT carrying the given claims
 */
export function fakeJwt(claims: Record<string, string>): string {
  const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none', typ: 'JWT' })}.${encode(claims)}.signature`;
}

export const parseBody = (result: { body: string }): unknown => JSON.parse(result.body);

/**
 * Call an API handler and return its result, failing when it returns nothing
 */
export async function invokeApiHandler(
  handler: APIGatewayProxyHandler,
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  const result = await handler(event, testContext, () => undefined);
  if (!result) {
    throw new Error('Handler returned no result');
  }
  return result;
}
