/**
 * DynamoDB Client Utility - Prayer Alerts Backend
 *
 * Centralized DynamoDB Document Client using AWS SDK v3.
 * Provides optimized client configuration for Lambda execution environment.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  QueryCommand,
  QueryCommandInput,
  TranslateConfig,
} from '@aws-sdk/lib-dynamodb';

// Local development (sam local / DynamoDB Local) always uses dummy credentials
const isLocalDevelopment =
  process.env['AWS_SAM_LOCAL'] === 'true' || !!process.env['DYNAMODB_ENDPOINT'];

const localEndpoint =
  process.env['DYNAMODB_ENDPOINT'] ||
  (process.env['AWS_SAM_LOCAL'] === 'true' ? 'http://host.docker.internal:8000' : undefined);

const clientConfig: DynamoDBClientConfig = {
  region: process.env['AWS_REGION'] || 'eu-west-2',
  maxAttempts: 3,
  ...(localEndpoint ? { endpoint: localEndpoint, tls: false } : {}),
  ...(isLocalDevelopment
    ? { credentials: { accessKeyId: 'local', secretAccessKey: 'local' } }
    : {}),
};

const dynamoDBClient = new DynamoDBClient(clientConfig);

const marshallOptions: TranslateConfig['marshallOptions'] = {
  removeUndefinedValues: true,
  convertEmptyValues: false,
  convertClassInstanceToMap: true,
};

const unmarshallOptions: TranslateConfig['unmarshallOptions'] = {
  wrapNumbers: false,
};

/**
 * DynamoDB Document Client instance
 *
 * Singleton pattern - reused across Lambda invocations
 */
export const docClient = DynamoDBDocumentClient.from(dynamoDBClient, {
  marshallOptions,
  unmarshallOptions,
});

/**
 * Get the DynamoDB table name from environment variable
 */
export const getTableName = (): string => {
  const tableName = process.env['TABLE_NAME'];

  if (!tableName) {
    throw new Error('TABLE_NAME environment variable is not set');
  }

  return tableName;
};

/**
 * Run a query to exhaustion, following LastEvaluatedKey
 */
export const queryAllPages = async (
  input: Omit<QueryCommandInput, 'TableName' | 'ExclusiveStartKey'>
): Promise<Record<string, unknown>[]> => {
  const items: Record<string, unknown>[] = [];
  let exclusiveStartKey: Record<string, unknown> | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        TableName: getTableName(),
        ...input,
        ExclusiveStartKey: exclusiveStartKey,
      })
    );
    items.push(...(result.Items ?? []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
};
