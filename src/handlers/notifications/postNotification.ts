/**
 * Post Notification Stream Handler
 *
 * Subscribed to the table's DynamoDB stream; reacts to newly inserted
 * POST# items and notifies the mosque's opted-in followers.
 */

import { AttributeValue as LambdaAttributeValue, DynamoDBStreamHandler } from 'aws-lambda';
import { AttributeValue } from '@aws-sdk/client-dynamodb';
import { unmarshall } from '@aws-sdk/util-dynamodb';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { toError } from '../../lib/errors';
import { postItemSchema } from '../../types/schemas';
import { NotificationSettingsModel } from '../../models/notificationSettings';
import { UserModel } from '../../models/user';
import { sendPushToMany } from '../../services/push/pushSender';
import { notifyFollowersOfPost } from '../../services/notifications/postNotificationService';

type StreamImage = Record<string, LambdaAttributeValue>;

/**
 * Stream images use the Lambda event typing; the SDK's AttributeValue union
 * describes the same wire format
 */
const toSdkImage = (image: StreamImage): Record<string, AttributeValue> => {
  const converted: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(image)) {
    const parsed = toSdkAttribute(value);
    if (parsed) converted[key] = parsed;
  }
  return converted;
};

const toSdkAttribute = (value: LambdaAttributeValue): AttributeValue | undefined => {
  if (value.S !== undefined) return { S: value.S };
  if (value.N !== undefined) return { N: value.N };
  if (value.BOOL !== undefined) return { BOOL: value.BOOL };
  if (value.NULL !== undefined) return { NULL: value.NULL };
  if (value.SS !== undefined) return { SS: value.SS };
  if (value.NS !== undefined) return { NS: value.NS };
  if (value.L !== undefined) {
    return { L: value.L.map(toSdkAttribute).filter((v): v is AttributeValue => v !== undefined) };
  }
  if (value.M !== undefined) return { M: toSdkImage(value.M) };
  return undefined;
};

export const handler: DynamoDBStreamHandler = async (event, context) => {
  const start = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('postNotification', event, context.awsRequestId);

  for (const record of event.Records) {
    const image = record.dynamodb?.NewImage;
    if (record.eventName !== 'INSERT' || !image) continue;

    const item = unmarshall(toSdkImage(image));
    if (item['entityType'] !== 'Post') continue;

    const post = postItemSchema.safeParse(item);
    if (!post.success) {
      logger.warn('Skipping malformed post item', { issues: post.error.issues.length });
      continue;
    }

    try {
      await notifyFollowersOfPost(post.data, {
        listFollowerIds: (mosqueId) => UserModel.listFollowerIds(mosqueId),
        getSubscriber: (subscriberId) => UserModel.getById(subscriberId),
        preferences: NotificationSettingsModel,
        sendPushToMany,
        logger,
      });
    } catch (error) {
      logger.error('Error in post notification', toError(error), { postId: post.data.postId });
    }
  }

  logLambdaCompletion('postNotification', Date.now() - start, context.awsRequestId);
};

export default handler;
