import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName, queryAllPages } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { StoreReadError, toError } from '../lib/errors';
import { KeyBuilder, QueryPatterns } from '../types/entities';
import { mapValidItems, toSubscriber } from '../types/schemas';
import type { Subscriber } from '../types/prayerNotifications';

const readString = (item: Record<string, unknown>, key: string): string | undefined => {
  const value = item[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * User Model
 * App users as notification subscribers, plus their follow edges
 */
export class UserModel {
  /**
   * List every user with their current push token
   */
  static async listAll(): Promise<Subscriber[]> {
    try {
      const items = await queryAllPages(QueryPatterns.listUsers());
      return mapValidItems(items, toSubscriber, (item, error) => {
        logger.warn('Skipping malformed user item', {
          pk: item['PK'],
          issues: error.issues.map((issue) => issue.message),
        });
      });
    } catch (error) {
      logger.error('Failed to list users', toError(error));
      throw new StoreReadError('listUsers', {}, { cause: error });
    }
  }

  static async getById(userId: string): Promise<Subscriber | null> {
    try {
      const keys = KeyBuilder.user(userId);
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: { PK: keys.PK, SK: keys.SK },
        })
      );

      if (!result.Item) {
        return null;
      }

      return toSubscriber(result.Item);
    } catch (error) {
      logger.error('Failed to get user', toError(error), { userId });
      throw new StoreReadError('getUser', { userId }, { cause: error });
    }
  }

  /**
   * IDs of the mosques a user follows
   */
  static async listFollowedMosqueIds(userId: string): Promise<string[]> {
    try {
      const items = await queryAllPages(QueryPatterns.listFollowing(userId));
      return items
        .map((item) => readString(item, 'mosqueId'))
        .filter((mosqueId): mosqueId is string => mosqueId !== undefined);
    } catch (error) {
      logger.error('Failed to list followed mosques', toError(error), { userId });
      throw new StoreReadError('listFollowing', { userId }, { cause: error });
    }
  }

  /**
   * IDs of the users following a mosque
   */
  static async listFollowerIds(mosqueId: string): Promise<string[]> {
    try {
      const items = await queryAllPages(QueryPatterns.listFollowers(mosqueId));
      return items
        .map((item) => readString(item, 'userId'))
        .filter((userId): userId is string => userId !== undefined);
    } catch (error) {
      logger.error('Failed to list mosque followers', toError(error), { mosqueId });
      throw new StoreReadError('listFollowers', { mosqueId }, { cause: error });
    }
  }
}
