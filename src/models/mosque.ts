import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName, queryAllPages } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { StoreReadError, toError } from '../lib/errors';
import { KeyBuilder, QueryPatterns } from '../types/entities';
import { mapValidItems, toMosque } from '../types/schemas';
import type { Mosque } from '../types/prayerNotifications';

/**
 * Mosque Model
 * Read access to mosque profiles
 */
export class MosqueModel {
  /**
   * List every mosque
   */
  static async listAll(): Promise<Mosque[]> {
    try {
      const items = await queryAllPages(QueryPatterns.listMosques());
      return mapValidItems(items, toMosque, (item, error) => {
        logger.warn('Skipping malformed mosque item', {
          pk: item['PK'],
          issues: error.issues.map((issue) => issue.message),
        });
      });
    } catch (error) {
      logger.error('Failed to list mosques', toError(error));
      throw new StoreReadError('listMosques', {}, { cause: error });
    }
  }

  /**
   * Get mosque by ID
   */
  static async getById(mosqueId: string): Promise<Mosque | null> {
    try {
      const keys = KeyBuilder.mosque(mosqueId);
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: { PK: keys.PK, SK: keys.SK },
        })
      );

      if (!result.Item) {
        return null;
      }

      return toMosque(result.Item);
    } catch (error) {
      logger.error('Failed to get mosque', toError(error), { mosqueId });
      throw new StoreReadError('getMosque', { mosqueId }, { cause: error });
    }
  }
}
