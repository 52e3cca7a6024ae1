import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { StoreReadError, toError } from '../lib/errors';
import { KeyBuilder } from '../types/entities';
import { toScheduleEntry } from '../types/schemas';
import type { ScheduleEntry } from '../types/prayerNotifications';

/**
 * Prayer Times Model
 * One item per mosque per calendar day, published by mosque admins
 */
export class PrayerTimesModel {
  /**
   * Get a mosque's timetable for a day; null when nothing is published
   */
  static async getForDate(mosqueId: string, date: string): Promise<ScheduleEntry | null> {
    try {
      const keys = KeyBuilder.prayerTimes(mosqueId, date);
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: keys,
        })
      );

      if (!result.Item) {
        return null;
      }

      return toScheduleEntry({ mosqueId, date, ...result.Item });
    } catch (error) {
      logger.error('Failed to get prayer times', toError(error), { mosqueId, date });
      throw new StoreReadError('getPrayerTimes', { mosqueId, date }, { cause: error });
    }
  }
}
