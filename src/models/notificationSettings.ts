import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { StoreReadError, toError } from '../lib/errors';
import { KeyBuilder } from '../types/entities';
import { toPreference } from '../types/schemas';
import type { Preference } from '../types/prayerNotifications';

/**
 * Notification Settings Model
 * Per-user, per-mosque toggles for post and prayer notifications
 */
export class NotificationSettingsModel {
  static async get(userId: string, mosqueId: string): Promise<Preference | null> {
    try {
      const keys = KeyBuilder.notificationSettings(userId, mosqueId);
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: keys,
        })
      );

      if (!result.Item) {
        return null;
      }

      return toPreference({ userId, mosqueId, ...result.Item });
    } catch (error) {
      logger.error('Failed to get notification settings', toError(error), { userId, mosqueId });
      throw new StoreReadError('getNotificationSettings', { userId, mosqueId }, { cause: error });
    }
  }
}
