/**
 * Entity Type Definitions - Prayer Alerts Backend
 *
 * Stored items follow the DynamoDB single-table design. Mosque profiles,
 * timetables, users and their settings are written by the app; this service
 * only reads them.
 */

/**
 * Base entity with common attributes
 */
export interface BaseEntity {
  PK: string;
  SK: string;
  entityType: EntityType;
  createdAt?: string; // ISO 8601
  updatedAt?: string; // ISO 8601
}

export type EntityType =
  | 'Mosque'
  | 'PrayerTimes'
  | 'User'
  | 'Following'
  | 'NotificationSettings'
  | 'Post';

/**
 * Which of a prayer's two published instants an alert is tied to
 */
export type AlertKind = 'primary' | 'secondary';

export interface MosqueItem extends BaseEntity {
  entityType: 'Mosque';
  mosqueId: string;
  name?: string;
}

/**
 * One prayer's published times, ISO 8601 instants
 */
export interface StoredPrayerTime {
  start?: string;
  jamaat?: string;
}

export interface PrayerTimesItem extends BaseEntity {
  entityType: 'PrayerTimes';
  mosqueId: string;
  date: string; // yyyy-MM-dd in the operating timezone
  prayers: Record<string, StoredPrayerTime>;
  jummah?: string[];
}

export interface UserItem extends BaseEntity {
  entityType: 'User';
  userId: string;
  fcmToken?: string | null;
}

export interface FollowingItem extends BaseEntity {
  entityType: 'Following';
  userId: string;
  mosqueId: string;
}

export interface StoredPrayerNotification {
  start?: boolean;
  jamaat?: boolean;
}

export interface NotificationSettingsItem extends BaseEntity {
  entityType: 'NotificationSettings';
  userId: string;
  mosqueId: string;
  posts?: boolean;
  prayerNotifications?: Record<string, StoredPrayerNotification>;
}

export interface PostItem extends BaseEntity {
  entityType: 'Post';
  postId: string;
  mosqueId: string;
  mosqueName?: string;
  message?: string;
}

/**
 * DynamoDB key builders
 */
export const KeyBuilder = {
  mosque: (mosqueId: string) => ({
    PK: `MOSQUE#${mosqueId}`,
    SK: `MOSQUE#${mosqueId}`,
    GSI2PK: 'MOSQUES',
    GSI2SK: `MOSQUE#${mosqueId}`,
  }),

  prayerTimes: (mosqueId: string, date: string) => ({
    PK: `MOSQUE#${mosqueId}`,
    SK: `PRAYER_TIMES#${date}`,
  }),

  user: (userId: string) => ({
    PK: `USER#${userId}`,
    SK: `USER#${userId}`,
    GSI2PK: 'USERS',
    GSI2SK: `USER#${userId}`,
  }),

  following: (userId: string, mosqueId: string) => ({
    PK: `USER#${userId}`,
    SK: `FOLLOWING#${mosqueId}`,
    GSI1PK: `MOSQUE#${mosqueId}#FOLLOWERS`,
    GSI1SK: `USER#${userId}`,
  }),

  notificationSettings: (userId: string, mosqueId: string) => ({
    PK: `USER#${userId}`,
    SK: `NOTIFICATION_SETTINGS#${mosqueId}`,
  }),

  post: (mosqueId: string, postId: string) => ({
    PK: `MOSQUE#${mosqueId}`,
    SK: `POST#${postId}`,
  }),
};

/**
 * Query patterns for common access patterns
 */
export const QueryPatterns = {
  // Every mosque, via the entity listing index
  listMosques: () => ({
    IndexName: 'GSI2',
    KeyConditionExpression: 'GSI2PK = :gsi2pk',
    ExpressionAttributeValues: {
      ':gsi2pk': 'MOSQUES',
    },
  }),

  // Every user, via the entity listing index
  listUsers: () => ({
    IndexName: 'GSI2',
    KeyConditionExpression: 'GSI2PK = :gsi2pk',
    ExpressionAttributeValues: {
      ':gsi2pk': 'USERS',
    },
  }),

  // Mosques a user follows
  listFollowing: (userId: string) => ({
    KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
    ExpressionAttributeValues: {
      ':pk': `USER#${userId}`,
      ':sk': 'FOLLOWING#',
    },
  }),

  // Users following a mosque, via GSI1
  listFollowers: (mosqueId: string) => ({
    IndexName: 'GSI1',
    KeyConditionExpression: 'GSI1PK = :gsi1pk',
    ExpressionAttributeValues: {
      ':gsi1pk': `MOSQUE#${mosqueId}#FOLLOWERS`,
    },
  }),
};
