/**
 * Post notification fan-out
 *
 * When a mosque publishes a post, every follower who opted into post
 * notifications for that mosque and has a push token gets one push.
 */
import { toError } from '../../lib/errors';
import { NOTIFICATION_CONFIG } from '../../lib/config/notifications';
import type { ServiceLogger } from '../../lib/logger';
import type { PostRecord } from '../../types/schemas';
import type { PreferenceStore, Subscriber } from '../../types/prayerNotifications';
import type { MulticastResult } from '../push/pushSender';

export interface PostNotificationDependencies {
  listFollowerIds(mosqueId: string): Promise<string[]>;
  getSubscriber(subscriberId: string): Promise<Subscriber | null>;
  preferences: PreferenceStore;
  sendPushToMany(
    pushAddresses: string[],
    message: { title: string; body: string; routingData?: Record<string, string> }
  ): Promise<MulticastResult>;
  logger: ServiceLogger;
}

export interface PostNotificationResult {
  postId: string;
  recipientCount: number;
  successCount: number;
  failureCount: number;
}

export function buildPostMessage(post: PostRecord): { title: string; body: string } {
  const mosqueName = post.mosqueName?.trim() || NOTIFICATION_CONFIG.fallbackMosqueName;
  const message = post.message?.trim();
  return {
    title: `${mosqueName} posted`,
    body: message || 'New announcement',
  };
}

/**
 * Collect opted-in follower tokens for a new post and send one multicast
 */
export async function notifyFollowersOfPost(
  post: PostRecord,
  deps: PostNotificationDependencies
): Promise<PostNotificationResult> {
  const result: PostNotificationResult = {
    postId: post.postId,
    recipientCount: 0,
    successCount: 0,
    failureCount: 0,
  };

  const followerIds = await deps.listFollowerIds(post.mosqueId);
  const tokens = new Set<string>();

  for (const subscriberId of followerIds) {
    try {
      const [subscriber, preference] = await Promise.all([
        deps.getSubscriber(subscriberId),
        deps.preferences.get(subscriberId, post.mosqueId),
      ]);

      if (preference?.posts === true && subscriber?.pushAddress) {
        tokens.add(subscriber.pushAddress);
      }
    } catch (error) {
      deps.logger.error('Failed to load follower for post notification', toError(error), {
        subscriberId,
        mosqueId: post.mosqueId,
      });
    }
  }

  if (tokens.size === 0) {
    deps.logger.info('No tokens found, skipping notification', { postId: post.postId });
    return result;
  }

  const { title, body } = buildPostMessage(post);
  const sent = await deps.sendPushToMany([...tokens], {
    title,
    body,
    routingData: { type: 'post', postId: post.postId, mosqueId: post.mosqueId },
  });

  result.recipientCount = tokens.size;
  result.successCount = sent.successCount;
  result.failureCount = sent.failureCount;
  deps.logger.info('Post notification sent', { ...result });
  return result;
}
