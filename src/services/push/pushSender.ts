/**
 * Push delivery through Firebase Cloud Messaging
 *
 * Push addresses are FCM registration tokens written by the mobile app.
 */
import { App, applicationDefault, cert, getApps, initializeApp } from 'firebase-admin/app';
import { getMessaging } from 'firebase-admin/messaging';
import { z } from 'zod';
import { PushDispatchError, toError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { PushPayload } from '../../types/prayerNotifications';

export interface MulticastResult {
  successCount: number;
  failureCount: number;
}

/**
 * FCM caps multicast sends at 500 tokens per call
 */
export const MULTICAST_BATCH_SIZE = 500;

const serviceAccountSchema = z
  .object({
    project_id: z.string(),
    client_email: z.string(),
    private_key: z.string(),
  })
  .transform((account) => ({
    projectId: account.project_id,
    clientEmail: account.client_email,
    privateKey: account.private_key,
  }));

const getFirebaseApp = (): App => {
  const existing = getApps()[0];
  if (existing) {
    return existing;
  }

  const serviceAccount = process.env['FIREBASE_SERVICE_ACCOUNT'];
  const credential = serviceAccount
    ? cert(serviceAccountSchema.parse(JSON.parse(serviceAccount)))
    : applicationDefault();

  return initializeApp({ credential });
};

/**
 * Send one push message; rejects with PushDispatchError on failure
 */
export async function sendPush(payload: PushPayload): Promise<string> {
  try {
    return await getMessaging(getFirebaseApp()).send({
      token: payload.pushAddress,
      notification: { title: payload.title, body: payload.body },
      data: payload.routingData,
    });
  } catch (error) {
    throw new PushDispatchError('Push send failed', { cause: error });
  }
}

/**
 * Send the same message to many devices. A batch the gateway rejects
 * outright counts every token in it as failed; later batches still go out.
 */
export async function sendPushToMany(
  pushAddresses: string[],
  message: { title: string; body: string; routingData?: Record<string, string> }
): Promise<MulticastResult> {
  const result: MulticastResult = { successCount: 0, failureCount: 0 };
  const messaging = getMessaging(getFirebaseApp());

  for (let i = 0; i < pushAddresses.length; i += MULTICAST_BATCH_SIZE) {
    const tokens = pushAddresses.slice(i, i + MULTICAST_BATCH_SIZE);
    try {
      const response = await messaging.sendEachForMulticast({
        tokens,
        notification: { title: message.title, body: message.body },
        data: message.routingData,
      });
      result.successCount += response.successCount;
      result.failureCount += response.failureCount;
    } catch (error) {
      logger.error('Multicast batch failed', toError(error), {
        batchStart: i,
        batchSize: tokens.length,
      });
      result.failureCount += tokens.length;
    }
  }

  return result;
}

export default { sendPush, sendPushToMany };
