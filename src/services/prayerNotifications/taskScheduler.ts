/**
 * Task submission
 *
 * Wraps the delayed task queue: builds the job for a dedup key and folds the
 * queue's answer into a SubmitOutcome. Nothing here throws.
 */
import { TaskAlreadyExistsError, toError } from '../../lib/errors';
import { toEpochSeconds } from '../../lib/time';
import type { ServiceLogger } from '../../lib/logger';
import type {
  PushPayload,
  QueueJob,
  SubmitOutcome,
  TaskQueue,
} from '../../types/prayerNotifications';

export function buildQueueJob(
  key: string,
  payload: PushPayload,
  fireInstant: Date,
  dispatchUrl: string
): QueueJob {
  return {
    uniqueName: key,
    target: {
      method: 'POST',
      url: dispatchUrl,
      headers: { 'Content-Type': 'application/json' },
      body: Buffer.from(JSON.stringify(payload)).toString('base64'),
    },
    fireInstant: toEpochSeconds(fireInstant),
  };
}

export class TaskScheduler {
  constructor(
    private readonly queue: TaskQueue,
    private readonly dispatchUrl: string,
    private readonly logger: ServiceLogger
  ) {}

  async submit(key: string, payload: PushPayload, fireInstant: Date): Promise<SubmitOutcome> {
    const job = buildQueueJob(key, payload, fireInstant, this.dispatchUrl);

    try {
      await this.queue.createJob(job);
      this.logger.info('Task scheduled', { key, fireInstant: fireInstant.toISOString() });
      return { status: 'created', key };
    } catch (error) {
      if (error instanceof TaskAlreadyExistsError) {
        this.logger.info('Task already exists, skipping', { key });
        return { status: 'already_exists', key };
      }

      const err = toError(error);
      this.logger.error('Error creating task', err, { key });
      return { status: 'failed', key, error: err };
    }
  }
}
