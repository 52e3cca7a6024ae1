/**
 * EventBridge Scheduler queue - Prayer Alerts Backend
 *
 * Delayed dispatch jobs become one-time `at(...)` schedules that invoke the
 * dispatch Lambda with an API Gateway shaped event. Schedule names are unique
 * per group, which is the at-most-once guarantee the scheduler relies on.
 */

import { createHash } from 'crypto';
import {
  ConflictException,
  CreateScheduleCommand,
  CreateScheduleCommandInput,
  SchedulerClient,
} from '@aws-sdk/client-scheduler';
import { TaskAlreadyExistsError } from './errors';
import type { SchedulerConfig } from './config/notifications';
import type { QueueJob, TaskQueue } from '../types/prayerNotifications';

const SCHEDULE_NAME_PREFIX = 'prayer-';
const SCHEDULE_NAME_MAX_LENGTH = 64;
const DESCRIPTION_MAX_LENGTH = 512;

/**
 * Map a dedup key onto EventBridge's schedule name rules ([0-9a-zA-Z-_.], max 64)
 */
export const toScheduleName = (uniqueName: string): string => {
  const digest = createHash('sha256').update(uniqueName).digest('hex');
  return `${SCHEDULE_NAME_PREFIX}${digest.slice(0, SCHEDULE_NAME_MAX_LENGTH - SCHEDULE_NAME_PREFIX.length)}`;
};

/**
 * `at()` expression in UTC for an epoch-seconds fire instant
 */
export const toAtExpression = (epochSeconds: number): string =>
  `at(${new Date(epochSeconds * 1000).toISOString().slice(0, 19)})`;

const toPath = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
};

/**
 * Lambda event the dispatch handler receives when the schedule fires
 */
export const toDispatchEvent = (job: QueueJob): Record<string, unknown> => ({
  httpMethod: job.target.method,
  path: toPath(job.target.url),
  headers: job.target.headers,
  body: job.target.body,
  isBase64Encoded: true,
  pathParameters: null,
  queryStringParameters: null,
  requestContext: { scheduledTaskName: job.uniqueName },
});

export const isConflictError = (error: unknown): boolean =>
  error instanceof ConflictException ||
  (error instanceof Error && error.name === 'ConflictException');

/**
 * The part of SchedulerClient the queue uses
 */
export interface SchedulerSender {
  send(command: CreateScheduleCommand): Promise<unknown>;
}

export class EventBridgeTaskQueue implements TaskQueue {
  constructor(
    private readonly client: SchedulerSender,
    private readonly config: SchedulerConfig
  ) {}

  buildCreateScheduleInput(job: QueueJob): CreateScheduleCommandInput {
    return {
      Name: toScheduleName(job.uniqueName),
      GroupName: this.config.groupName,
      Description: job.uniqueName.slice(0, DESCRIPTION_MAX_LENGTH),
      ScheduleExpression: toAtExpression(job.fireInstant),
      ScheduleExpressionTimezone: 'UTC',
      FlexibleTimeWindow: { Mode: 'OFF' },
      ActionAfterCompletion: 'DELETE',
      Target: {
        Arn: this.config.targetArn,
        RoleArn: this.config.roleArn,
        Input: JSON.stringify(toDispatchEvent(job)),
      },
    };
  }

  async createJob(job: QueueJob): Promise<void> {
    try {
      await this.client.send(new CreateScheduleCommand(this.buildCreateScheduleInput(job)));
    } catch (error) {
      if (isConflictError(error)) {
        throw new TaskAlreadyExistsError(job.uniqueName, { cause: error });
      }
      throw error;
    }
  }
}

let schedulerClient: SchedulerClient | undefined;

/**
 * Scheduler client singleton - reused across Lambda invocations
 */
export const getSchedulerClient = (): SchedulerClient => {
  if (!schedulerClient) {
    schedulerClient = new SchedulerClient({
      region: process.env['AWS_REGION'] || 'eu-west-2',
      maxAttempts: 3,
    });
  }
  return schedulerClient;
};
