/**
 * Prayer notification domain types
 *
 * Read-side records the scheduler works with, the seams it depends on and the
 * shapes it hands to the delayed task queue.
 */

import type { AlertKind } from './entities';

export type { AlertKind };

export interface EventInstants {
  primaryInstant?: Date;
  secondaryInstant?: Date;
}

/**
 * A mosque's published prayer times for one calendar day
 */
export interface ScheduleEntry {
  mosqueId: string;
  date: string;
  events: Record<string, EventInstants>;
}

export interface EventPreference {
  alertAtPrimary: boolean;
  alertAtSecondary: boolean;
}

/**
 * A subscriber's notification settings for one mosque
 */
export interface Preference {
  subscriberId: string;
  mosqueId: string;
  posts: boolean;
  events: Record<string, EventPreference>;
}

export interface Subscriber {
  subscriberId: string;
  pushAddress: string | null;
}

export interface Mosque {
  mosqueId: string;
  name: string;
}

/**
 * One delivery the resolver decided is due in the future
 */
export interface FireTime {
  eventName: string;
  alertKind: AlertKind;
  fireInstant: Date;
}

/**
 * Body the dispatch endpoint receives when a task fires
 */
export interface PushPayload {
  pushAddress: string;
  title: string;
  body: string;
  routingData?: Record<string, string>;
}

/**
 * Job handed to the delayed task queue
 */
export interface QueueJob {
  uniqueName: string;
  target: {
    method: 'POST';
    url: string;
    headers: Record<string, string>;
    /** base64-encoded JSON PushPayload */
    body: string;
  };
  /** epoch seconds */
  fireInstant: number;
}

export type SubmitOutcome =
  | { status: 'created'; key: string }
  | { status: 'already_exists'; key: string }
  | { status: 'failed'; key: string; error: Error };

// --- Collaborator seams ---------------------------------------------------

export interface MosqueCatalogue {
  listAll(): Promise<Mosque[]>;
  getById(mosqueId: string): Promise<Mosque | null>;
}

export interface ScheduleStore {
  getForDate(mosqueId: string, date: string): Promise<ScheduleEntry | null>;
}

export interface PreferenceStore {
  get(subscriberId: string, mosqueId: string): Promise<Preference | null>;
}

export interface SubscriberDirectory {
  listAll(): Promise<Subscriber[]>;
  listFollowedMosqueIds(subscriberId: string): Promise<string[]>;
}

/**
 * At-most-once delayed queue. Rejects with TaskAlreadyExistsError when a job
 * with the same unique name was created before.
 */
export interface TaskQueue {
  createJob(job: QueueJob): Promise<void>;
}
