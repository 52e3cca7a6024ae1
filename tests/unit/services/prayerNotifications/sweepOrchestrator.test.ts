import {
  PrayerNotificationSweeper,
  SweepDependencies,
} from '../../../../src/services/prayerNotifications/sweepOrchestrator';
import { TaskScheduler } from '../../../../src/services/prayerNotifications/taskScheduler';
import { deriveKey } from '../../../../src/services/prayerNotifications/dedupKey';
import type { Preference, ScheduleEntry } from '../../../../src/types/prayerNotifications';
import {
  createInMemoryStores,
  createSpyLogger,
  decodeJobBody,
  InMemoryTaskQueue,
  StoreFixture,
} from '../../../helpers/prayerNotificationFakes';

const at = (iso: string) => new Date(iso);

const TODAY = '2026-01-15';
const mosque = { mosqueId: 'mosque-1', name: 'East Street Mosque' };

const schedule: ScheduleEntry = {
  mosqueId: 'mosque-1',
  date: TODAY,
  events: {
    fajr: { primaryInstant: at('2026-01-15T06:00:00Z'), secondaryInstant: at('2026-01-15T06:30:00Z') },
    dhuhr: { primaryInstant: at('2026-01-15T12:15:00Z'), secondaryInstant: at('2026-01-15T13:00:00Z') },
  },
};

const fajrAtStart: Preference = {
  subscriberId: 'subscriber-1',
  mosqueId: 'mosque-1',
  posts: false,
  events: { fajr: { alertAtPrimary: true, alertAtSecondary: false } },
};

const dhuhrJamaatOnly: Preference = {
  subscriberId: 'subscriber-1',
  mosqueId: 'mosque-1',
  posts: false,
  events: { dhuhr: { alertAtPrimary: false, alertAtSecondary: true } },
};

const baseFixture = (preferences: Preference[]): StoreFixture => ({
  mosques: [mosque],
  schedules: [schedule],
  preferences,
  subscribers: [{ subscriberId: 'subscriber-1', pushAddress: 'test-token-1' }],
  following: { 'subscriber-1': ['mosque-1'] },
});

describe('PrayerNotificationSweeper', () => {
  let queue: InMemoryTaskQueue;
  let logger: ReturnType<typeof createSpyLogger>;
  let now: Date;

  const buildSweeper = (
    fixture: StoreFixture,
    overrides: Partial<SweepDependencies> = {}
  ): PrayerNotificationSweeper =>
    new PrayerNotificationSweeper({
      ...createInMemoryStores(fixture),
      taskScheduler: new TaskScheduler(queue, '/prayer-notifications/dispatch', logger),
      timeZone: 'Europe/London',
      logger,
      clock: () => now,
      ...overrides,
    });

  beforeEach(() => {
    queue = new InMemoryTaskQueue();
    logger = createSpyLogger();
    now = at('2026-01-15T05:00:00Z');
  });

  describe('runGlobalSweep', () => {
    it('schedules a start alert at the start instant', async () => {
      const summary = await buildSweeper(baseFixture([fajrAtStart])).runGlobalSweep();

      expect(summary.scope).toBe('global');
      expect(summary.dateKey).toBe(TODAY);
      expect(summary.scheduledCount).toBe(1);
      expect(summary.errorCount).toBe(0);

      const [job] = [...queue.jobs.values()];
      expect(job?.fireInstant).toBe(1768456800);
      expect(job?.uniqueName).toBe(
        deriveKey('test-token-1', 'mosque-1', 'fajr', 'primary', at('2026-01-15T06:00:00Z'))
      );
      expect(job && decodeJobBody(job)).toEqual({
        pushAddress: 'test-token-1',
        title: 'East Street Mosque',
        body: 'Fajr at 06:00',
        routingData: {
          type: 'prayer',
          prayer: 'fajr',
          timeType: 'primary',
          mosqueName: 'East Street Mosque',
          mosqueId: 'mosque-1',
        },
      });
    });

    it('creates nothing new when re-run later the same morning', async () => {
      const sweeper = buildSweeper(baseFixture([fajrAtStart]));
      await sweeper.runGlobalSweep();

      now = at('2026-01-15T05:30:00Z');
      const rerun = await sweeper.runGlobalSweep();

      expect(rerun.scheduledCount).toBe(0);
      expect(rerun.duplicateCount).toBe(1);
      expect(queue.jobs.size).toBe(1);
    });

    it('schedules a congregation alert 30 minutes early', async () => {
      now = at('2026-01-15T08:00:00Z');
      const summary = await buildSweeper(baseFixture([dhuhrJamaatOnly])).runGlobalSweep();

      expect(summary.scheduledCount).toBe(1);
      const [job] = [...queue.jobs.values()];
      expect(job?.fireInstant).toBe(1768480200);
      expect(job && decodeJobBody(job)).toMatchObject({ body: 'Dhuhr Jamaat in 30 mins' });
    });

    it('completes quietly when every alert time has passed', async () => {
      now = at('2026-01-15T20:00:00Z');
      const summary = await buildSweeper(
        baseFixture([
          {
            ...fajrAtStart,
            events: {
              fajr: { alertAtPrimary: true, alertAtSecondary: true },
              dhuhr: { alertAtPrimary: true, alertAtSecondary: true },
            },
          },
        ])
      ).runGlobalSweep();

      expect(queue.createCalls).toBe(0);
      expect(summary.scheduledCount).toBe(0);
      expect(summary.errorCount).toBe(0);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('skips subscribers without a push address', async () => {
      const summary = await buildSweeper({
        ...baseFixture([fajrAtStart]),
        subscribers: [{ subscriberId: 'subscriber-1', pushAddress: null }],
      }).runGlobalSweep();

      expect(queue.createCalls).toBe(0);
      expect(summary.skippedCount).toBe(1);
      expect(summary.errorCount).toBe(0);
    });

    it('skips mosques without a timetable for today and pairs without preferences', async () => {
      const summary = await buildSweeper({
        mosques: [mosque, { mosqueId: 'mosque-2', name: 'North Road Mosque' }],
        schedules: [schedule],
        preferences: [],
        subscribers: [{ subscriberId: 'subscriber-1', pushAddress: 'test-token-1' }],
      }).runGlobalSweep();

      // mosque-2 has no timetable, subscriber-1 has no settings at mosque-1
      expect(summary.skippedCount).toBe(2);
      expect(queue.createCalls).toBe(0);
    });

    it('only looks up the timetable for the current local day', async () => {
      const getForDate = jest.fn().mockResolvedValue(null);
      const stores = createInMemoryStores(baseFixture([fajrAtStart]));
      now = at('2026-06-30T23:30:00Z');

      const summary = await buildSweeper(baseFixture([fajrAtStart]), {
        schedules: { ...stores.schedules, getForDate },
      }).runGlobalSweep();

      expect(summary.dateKey).toBe('2026-07-01');
      expect(getForDate).toHaveBeenCalledWith('mosque-1', '2026-07-01');
    });

    it('keeps going after a preference read fails', async () => {
      const stores = createInMemoryStores({
        ...baseFixture([fajrAtStart, { ...fajrAtStart, subscriberId: 'subscriber-2' }]),
        subscribers: [
          { subscriberId: 'subscriber-1', pushAddress: 'test-token-1' },
          { subscriberId: 'subscriber-2', pushAddress: 'test-token-2' },
        ],
      });
      const get = jest.fn(async (subscriberId: string, mosqueId: string) => {
        if (subscriberId === 'subscriber-1') {
          throw new Error('ProvisionedThroughputExceededException');
        }
        return stores.preferences.get(subscriberId, mosqueId);
      });

      const summary = await buildSweeper({}, { ...stores, preferences: { get } }).runGlobalSweep();

      expect(summary.errorCount).toBe(1);
      expect(summary.scheduledCount).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to schedule subscriber',
        expect.any(Error),
        expect.objectContaining({ subscriberId: 'subscriber-1', mosqueId: 'mosque-1' })
      );
    });

    it('counts queue failures without stopping the sweep', async () => {
      const prefs = {
        ...fajrAtStart,
        events: {
          fajr: { alertAtPrimary: true, alertAtSecondary: false },
          dhuhr: { alertAtPrimary: true, alertAtSecondary: false },
        },
      };
      queue.failures.set(
        deriveKey('test-token-1', 'mosque-1', 'fajr', 'primary', at('2026-01-15T06:00:00Z')),
        new Error('ServiceQuotaExceededException')
      );

      const summary = await buildSweeper(baseFixture([prefs])).runGlobalSweep();

      expect(summary.failedCount).toBe(1);
      expect(summary.scheduledCount).toBe(1);
    });

    it('stops early when the mosque list cannot be read', async () => {
      const stores = createInMemoryStores(baseFixture([fajrAtStart]));
      const summary = await buildSweeper({}, {
        ...stores,
        mosques: { ...stores.mosques, listAll: jest.fn().mockRejectedValue(new Error('boom')) },
      }).runGlobalSweep();

      expect(summary.errorCount).toBe(1);
      expect(summary.completedAt).toBeInstanceOf(Date);
      expect(queue.createCalls).toBe(0);
    });

    it('stops early when the subscriber list cannot be read', async () => {
      const stores = createInMemoryStores(baseFixture([fajrAtStart]));
      const summary = await buildSweeper({}, {
        ...stores,
        subscribers: { ...stores.subscribers, listAll: jest.fn().mockRejectedValue(new Error('boom')) },
      }).runGlobalSweep();

      expect(summary.errorCount).toBe(1);
      expect(summary.scheduledCount).toBe(0);
      expect(queue.createCalls).toBe(0);
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to list subscribers, nothing scheduled',
        expect.any(Error),
        expect.objectContaining({ scope: 'global' })
      );
    });

    it('stamps start and completion with the injected clock', async () => {
      const clock = jest
        .fn<Date, []>()
        .mockReturnValueOnce(at('2026-01-15T05:00:00Z'))
        .mockReturnValueOnce(at('2026-01-15T05:00:07Z'));

      const summary = await buildSweeper(baseFixture([]), { clock }).runGlobalSweep();

      expect(summary.startedAt).toEqual(at('2026-01-15T05:00:00Z'));
      expect(summary.completedAt).toEqual(at('2026-01-15T05:00:07Z'));
    });

    it('continues with the next mosque when one timetable read fails', async () => {
      const stores = createInMemoryStores({
        ...baseFixture([fajrAtStart]),
        mosques: [{ mosqueId: 'mosque-0', name: 'Broken' }, mosque],
      });
      const getForDate = jest.fn(async (mosqueId: string, date: string) => {
        if (mosqueId === 'mosque-0') throw new Error('timeout');
        return stores.schedules.getForDate(mosqueId, date);
      });

      const summary = await buildSweeper({}, {
        ...stores,
        schedules: { getForDate },
      }).runGlobalSweep();

      expect(summary.errorCount).toBe(1);
      expect(summary.scheduledCount).toBe(1);
    });

    it('tags every log line with the run id', async () => {
      const summary = await buildSweeper(baseFixture([fajrAtStart])).runGlobalSweep();

      expect(logger.info).toHaveBeenCalledWith(
        'Prayer notification sweep completed',
        expect.objectContaining({ runId: summary.runId, scope: 'global', scheduledCount: 1 })
      );
    });
  });

  describe('runSubscriberSweep', () => {
    it('schedules the caller\'s followed mosques with the presented push address', async () => {
      const summary = await buildSweeper(baseFixture([fajrAtStart])).runSubscriberSweep(
        'subscriber-1',
        'test-token-new'
      );

      expect(summary.scope).toBe('subscriber');
      expect(summary.scheduledCount).toBe(1);
      const [job] = [...queue.jobs.values()];
      expect(job && decodeJobBody(job)).toMatchObject({ pushAddress: 'test-token-new' });
    });

    it('produces the same task as the global sweep for the same device', async () => {
      const sweeper = buildSweeper(baseFixture([fajrAtStart]));
      await sweeper.runGlobalSweep();

      const summary = await sweeper.runSubscriberSweep('subscriber-1', 'test-token-1');

      expect(summary.scheduledCount).toBe(0);
      expect(summary.duplicateCount).toBe(1);
      expect(queue.jobs.size).toBe(1);
    });

    it('does nothing for a subscriber who follows no mosques', async () => {
      const summary = await buildSweeper({ ...baseFixture([fajrAtStart]), following: {} }).runSubscriberSweep(
        'subscriber-1',
        'test-token-1'
      );

      expect(summary.scheduledCount).toBe(0);
      expect(summary.skippedCount).toBe(0);
      expect(queue.createCalls).toBe(0);
    });

    it('falls back to a generic title when the mosque record is missing', async () => {
      await buildSweeper({ ...baseFixture([fajrAtStart]), mosques: [] }).runSubscriberSweep(
        'subscriber-1',
        'test-token-1'
      );

      const [job] = [...queue.jobs.values()];
      expect(job && decodeJobBody(job)).toMatchObject({ title: 'Your Mosque' });
    });

    it('skips followed mosques without settings or timetable', async () => {
      const summary = await buildSweeper({
        ...baseFixture([{ ...fajrAtStart, mosqueId: 'mosque-2' }]),
        following: { 'subscriber-1': ['mosque-1', 'mosque-2'] },
      }).runSubscriberSweep('subscriber-1', 'test-token-1');

      // mosque-1: no settings, mosque-2: no timetable
      expect(summary.skippedCount).toBe(2);
      expect(queue.createCalls).toBe(0);
    });

    it('records an error when the following list cannot be read', async () => {
      const stores = createInMemoryStores(baseFixture([fajrAtStart]));
      const summary = await buildSweeper({}, {
        ...stores,
        subscribers: {
          ...stores.subscribers,
          listFollowedMosqueIds: jest.fn().mockRejectedValue(new Error('timeout')),
        },
      }).runSubscriberSweep('subscriber-1', 'test-token-1');

      expect(summary.errorCount).toBe(1);
      expect(queue.createCalls).toBe(0);
    });
  });
});
