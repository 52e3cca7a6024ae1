import { PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { publishJobMetrics } from '../../../src/lib/monitoring/notificationMetrics';
import { createLambdaLogger } from '../../../src/lib/logger';
import type { SweepSummary } from '../../../src/services/prayerNotifications/sweepOrchestrator';

const mockCloudWatchSend = jest.fn();

jest.mock('../../../src/lib/logger');
jest.mock('@aws-sdk/client-cloudwatch', () => ({
  ...jest.requireActual('@aws-sdk/client-cloudwatch'),
  CloudWatchClient: jest.fn(() => ({
    send: (...args: unknown[]) => mockCloudWatchSend(...args),
  })),
}));

const summary: SweepSummary = {
  runId: 'run-1',
  scope: 'global',
  dateKey: '2026-01-15',
  startedAt: new Date('2026-01-15T00:30:00.000Z'),
  completedAt: new Date('2026-01-15T00:30:01.500Z'),
  scheduledCount: 4,
  duplicateCount: 2,
  failedCount: 1,
  skippedCount: 3,
  errorCount: 1,
};

describe('publishJobMetrics', () => {
  it('publishes sweep counters under the job type dimension', async () => {
    mockCloudWatchSend.mockResolvedValue({});

    await publishJobMetrics('DAILY_SWEEP', summary);

    const command: unknown = mockCloudWatchSend.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutMetricDataCommand);
    const input = command instanceof PutMetricDataCommand ? command.input : undefined;
    expect(input?.Namespace).toBe('PrayerAlerts/Notifications');
    expect(input?.MetricData?.map((m) => [m.MetricName, m.Value])).toEqual([
      ['TasksScheduled', 4],
      ['DuplicatesSkipped', 2],
      ['Skipped', 3],
      ['Errors', 2],
      ['JobDuration', 1500],
    ]);
    expect(input?.MetricData?.[0]?.Dimensions).toEqual([{ Name: 'JobType', Value: 'DAILY_SWEEP' }]);
  });

  it('logs and swallows CloudWatch failures', async () => {
    mockCloudWatchSend.mockRejectedValue(new Error('AccessDenied'));

    await expect(publishJobMetrics('MANUAL_SWEEP', summary)).resolves.toBeUndefined();
    expect(createLambdaLogger).toHaveBeenCalled();
  });
});
