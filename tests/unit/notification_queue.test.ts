import { TransitionEvent } from '../../src/domain/types';
import { fromJobData, toJobData, TransitionFeed } from '../../src/jobs/notification_job';
import { QueueTransitionNotifier } from '../../src/jobs/notification_queue';

const event = (n: number): TransitionEvent => ({
  unitId: `unit-${n}`,
  serialNumber: `LB001-${String(n).padStart(3, '0')}M`,
  recordId: `record-${n}`,
  operationId: 'op-cut',
  operationName: 'Cutting',
  status: 'APPROVED',
  actorId: 'actor-1',
  occurredAt: new Date(Date.UTC(2026, 1, 10, 9, n)),
});

describe('TransitionFeed', () => {
  test('returns newest events first', () => {
    const feed = new TransitionFeed();
    feed.record(event(1));
    feed.record(event(2));
    feed.record(event(3));

    expect(feed.recent(2).map((e) => e.recordId)).toEqual(['record-3', 'record-2']);
  });

  test('drops the oldest events beyond its capacity', () => {
    const feed = new TransitionFeed(3);
    for (let n = 1; n <= 5; n++) feed.record(event(n));

    expect(feed.recent(10).map((e) => e.recordId)).toEqual(['record-5', 'record-4', 'record-3']);
  });
});

test('job payloads carry the timestamp as an ISO string', () => {
  const data = toJobData(event(4));
  expect(data.occurredAt).toBe('2026-02-10T09:04:00.000Z');
  expect(fromJobData(data)).toEqual(event(4));
});

test('delivers in-process when queueing is disabled', async () => {
  const notifier = new QueueTransitionNotifier({
    redis: { host: 'localhost', port: 6379 },
    notifications: { enabled: false },
  });

  notifier.publish(event(1));
  notifier.publish(event(2));

  expect(notifier.recentTransitions(5).map((e) => e.serialNumber)).toEqual(['LB001-002M', 'LB001-001M']);
  await notifier.close();
});
