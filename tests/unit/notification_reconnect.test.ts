import { Redis } from 'ioredis';
import { TransitionEvent } from '../../src/domain/types';
import { QueueTransitionNotifier } from '../../src/jobs/notification_queue';

jest.mock('ioredis', () => ({
  ...jest.requireActual<typeof import('ioredis')>('ioredis'),
  Redis: jest.fn().mockImplementation(() => ({
    ping: jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6390')),
    disconnect: jest.fn(),
  })),
}));

const event = (n: number): TransitionEvent => ({
  unitId: `unit-${n}`,
  serialNumber: `LB001-00${n}M`,
  recordId: `record-${n}`,
  operationId: 'op-cut',
  operationName: 'Cutting',
  status: 'IN_PROGRESS',
  actorId: 'actor-1',
  occurredAt: new Date(Date.UTC(2026, 1, 10, 9, n)),
});

const settle = () => new Promise((resolve) => setImmediate(resolve));

test('connects to Redis again after a failed attempt', async () => {
  const notifier = new QueueTransitionNotifier({
    redis: { host: '127.0.0.1', port: 6390 },
    notifications: { enabled: true },
  });

  notifier.publish(event(1));
  await settle();
  notifier.publish(event(2));
  await settle();

  expect(jest.mocked(Redis)).toHaveBeenCalledTimes(2);
  expect(notifier.recentTransitions(5).map((e) => e.recordId)).toEqual(['record-2', 'record-1']);
  await notifier.close();
});
