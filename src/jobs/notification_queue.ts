import { Job, Queue, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { AppConfig } from '../config/environment';
import { TransitionEvent, TransitionNotifier } from '../domain/types';
import { logger } from '../utils/logger';
import { JobQueueError } from '../utils/errors';
import { deliverTransition, NotificationJobData, processNotificationJob, toJobData, TransitionFeed } from './notification_job';

export const TRANSITIONS_QUEUE = 'transitions';

// Publishes transition events to BullMQ when Redis is reachable and delivers
// them in-process otherwise. `publish` never throws and never blocks the caller.
export class QueueTransitionNotifier implements TransitionNotifier {
  private redis: Redis | undefined;
  private queue: Queue<NotificationJobData> | undefined;
  private worker: Worker<NotificationJobData> | undefined;
  private initialization: Promise<boolean> | undefined;

  constructor(
    private readonly config: Pick<AppConfig, 'redis' | 'notifications'>,
    readonly feed: TransitionFeed = new TransitionFeed(),
  ) {}

  publish(event: TransitionEvent): void {
    if (!this.config.notifications.enabled) {
      deliverTransition(this.feed, event);
      return;
    }
    this.enqueue(event).catch((error: unknown) => {
      logger.error('Failed to dispatch transition event', {
        error: error instanceof Error ? error.message : 'Unknown error',
        serialNumber: event.serialNumber,
      });
    });
  }

  recentTransitions(limit?: number): TransitionEvent[] {
    return this.feed.recent(limit);
  }

  async close(): Promise<void> {
    await this.initialization;
    if (this.worker) await this.worker.close();
    if (this.queue) await this.queue.close();
    if (this.redis) await this.redis.quit();
  }

  private async enqueue(event: TransitionEvent): Promise<void> {
    if (!(await this.ensureRedis()) || !this.queue) {
      deliverTransition(this.feed, event);
      return;
    }
    try {
      await this.queue.add('transition', toJobData(event), { attempts: 3, backoff: { type: 'exponential', delay: 1000 } });
    } catch (error) {
      const err = error instanceof Error ? error : new Error('Unknown error');
      // the event still reaches the feed even if Redis drops mid-flight
      deliverTransition(this.feed, event);
      throw new JobQueueError(`Failed to queue transition event: ${err.message}`, undefined, err);
    }
  }

  private async ensureRedis(): Promise<boolean> {
    if (!this.initialization) {
      this.initialization = this.initializeRedisComponents();
    }
    const pending = this.initialization;
    let ready = false;
    try {
      ready = await pending;
    } finally {
      // an unreachable Redis is tried again on the next event
      if (!ready && this.initialization === pending) {
        this.initialization = undefined;
      }
    }
    return ready;
  }

  private async initializeRedisComponents(): Promise<boolean> {
    const redis = new Redis({
      host: this.config.redis.host,
      port: this.config.redis.port,
      maxRetriesPerRequest: null, // Required for BullMQ
      enableReadyCheck: false,
      lazyConnect: true,
      retryStrategy: () => null,
    });
    try {
      await redis.ping();
    } catch (error) {
      logger.warn('Redis not available, delivering transition events in-process', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      redis.disconnect();
      return false;
    }
    logger.info('Redis connection established');
    this.redis = redis;

    this.queue = new Queue<NotificationJobData>(TRANSITIONS_QUEUE, {
      connection: redis,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 50,
      },
    });

    this.worker = new Worker<NotificationJobData>(
      TRANSITIONS_QUEUE,
      (job) => processNotificationJob(job, this.feed),
      { connection: redis },
    );

    this.worker.on('failed', (job: Job<NotificationJobData> | undefined, err: Error) => {
      logger.error(`Transition job ${job?.id ?? 'unknown'} failed`, {
        error: err.message,
        serialNumber: job?.data.serialNumber,
      });
    });

    this.worker.on('error', (err: Error) => {
      logger.error('Transition worker error', { error: err.message });
    });

    return true;
  }
}
