import { Job } from 'bullmq';
import { TransitionEvent } from '../domain/types';
import { logger } from '../utils/logger';

export const RECENT_TRANSITIONS_LIMIT = 200;

// Queue payloads are JSON, so the timestamp travels as an ISO string.
export interface NotificationJobData extends Omit<TransitionEvent, 'occurredAt'> {
  occurredAt: string;
}

export function toJobData(event: TransitionEvent): NotificationJobData {
  return { ...event, occurredAt: event.occurredAt.toISOString() };
}

export function fromJobData(data: NotificationJobData): TransitionEvent {
  return { ...data, occurredAt: new Date(data.occurredAt) };
}

// Bounded, newest-first feed of delivered transition events.
export class TransitionFeed {
  private events: TransitionEvent[] = [];

  constructor(private readonly capacity = RECENT_TRANSITIONS_LIMIT) {}

  record(event: TransitionEvent): void {
    this.events.unshift(event);
    if (this.events.length > this.capacity) {
      this.events.length = this.capacity;
    }
  }

  recent(limit = 20): TransitionEvent[] {
    return this.events.slice(0, Math.max(0, limit));
  }
}

export function deliverTransition(feed: TransitionFeed, event: TransitionEvent): void {
  feed.record(event);
  logger.debug('Transition delivered', {
    serialNumber: event.serialNumber,
    operation: event.operationName,
    status: event.status,
    actorId: event.actorId,
  });
}

export async function processNotificationJob(job: Job<NotificationJobData>, feed: TransitionFeed): Promise<void> {
  deliverTransition(feed, fromJobData(job.data));
}
