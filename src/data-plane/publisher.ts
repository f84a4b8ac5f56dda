/**
 * Run-time event publisher.
 *
 * Emits versioned pipeline events, persists them as the run's history and
 * fans them out to in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import { JobInstance, PipelineRun } from '../domain/run';
import { EventSubscription, PipelineEvent, PipelineEventType } from '../domain/events';
import { Store } from '../storage/store';
import { logger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';

const log = logger.child({ component: 'publisher' });

export class DataPlanePublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<PipelineEvent> {
    return this.publishEvent(this.buildEvent(run.id, eventType, {
      pipeline: run.pipeline,
      payload: {
        status: run.status,
        trigger: run.trigger,
        error: run.error,
      },
    }));
  }

  /** Publish a job instance lifecycle event. */
  async publishJobEvent(
    run: PipelineRun,
    instance: JobInstance,
    eventType: PipelineEventType,
  ): Promise<PipelineEvent> {
    return this.publishEvent(this.buildEvent(run.id, eventType, {
      pipeline: run.pipeline,
      jobId: instance.key,
      payload: {
        status: instance.status,
        skipReason: instance.skipReason,
        matrix: instance.matrix,
        durationMs: instance.durationMs,
        error: instance.error,
      },
    }));
  }

  /** Build an event for a run with a fresh id and timestamp. */
  buildEvent(
    runId: string,
    type: PipelineEventType,
    fields: { pipeline?: string; jobId?: string; payload: Record<string, unknown> },
  ): PipelineEvent {
    return {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId,
      ...fields,
    };
  }

  /** Persist an event and deliver it to matching subscribers. */
  async publishEvent(event: PipelineEvent): Promise<PipelineEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          log.warn('Subscriber callback threw', {
            subscriptionId: sub.id,
            eventType: event.type,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes, limit: 10_000 });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
