/**
 * Run event publisher.
 *
 * Emits stable, versioned run and stage events, persists them as the run's
 * history and fans them out to in-process subscribers. A subscriber that
 * throws is logged and skipped; it never blocks delivery to the others.
 */

import { v4 as uuid } from 'uuid';
import { EVENT_SCHEMA_VERSION, EventSubscription, RunEvent, RunEventType } from '../domain/events';
import { PipelineRun } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { EventStore, ListOptions } from '../storage/store';

export class RunEventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(
    private readonly events: EventStore,
    private readonly log: Logger = rootLogger.child({ module: 'events' }),
  ) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(
    run: PipelineRun,
    eventType: RunEventType,
    payload: Record<string, unknown> = {},
  ): Promise<RunEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      pipelineId: run.pipelineId,
      runId: run.id,
      runNumber: run.runNumber,
      payload: {
        status: run.status,
        commit: run.source.commit,
        branch: run.source.branch,
        durationMs: runDuration(run),
        error: run.error,
        abortReason: run.abortReason,
        ...payload,
      },
    });
  }

  /** Publish a stage lifecycle event. */
  async publishStageEvent(
    run: PipelineRun,
    stageName: string,
    eventType: RunEventType,
    payload: Record<string, unknown> = {},
  ): Promise<RunEvent> {
    const stage = run.stageResults.find((s) => s.name === stageName);

    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      pipelineId: run.pipelineId,
      runId: run.id,
      runNumber: run.runNumber,
      stageName,
      payload: {
        stageStatus: stage?.status,
        phase: stage?.phase,
        attempts: stage?.attempts.length,
        durationMs: stage?.durationMs,
        error: stage?.error,
        ...payload,
      },
    });
  }

  /** Persist an event and deliver it to matching subscribers. */
  async publishEvent(event: RunEvent): Promise<RunEvent> {
    await this.events.create(event);

    for (const sub of this.subscriptions) {
      if (!matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber failed', {
          subscriptionId: sub.id,
          eventType: event.type,
          runId: event.runId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: RunEventType[] },
  ): Promise<RunEvent[]> {
    return this.events.listByRun(runId, options);
  }
}

function matchesSubscription(event: RunEvent, sub: EventSubscription): boolean {
  if (sub.pipelineId && event.pipelineId !== sub.pipelineId) return false;
  if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
  return true;
}

function runDuration(run: PipelineRun): number | undefined {
  if (!run.startedAt || !run.completedAt) return undefined;
  return new Date(run.completedAt).getTime() - new Date(run.startedAt).getTime();
}
