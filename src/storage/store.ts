/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting pipelines, runs and run events with
 * pluggable backends. The in-memory implementation is the reference.
 */

import { RunEvent, RunEventType } from '../domain/events';
import { PipelineDefinition } from '../domain/pipeline';
import { PipelineRun } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for pipeline definitions. */
export interface PipelineStore {
  /** Insert or replace a definition by id. */
  put(pipeline: PipelineDefinition): Promise<PipelineDefinition>;
  getById(id: string): Promise<PipelineDefinition | null>;
  list(options?: ListOptions): Promise<PipelineDefinition[]>;
  /** Pipelines built from the given source repository. */
  listBySourceRepository(repository: string): Promise<PipelineDefinition[]>;
}

/** Store interface for runs. */
export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: Partial<PipelineRun>): Promise<PipelineRun | null>;
  /** Runs of a pipeline, newest run number first. */
  listByPipeline(pipelineId: string, options?: ListOptions): Promise<PipelineRun[]>;
  countByPipeline(pipelineId: string): Promise<number>;
  /** Pending or running runs, optionally of one pipeline. */
  listActive(pipelineId?: string): Promise<PipelineRun[]>;
  /** Reserve the next run number of a pipeline (1, 2, 3, ...). */
  nextRunNumber(pipelineId: string): Promise<number>;
}

/** Store interface for run events. */
export interface EventStore {
  create(event: RunEvent): Promise<RunEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: RunEventType[] }): Promise<RunEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  pipelines: PipelineStore;
  runs: RunStore;
  events: EventStore;
}
