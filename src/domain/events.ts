/**
 * Run event model.
 *
 * Events are emitted for every run and stage transition with a stable,
 * versioned schema so an external collector can consume them.
 */

export const RUN_EVENT_TYPES = [
  'run.created',
  'run.started',
  'run.succeeded',
  'run.failed',
  'run.aborted',
  'stage.started',
  'stage.phase',
  'stage.retrying',
  'stage.succeeded',
  'stage.failed',
  'stage.aborted',
  'stage.skipped',
  'artifact.built',
  'artifact.published',
  'deployment.triggered',
] as const;

export type RunEventType = (typeof RUN_EVENT_TYPES)[number];

export function isRunEventType(value: string): value is RunEventType {
  return RUN_EVENT_TYPES.some((t) => t === value);
}

export const EVENT_SCHEMA_VERSION = '1.0.0';

export interface RunEvent {
  id: string;
  type: RunEventType;
  schemaVersion: string;
  timestamp: string;
  pipelineId: string;
  runId: string;
  runNumber: number;
  stageName?: string;
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Only events of this pipeline; all pipelines when absent. */
  pipelineId?: string;
  eventTypes?: RunEventType[];
  callback: (event: RunEvent) => void;
}
