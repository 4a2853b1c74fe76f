/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every value is
 * deep-copied on the way in and on the way out, so callers never hold a
 * reference into the store's own state.
 */

import { RunEvent, RunEventType } from '../domain/events';
import { PipelineDefinition } from '../domain/pipeline';
import { PipelineRun, RunStatus } from '../domain/run';
import { EventStore, ListOptions, PipelineStore, RunStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryPipelineStore implements PipelineStore {
  private data = new Map<string, PipelineDefinition>();

  async put(pipeline: PipelineDefinition): Promise<PipelineDefinition> {
    this.data.set(pipeline.id, deepCopy(pipeline));
    return deepCopy(pipeline);
  }

  async getById(id: string): Promise<PipelineDefinition | null> {
    const pipeline = this.data.get(id);
    return pipeline ? deepCopy(pipeline) : null;
  }

  async list(options?: ListOptions): Promise<PipelineDefinition[]> {
    return applyListOptions([...this.data.values()].map(deepCopy), options);
  }

  async listBySourceRepository(repository: string): Promise<PipelineDefinition[]> {
    return [...this.data.values()].filter((p) => p.sourceRepository === repository).map(deepCopy);
  }
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();
  private runNumbers = new Map<string, number>();

  async create(run: PipelineRun): Promise<PipelineRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByPipeline(pipelineId: string, options?: ListOptions): Promise<PipelineRun[]> {
    const items = [...this.data.values()]
      .filter((r) => r.pipelineId === pipelineId)
      .sort((a, b) => b.runNumber - a.runNumber);
    return applyListOptions(items.map(deepCopy), options);
  }

  async countByPipeline(pipelineId: string): Promise<number> {
    return [...this.data.values()].filter((r) => r.pipelineId === pipelineId).length;
  }

  async listActive(pipelineId?: string): Promise<PipelineRun[]> {
    return [...this.data.values()]
      .filter((r) => r.status === RunStatus.Pending || r.status === RunStatus.Running)
      .filter((r) => pipelineId === undefined || r.pipelineId === pipelineId)
      .sort((a, b) => a.runNumber - b.runNumber)
      .map(deepCopy);
  }

  async nextRunNumber(pipelineId: string): Promise<number> {
    const next = (this.runNumbers.get(pipelineId) ?? 0) + 1;
    this.runNumbers.set(pipelineId, next);
    return next;
  }
}

/**
 * Events are append-only; a per-run index keeps listByRun from scanning
 * the whole log.
 */
class MemoryEventStore implements EventStore {
  private data: RunEvent[] = [];
  private runIdIndex = new Map<string, number[]>();

  async create(event: RunEvent): Promise<RunEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(idx);
    this.runIdIndex.set(event.runId, indices);
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: RunEventType[] },
  ): Promise<RunEvent[]> {
    const indices = this.runIdIndex.get(runId);
    if (!indices) return [];
    let items = indices.map((i) => this.data[i]);
    const eventTypes = options?.eventTypes;
    if (eventTypes && eventTypes.length > 0) {
      items = items.filter((e) => eventTypes.includes(e.type));
    }
    return applyListOptions(items.map(deepCopy), { limit: options?.limit ?? 1000, offset: options?.offset });
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    pipelines: new MemoryPipelineStore(),
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
  };
}
