/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through `deepCopy`, so stored records never alias objects
 * held by callers.
 */

import { ArtifactSlot, CacheEntry } from '../domain/artifact';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { ReleaseRecord } from '../domain/release';
import { PipelineRun } from '../domain/run';
import {
  ArtifactSlotStore,
  CacheStore,
  EventStore,
  ListOptions,
  ReleaseStore,
  RunStore,
  Store,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** structuredClone keeps Uint8Array file contents intact. */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();

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
    const updated: PipelineRun = { ...existing, ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<PipelineRun[]> {
    const items = [...this.data.values()].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return applyListOptions(items, options).map(deepCopy);
  }

  async count(): Promise<number> {
    return this.data.size;
  }
}

class MemoryArtifactSlotStore implements ArtifactSlotStore {
  /** runId -> slotId -> slot */
  private data = new Map<string, Map<string, ArtifactSlot>>();

  async create(slot: ArtifactSlot): Promise<boolean> {
    const slots = this.data.get(slot.runId) ?? new Map<string, ArtifactSlot>();
    if (slots.has(slot.slotId)) return false;
    slots.set(slot.slotId, deepCopy(slot));
    this.data.set(slot.runId, slots);
    return true;
  }

  async get(runId: string, slotId: string): Promise<ArtifactSlot | null> {
    const slot = this.data.get(runId)?.get(slotId);
    return slot ? deepCopy(slot) : null;
  }

  async listByRun(runId: string): Promise<ArtifactSlot[]> {
    return [...(this.data.get(runId)?.values() ?? [])].map(deepCopy);
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [runId, slots] of this.data) {
      for (const [slotId, slot] of slots) {
        if (new Date(slot.expiresAt).getTime() <= now.getTime()) {
          slots.delete(slotId);
          removed++;
        }
      }
      if (slots.size === 0) this.data.delete(runId);
    }
    return removed;
  }
}

class MemoryCacheStore implements CacheStore {
  private data = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.data.get(key);
    return entry ? deepCopy(entry) : null;
  }

  async findByPrefix(prefix: string): Promise<CacheEntry | null> {
    let newest: CacheEntry | null = null;
    for (const entry of this.data.values()) {
      if (!entry.key.startsWith(prefix)) continue;
      if (!newest || entry.createdAt >= newest.createdAt) newest = entry;
    }
    return newest ? deepCopy(newest) : null;
  }

  async create(entry: CacheEntry): Promise<boolean> {
    if (this.data.has(entry.key)) return false;
    this.data.set(entry.key, deepCopy(entry));
    return true;
  }
}

class MemoryReleaseStore implements ReleaseStore {
  private data = new Map<string, ReleaseRecord>();

  async upsert(release: ReleaseRecord): Promise<ReleaseRecord> {
    this.data.set(release.id, deepCopy(release));
    return deepCopy(release);
  }

  async getById(id: string): Promise<ReleaseRecord | null> {
    const release = this.data.get(id);
    return release ? deepCopy(release) : null;
  }

  async list(options?: ListOptions): Promise<ReleaseRecord[]> {
    const items = [...this.data.values()].sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    return applyListOptions(items, options).map(deepCopy);
  }

  async count(): Promise<number> {
    return this.data.size;
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];
  /** runId -> indices into data */
  private runIdIndex = new Map<string, number[]>();

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    const index = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(index);
    this.runIdIndex.set(event.runId, indices);
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: PipelineEventType[] },
  ): Promise<PipelineEvent[]> {
    const indices = this.runIdIndex.get(runId);
    if (!indices) return [];
    const eventTypes = options?.eventTypes ?? [];
    const items = indices
      .map((i) => this.data[i])
      .filter((e): e is PipelineEvent => e !== undefined)
      .filter((e) => eventTypes.length === 0 || eventTypes.includes(e.type));
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    artifacts: new MemoryArtifactSlotStore(),
    caches: new MemoryCacheStore(),
    releases: new MemoryReleaseStore(),
    events: new MemoryEventStore(),
  };
}
