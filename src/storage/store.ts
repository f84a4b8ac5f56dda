/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 * Implementations must return copies: callers may mutate what they get
 * back without affecting stored state.
 */

import { ArtifactSlot, CacheEntry } from '../domain/artifact';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { ReleaseRecord } from '../domain/release';
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

export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: Partial<PipelineRun>): Promise<PipelineRun | null>;
  list(options?: ListOptions): Promise<PipelineRun[]>;
  count(): Promise<number>;
}

/**
 * Store interface for artifact slots.
 * `create` must reject a second write to the same (runId, slotId).
 */
export interface ArtifactSlotStore {
  /** Returns false when the slot is already taken. */
  create(slot: ArtifactSlot): Promise<boolean>;
  get(runId: string, slotId: string): Promise<ArtifactSlot | null>;
  listByRun(runId: string): Promise<ArtifactSlot[]>;
  /** Delete slots whose retention ended before `now`. Returns how many were removed. */
  deleteExpired(now: Date): Promise<number>;
}

export interface CacheStore {
  get(key: string): Promise<CacheEntry | null>;
  /** Most recently created entry whose key starts with `prefix`. */
  findByPrefix(prefix: string): Promise<CacheEntry | null>;
  /** Returns false when the key already exists. Entries are never overwritten. */
  create(entry: CacheEntry): Promise<boolean>;
}

/** Releases are keyed by their id (tag name or rolling identifier). */
export interface ReleaseStore {
  upsert(release: ReleaseRecord): Promise<ReleaseRecord>;
  getById(id: string): Promise<ReleaseRecord | null>;
  list(options?: ListOptions): Promise<ReleaseRecord[]>;
  count(): Promise<number>;
}

export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
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
  runs: RunStore;
  artifacts: ArtifactSlotStore;
  caches: CacheStore;
  releases: ReleaseStore;
  events: EventStore;
}
