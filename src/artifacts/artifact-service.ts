/**
 * Artifact store service.
 *
 * Two kinds of storage with different contracts:
 * - artifact slots: run-scoped, write-once, missing-on-read is fatal;
 * - cache entries: cross-run, advisory, every failure degrades to a miss.
 */

import { createHash } from 'crypto';
import {
  ArtifactFile,
  ArtifactSlot,
  ArtifactSlotKey,
  CacheEntry,
  formatSlotId,
} from '../domain/artifact';
import { ArtifactError, artifactExistsError, artifactNotFoundError, throwIfAborted } from '../domain/errors';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';

export interface ArtifactServiceOptions {
  /** Days a slot is kept after it is written. */
  retentionDays: number;
  now?: () => Date;
  logger?: Logger;
}

export interface FileInput {
  path: string;
  content: Uint8Array;
}

export type CacheRestoreResult =
  | { hit: 'exact'; entry: CacheEntry }
  | { hit: 'partial'; entry: CacheEntry; matchedKey: string }
  | { hit: 'miss' };

export type CacheSaveResult = 'saved' | 'exists' | 'failed';

const DAY_MS = 24 * 60 * 60 * 1000;

export function sha256Hex(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function toArtifactFile(input: FileInput): ArtifactFile {
  return {
    path: input.path,
    content: input.content,
    sizeBytes: input.content.byteLength,
    sha256: sha256Hex(input.content),
  };
}

export class ArtifactService {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private store: Store,
    private publisher: DataPlanePublisher | undefined,
    private options: ArtifactServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: 'artifacts' });
  }

  /**
   * Write a slot. A second write to the same slot in the run is rejected,
   * and nothing is written once `signal` has fired.
   */
  async put(
    runId: string,
    key: ArtifactSlotKey,
    files: FileInput[],
    producedBy: string,
    signal?: AbortSignal,
  ): Promise<ArtifactSlot> {
    const createdAt = this.now();
    const slot: ArtifactSlot = {
      runId,
      key,
      slotId: formatSlotId(key),
      producedBy,
      files: files.map(toArtifactFile),
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.options.retentionDays * DAY_MS).toISOString(),
    };

    throwIfAborted(signal);
    const created = await this.store.artifacts.create(slot);
    if (!created) {
      throw new ArtifactError({ ...artifactExistsError(slot.slotId), runId, jobId: producedBy });
    }

    this.log.info('Artifact slot written', {
      runId,
      slot: slot.slotId,
      files: slot.files.map((f) => f.path),
      producedBy,
    });
    await this.safePublish(runId, slot);
    return slot;
  }

  /** Read a slot. Absence is an error, never an empty result. */
  async get(runId: string, key: ArtifactSlotKey): Promise<ArtifactSlot> {
    const slotId = formatSlotId(key);
    const slot = await this.store.artifacts.get(runId, slotId);
    if (!slot) {
      throw new ArtifactError({ ...artifactNotFoundError(slotId), runId });
    }
    return slot;
  }

  async list(runId: string): Promise<ArtifactSlot[]> {
    return this.store.artifacts.listByRun(runId);
  }

  /**
   * Look up a cache entry by exact key, then by each restore prefix in turn.
   * Store failures are logged and reported as a miss.
   */
  async cacheRestore(key: string, restoreKeys: string[] = []): Promise<CacheRestoreResult> {
    try {
      const exact = await this.store.caches.get(key);
      if (exact) {
        this.log.info('Cache hit', { key });
        return { hit: 'exact', entry: exact };
      }
      for (const prefix of restoreKeys) {
        const partial = await this.store.caches.findByPrefix(prefix);
        if (partial) {
          this.log.info('Cache restored from prefix', { key, prefix, matchedKey: partial.key });
          return { hit: 'partial', entry: partial, matchedKey: partial.key };
        }
      }
      this.log.info('Cache miss', { key });
    } catch (err) {
      this.log.warn('Cache restore failed, continuing without cache', {
        key,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return { hit: 'miss' };
  }

  /** Save a cache entry. Existing keys are left untouched; failures never throw. */
  async cacheSave(key: string, files: FileInput[]): Promise<CacheSaveResult> {
    try {
      const artifactFiles = files.map(toArtifactFile);
      const created = await this.store.caches.create({
        key,
        files: artifactFiles,
        sizeBytes: artifactFiles.reduce((sum, f) => sum + f.sizeBytes, 0),
        createdAt: this.now().toISOString(),
      });
      if (!created) {
        this.log.debug('Cache key already present, not saving', { key });
        return 'exists';
      }
      this.log.info('Cache saved', { key, files: artifactFiles.length });
      return 'saved';
    } catch (err) {
      this.log.warn('Cache save failed', {
        key,
        error: err instanceof Error ? err.message : String(err),
      });
      return 'failed';
    }
  }

  /** Drop slots past their retention window. */
  async purgeExpired(now: Date = this.now()): Promise<number> {
    const removed = await this.store.artifacts.deleteExpired(now);
    if (removed > 0) this.log.info('Purged expired artifact slots', { removed });
    return removed;
  }

  private async safePublish(runId: string, slot: ArtifactSlot): Promise<void> {
    if (!this.publisher) return;
    try {
      await this.publisher.publishEvent(this.publisher.buildEvent(runId, 'artifact.created', {
        jobId: slot.producedBy,
        payload: {
          slot: slot.slotId,
          files: slot.files.map((f) => ({ path: f.path, sizeBytes: f.sizeBytes, sha256: f.sha256 })),
        },
      }));
    } catch (err) {
      this.log.warn('Failed to publish artifact event', {
        runId,
        slot: slot.slotId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
