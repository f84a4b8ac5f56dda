/**
 * Tag synchronizer.
 *
 * Moves vX.Y.Z, vX.Y and vX to the released commit. Assumes a single
 * writer per release commit; concurrent runs on the same commit may race
 * on the force-push.
 */

import { throwIfAborted } from '../domain/errors';
import { VersionTag } from '../domain/release';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { GitClient } from './git';
import { deriveVersionTag } from './version';

export interface TagSyncResult {
  version: VersionTag;
  commit: string;
  /** False when the remote already had every tag at `commit`. */
  pushed: boolean;
  /** Tags that were moved or created. */
  updated: string[];
}

export interface TagSyncRequest {
  /** Manifest text read from the job workspace. */
  manifest: string;
  git: GitClient;
  runId?: string;
  jobId?: string;
  /** No tag is moved or pushed once this fires. */
  signal?: AbortSignal;
}

export class TagSynchronizer {
  private log: Logger;

  constructor(
    private publisher?: DataPlanePublisher,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: 'tag-sync' });
  }

  async sync(request: TagSyncRequest): Promise<TagSyncResult> {
    const version = deriveVersionTag(request.manifest);
    const commit = await request.git.headCommit();
    const remote = await request.git.remoteTagCommits(version.tags);

    const updated = version.tags.filter((tag) => remote[tag] !== commit);
    if (updated.length === 0) {
      this.log.info('Version tags already up to date', { version: version.version, commit });
      return { version, commit, pushed: false, updated };
    }

    throwIfAborted(request.signal);
    for (const tag of version.tags) {
      await request.git.forceTag(tag, commit);
      this.log.info('Tag force-updated', { tag, commit, previous: remote[tag] ?? null });
    }
    throwIfAborted(request.signal);
    await request.git.forcePush(version.tags);
    this.log.info('Version tags pushed', { tags: version.tags, commit });

    const result = { version, commit, pushed: true, updated };
    await this.safePublish(request, result);
    return result;
  }

  private async safePublish(request: TagSyncRequest, result: TagSyncResult): Promise<void> {
    if (!this.publisher || !request.runId) return;
    try {
      await this.publisher.publishEvent(this.publisher.buildEvent(request.runId, 'tags.synced', {
        jobId: request.jobId,
        payload: { version: result.version.version, commit: result.commit, tags: result.version.tags, updated: result.updated },
      }));
    } catch (err) {
      this.log.warn('Failed to publish tag event', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
