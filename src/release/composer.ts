/**
 * Release composer.
 *
 * Builds a ReleaseRecord from artifact slots written earlier in the run.
 * Every declared artifact is resolved before anything is written, so a
 * missing file never leaves a partial release behind. Composing under an
 * existing identifier replaces the record.
 */

import { ArtifactFile, ArtifactSlotKey, fileBaseName, formatSlotId } from '../domain/artifact';
import {
  ArtifactError,
  ReleaseError,
  VersionError,
  createTypedError,
  throwIfAborted,
} from '../domain/errors';
import { ReleaseAsset, ReleaseRecord } from '../domain/release';
import { DataPlanePublisher } from '../data-plane/publisher';
import { ArtifactService } from '../artifacts/artifact-service';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { deriveVersionTag, tagNameFromRef } from './version';

/** A file expected inside a slot. */
export interface ReleaseArtifactRef {
  slot: ArtifactSlotKey;
  /** File name the slot must contain. */
  file: string;
}

export interface ComposeRequest {
  runId: string;
  id: string;
  title: string;
  draft: boolean;
  prerelease: boolean;
  commit: string;
  artifacts: ReleaseArtifactRef[];
  jobId?: string;
  /** Nothing is written once this fires. */
  signal?: AbortSignal;
}

export const DEVELOPMENT_RELEASE_ID = 'latest';
export const DEVELOPMENT_RELEASE_TITLE = 'Development Build';

export class ReleaseComposer {
  private log: Logger;

  constructor(
    private store: Store,
    private artifacts: ArtifactService,
    private publisher?: DataPlanePublisher,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: 'release-composer' });
  }

  async compose(request: ComposeRequest): Promise<ReleaseRecord> {
    const assets: ReleaseAsset[] = [];
    for (const ref of request.artifacts) {
      assets.push(await this.resolve(request, ref));
    }

    throwIfAborted(request.signal);
    const now = new Date().toISOString();
    const existing = await this.store.releases.getById(request.id);
    const record: ReleaseRecord = {
      id: request.id,
      title: request.title,
      draft: request.draft,
      prerelease: request.prerelease,
      commit: request.commit,
      assets,
      runId: request.runId,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.store.releases.upsert(record);

    this.log.info(existing ? 'Release replaced' : 'Release created', {
      runId: request.runId,
      release: record.id,
      assets: assets.map((a) => a.name),
    });
    await this.safePublish(request, record, existing !== null);
    return record;
  }

  /**
   * Draft release for a pushed version tag. The identifier comes from the
   * manifest; a pushed tag that disagrees with it fails the composition.
   */
  async composeTagRelease(params: {
    runId: string;
    ref: string;
    commit: string;
    manifest: string;
    artifacts: ReleaseArtifactRef[];
    jobId?: string;
    signal?: AbortSignal;
  }): Promise<ReleaseRecord> {
    const version = deriveVersionTag(params.manifest);
    const [id] = version.tags;
    const pushed = tagNameFromRef(params.ref);
    if (pushed !== id) {
      throw new VersionError(createTypedError({
        code: 'VERSION.TAG_MISMATCH',
        message: `Pushed ref "${params.ref}" does not match manifest version ${version.version}`,
        jobId: params.jobId,
        runId: params.runId,
        details: { ref: params.ref, expected: id },
      }));
    }
    return this.compose({
      runId: params.runId,
      id,
      title: id,
      draft: true,
      prerelease: false,
      commit: params.commit,
      artifacts: params.artifacts,
      jobId: params.jobId,
      signal: params.signal,
    });
  }

  /** Rolling prerelease republished on every push to the main line. */
  async composeDevelopmentBuild(params: {
    runId: string;
    commit: string;
    artifacts: ReleaseArtifactRef[];
    jobId?: string;
    signal?: AbortSignal;
  }): Promise<ReleaseRecord> {
    return this.compose({
      runId: params.runId,
      id: DEVELOPMENT_RELEASE_ID,
      title: DEVELOPMENT_RELEASE_TITLE,
      draft: false,
      prerelease: true,
      commit: params.commit,
      artifacts: params.artifacts,
      jobId: params.jobId,
      signal: params.signal,
    });
  }

  async get(id: string): Promise<ReleaseRecord | null> {
    return this.store.releases.getById(id);
  }

  private async resolve(request: ComposeRequest, ref: ReleaseArtifactRef): Promise<ReleaseAsset> {
    const slotId = formatSlotId(ref.slot);
    let files: ArtifactFile[];
    try {
      files = (await this.artifacts.get(request.runId, ref.slot)).files;
    } catch (err) {
      if (err instanceof ArtifactError && err.code === 'ARTIFACT.NOT_FOUND') {
        throw missingArtifact(request, slotId, ref.file);
      }
      throw err;
    }

    const file = files.find((f) => fileBaseName(f.path) === ref.file);
    if (!file) {
      throw missingArtifact(request, slotId, ref.file);
    }
    return { name: ref.file, sizeBytes: file.sizeBytes, sha256: file.sha256, sourceSlot: slotId };
  }

  private async safePublish(request: ComposeRequest, record: ReleaseRecord, replaced: boolean): Promise<void> {
    if (!this.publisher) return;
    try {
      await this.publisher.publishEvent(this.publisher.buildEvent(request.runId, 'release.published', {
        jobId: request.jobId,
        payload: { release: record.id, draft: record.draft, prerelease: record.prerelease, replaced, assets: record.assets },
      }));
    } catch (err) {
      this.log.warn('Failed to publish release event', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}

function missingArtifact(request: ComposeRequest, slot: string, file: string): ReleaseError {
  return new ReleaseError(createTypedError({
    code: 'RELEASE.MISSING_ARTIFACT',
    message: `Release "${request.id}" requires ${file} from slot ${slot}, which does not exist`,
    runId: request.runId,
    jobId: request.jobId,
    details: { release: request.id, slot, file },
  }));
}
