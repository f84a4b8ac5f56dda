/**
 * The project's entry pipeline: format and audit checks on pull requests
 * into main, matrix builds, then image publishing and the rolling
 * development build from main, tag releases and floating version tags from
 * version tags. Other branches and tags run nothing.
 */

import { PipelineDefinition, TriggerKind } from '../domain/pipeline';
import { on } from '../dsl/gate';
import { SHARED_BUILD, binaryFileName } from './shared-build';

export const RELEASE_PIPELINE = 'release-pipeline';

export const BUILD_TARGETS = ['ubuntu-latest', 'windows-latest'];

export const MAIN_BRANCH = 'refs/heads/main';

/** Release tags: `v<major>.<minor>.<patch>`. */
export const VERSION_TAG_PATTERN = 'refs/tags/v*.*.*';

const mainPush = on.all(on.trigger(TriggerKind.PushBranch), on.ref(MAIN_BRANCH));
const mainPullRequest = on.all(on.trigger(TriggerKind.PullRequest), on.baseRef(MAIN_BRANCH));
const versionTag = on.all(on.trigger(TriggerKind.PushTag), on.ref(VERSION_TAG_PATTERN));

export interface ReleasePipelineOptions {
  /** Repository identity the smoke test is restricted to. */
  repository: string;
  /** Space directory the smoke test generates. */
  smokeTestSpace?: string;
}

/** The release inputs: one executable per build target. */
export function releaseArtifacts(): Array<Record<string, string>> {
  return BUILD_TARGETS.map((os) => ({ name: os, file: binaryFileName(os), 'call-site': 'build' }));
}

export function createReleasePipeline(options: ReleasePipelineOptions): PipelineDefinition {
  return {
    name: RELEASE_PIPELINE,
    on: [TriggerKind.PullRequest, TriggerKind.PushBranch, TriggerKind.PushTag],
    jobs: [
      {
        id: 'format',
        if: mainPullRequest,
        steps: [
          { name: 'checkout', uses: 'checkout' },
          { name: 'check format', uses: 'run', with: { command: 'cargo', args: ['fmt', '--all', '--', '--check'] } },
        ],
      },
      {
        id: 'audit',
        if: on.all(mainPullRequest, on.feature('dependencyAudit')),
        steps: [
          { name: 'checkout', uses: 'checkout' },
          { name: 'cargo deny', uses: 'run', with: { command: 'cargo', args: ['deny', 'check'] } },
        ],
      },
      {
        id: 'build',
        name: 'Build',
        uses: SHARED_BUILD,
        if: on.any(mainPullRequest, mainPush, versionTag),
        matrix: { os: BUILD_TARGETS },
        with: { os: '${{ matrix.os }}', release: true },
      },
      {
        id: 'docker',
        needs: ['build'],
        if: mainPush,
        requires: 'success',
        permissions: ['contents:read', 'packages:write', 'id-token:write'],
        steps: [
          { name: 'checkout', uses: 'checkout' },
          { name: 'publish image', uses: 'docker.publish', with: { push: true } },
        ],
      },
      {
        id: 'smoke-test',
        needs: ['docker'],
        if: on.all(on.any(mainPush, mainPullRequest), on.repository(options.repository)),
        requires: 'success-or-skipped',
        secrets: ['API_USER', 'API_TOKEN'],
        variables: ['CONFLUENCE_HOST'],
        steps: [
          { name: 'checkout', uses: 'checkout' },
          {
            name: 'generate example space',
            uses: 'smoke-test',
            with: { 'space-directory': options.smokeTestSpace ?? 'example/team' },
          },
        ],
      },
      {
        id: 'prerelease',
        needs: ['build'],
        if: mainPush,
        requires: 'success',
        permissions: ['contents:write'],
        steps: [
          { name: 'publish development build', uses: 'release.compose', with: { mode: 'prerelease', artifacts: releaseArtifacts() } },
        ],
      },
      {
        id: 'release',
        needs: ['build'],
        if: versionTag,
        requires: 'success',
        permissions: ['contents:write'],
        steps: [
          { name: 'checkout', uses: 'checkout' },
          { name: 'draft release', uses: 'release.compose', with: { mode: 'tag', artifacts: releaseArtifacts() } },
        ],
      },
      {
        id: 'update-version-tags',
        needs: ['release'],
        if: on.all(versionTag, on.feature('tagSync')),
        requires: 'success',
        permissions: ['contents:write'],
        steps: [
          { name: 'checkout', uses: 'checkout' },
          { name: 'update version tags', uses: 'tags.sync' },
        ],
      },
    ],
  };
}

