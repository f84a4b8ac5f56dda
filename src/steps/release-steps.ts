/**
 * Built-in release and tag steps.
 */

import { ReleaseArtifactRef } from '../release/composer';
import { MANIFEST_PATH } from '../release/version';
import {
  StepExecutionContext,
  StepFailedError,
  registerStepHandler,
  stringInput,
} from '../engine/step-runner';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse `artifacts` entries of the form
 * `{ name, file, 'call-site'?, 'matrix-value'? }`.
 */
export function parseArtifactRefs(value: unknown): ReleaseArtifactRef[] {
  if (!Array.isArray(value)) {
    throw new StepFailedError('"artifacts" must be a list');
  }
  return value.map((entry: unknown, index) => {
    const fields: Record<string, unknown> = isRecord(entry) ? entry : {};
    const { name, file } = fields;
    if (typeof name !== 'string' || typeof file !== 'string') {
      throw new StepFailedError(`artifacts[${index}] needs string "name" and "file"`);
    }
    const callSite = fields['call-site'];
    const matrixValue = fields['matrix-value'];
    return {
      slot: {
        name,
        ...(typeof callSite === 'string' ? { callSite } : {}),
        ...(typeof matrixValue === 'string' ? { matrixValue } : {}),
      },
      file,
    };
  });
}

async function readManifest(ctx: StepExecutionContext, path: string): Promise<string> {
  const content = await ctx.workspace.readFile(path);
  if (!content) {
    throw new StepFailedError(`Manifest not found in workspace: ${path}`, { path });
  }
  return new TextDecoder().decode(content);
}

export function registerReleaseSteps(): void {
  registerStepHandler({
    type: 'release.compose',
    inputContract: {
      mode: { type: 'string', required: true, oneOf: ['tag', 'prerelease'] },
      artifacts: { type: 'array', required: true },
      manifest: { type: 'string' },
    },
    requiredPermissions: () => ['contents:write'],
    async execute(step, ctx) {
      const artifacts = parseArtifactRefs(step.with?.artifacts);
      const releases = ctx.services.releases;
      const record = stringInput(step, 'mode') === 'tag'
        ? await releases.composeTagRelease({
            runId: ctx.runId,
            ref: ctx.trigger.ref,
            commit: ctx.trigger.commit,
            manifest: await readManifest(ctx, stringInput(step, 'manifest') ?? MANIFEST_PATH),
            artifacts,
            jobId: ctx.instanceKey,
            signal: ctx.signal,
          })
        : await releases.composeDevelopmentBuild({
            runId: ctx.runId,
            commit: ctx.trigger.commit,
            artifacts,
            jobId: ctx.instanceKey,
            signal: ctx.signal,
          });
      return { outputs: { release: record.id, assets: record.assets.map((a) => a.name) } };
    },
  });

  registerStepHandler({
    type: 'tags.sync',
    inputContract: {
      manifest: { type: 'string' },
    },
    requiredPermissions: () => ['contents:write'],
    async execute(step, ctx) {
      const result = await ctx.services.tags.sync({
        manifest: await readManifest(ctx, stringInput(step, 'manifest') ?? MANIFEST_PATH),
        git: ctx.services.git(ctx.workspace),
        runId: ctx.runId,
        jobId: ctx.instanceKey,
        signal: ctx.signal,
      });
      return {
        outputs: {
          version: result.version.version,
          tags: result.version.tags,
          pushed: result.pushed,
          updated: result.updated,
        },
      };
    },
  });
}
