/**
 * Built-in artifact and cache steps.
 */

import { posix } from 'path';
import { ArtifactSlotKey } from '../domain/artifact';
import { StepDescriptor } from '../domain/pipeline';
import { ArtifactError, createTypedError } from '../domain/errors';
import { FileInput, sha256Hex } from '../artifacts/artifact-service';
import {
  StepExecutionContext,
  registerStepHandler,
  requireStringInput,
  stringInput,
  stringListInput,
} from '../engine/step-runner';
import { Workspace } from '../engine/workspace';

/** Read every file at or below the given paths. */
export async function collectFiles(workspace: Workspace, paths: string[]): Promise<FileInput[]> {
  const seen = new Set<string>();
  const files: FileInput[] = [];
  for (const path of paths) {
    for (const file of await workspace.list(path)) {
      if (seen.has(file)) continue;
      seen.add(file);
      const content = await workspace.readFile(file);
      if (content) files.push({ path: file, content });
    }
  }
  return files;
}

/** Deepest directory containing every path. */
export function commonDirectory(paths: string[]): string {
  if (paths.length === 0) return '';
  const split = paths.map((p) => posix.dirname(p).split('/').filter((s) => s !== '.'));
  const first = split[0] ?? [];
  let depth = 0;
  while (depth < first.length && split.every((parts) => parts[depth] === first[depth])) depth++;
  return first.slice(0, depth).join('/');
}

/**
 * Hash of the named files' contents, in path order. Empty when none of
 * them exist.
 */
export async function hashFiles(workspace: Workspace, paths: string[]): Promise<string> {
  const files = await collectFiles(workspace, paths);
  if (files.length === 0) return '';
  const digests = files
    .sort((a, b) => a.path.localeCompare(b.path))
    .map((f) => sha256Hex(f.content))
    .join('');
  return sha256Hex(digests);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function cacheKey(step: StepDescriptor, ctx: StepExecutionContext): Promise<string> {
  const prefix = requireStringInput(step, 'prefix');
  return `${prefix}${await hashFiles(ctx.workspace, stringListInput(step, 'hash-files'))}`;
}

function slotKey(name: string, callSite: string | undefined, matrixValue: string | undefined): ArtifactSlotKey {
  return {
    name,
    ...(callSite ? { callSite } : {}),
    ...(matrixValue ? { matrixValue } : {}),
  };
}

export function registerArtifactSteps(): void {
  registerStepHandler({
    type: 'artifact.upload',
    inputContract: {
      name: { type: 'string', required: true },
      path: { type: 'string', required: true },
      'matrix-value': { type: 'string' },
      'if-no-files-found': { type: 'string', oneOf: ['error', 'warn', 'ignore'] },
    },
    async execute(step, ctx) {
      const name = requireStringInput(step, 'name');
      const path = requireStringInput(step, 'path');
      const policy = stringInput(step, 'if-no-files-found') ?? 'warn';
      const key = slotKey(name, ctx.callSite, stringInput(step, 'matrix-value'));

      const matched = await collectFiles(ctx.workspace, [path]);
      if (matched.length === 0) {
        if (policy === 'error') {
          throw new ArtifactError(createTypedError({
            code: 'ARTIFACT.NO_FILES_FOUND',
            message: `No files found at "${path}" for artifact "${name}"`,
            jobId: ctx.instanceKey,
            runId: ctx.runId,
            details: { name, path },
          }));
        }
        if (policy === 'warn') {
          ctx.logger.warn('No files found for artifact, nothing uploaded', { name, path });
        }
        return { outputs: { uploaded: 0 } };
      }

      // stored paths are relative to the deepest common directory
      const root = commonDirectory(matched.map((f) => f.path));
      const files = matched.map((f) => ({ path: root ? posix.relative(root, f.path) : f.path, content: f.content }));
      const slot = await ctx.services.artifacts.put(ctx.runId, key, files, ctx.instanceKey, ctx.signal);
      return { outputs: { slot: slot.slotId, uploaded: files.length } };
    },
  });

  registerStepHandler({
    type: 'artifact.download',
    inputContract: {
      name: { type: 'string', required: true },
      'call-site': { type: 'string' },
      'matrix-value': { type: 'string' },
      path: { type: 'string' },
    },
    async execute(step, ctx) {
      const key = slotKey(
        requireStringInput(step, 'name'),
        stringInput(step, 'call-site') ?? ctx.callSite,
        stringInput(step, 'matrix-value'),
      );
      const target = stringInput(step, 'path') ?? '.';
      const slot = await ctx.services.artifacts.get(ctx.runId, key);
      for (const file of slot.files) {
        await ctx.workspace.writeFile(posix.join(target, file.path), file.content);
      }
      return { outputs: { slot: slot.slotId, files: slot.files.map((f) => f.path) } };
    },
  });

  registerStepHandler({
    type: 'cache.restore',
    inputContract: {
      prefix: { type: 'string', required: true },
      'hash-files': { type: 'array' },
    },
    async execute(step, ctx) {
      const prefix = requireStringInput(step, 'prefix');
      let key = prefix;
      try {
        key = await cacheKey(step, ctx);
        const result = await ctx.services.artifacts.cacheRestore(key, [prefix]);
        if (result.hit !== 'miss') {
          for (const file of result.entry.files) {
            await ctx.workspace.writeFile(file.path, file.content);
          }
        }
        return { outputs: { key, hit: result.hit } };
      } catch (err) {
        ctx.logger.warn('Cache restore failed, continuing without cache', { key, error: errorMessage(err) });
        return { outputs: { key, hit: 'miss' } };
      }
    },
  });

  registerStepHandler({
    type: 'cache.save',
    inputContract: {
      prefix: { type: 'string', required: true },
      'hash-files': { type: 'array' },
      paths: { type: 'array', required: true },
    },
    async execute(step, ctx) {
      let key = requireStringInput(step, 'prefix');
      let files: FileInput[] = [];
      try {
        key = await cacheKey(step, ctx);
        files = await collectFiles(ctx.workspace, stringListInput(step, 'paths'));
      } catch (err) {
        ctx.logger.warn('Could not collect cache contents', { key, error: errorMessage(err) });
        return { outputs: { key, result: 'failed' } };
      }
      const result = await ctx.services.artifacts.cacheSave(key, files);
      return { outputs: { key, result } };
    },
  });
}
