/**
 * Collaborators backed by local processes: git, cargo, docker.
 *
 * Requires directory workspaces; each command runs with the workspace as
 * its working directory and is killed when the instance's signal fires.
 */

import { execFile } from 'child_process';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import { TriggerEvent } from '../domain/pipeline';
import { Workspace } from '../engine/workspace';
import { Logger, logger as rootLogger } from '../logger';
import {
  Collaborators,
  CommandResult,
  PublishImageRequest,
  PublishImageResult,
  RunCommandOptions,
  SmokeTestRequest,
} from './types';

export interface ProcessCollaboratorOptions {
  /** Clone URL for a repository identity; defaults to GitHub over https. */
  remoteUrl?: (repository: string) => string;
  /** Image the smoke test runs. */
  smokeTestImage?: string;
  logger?: Logger;
}

async function requireDir(workspace: Workspace): Promise<string> {
  if (!workspace.dir) {
    throw new Error('Process collaborators need a directory workspace');
  }
  await mkdir(workspace.dir, { recursive: true });
  return workspace.dir;
}

/** Variables a child process inherits from the server's own environment. */
export const INHERITED_ENV = ['PATH', 'HOME', 'USER', 'LANG', 'TERM', 'TMPDIR', 'TEMP', 'TMP', 'SystemRoot', 'ComSpec', 'PATHEXT'];
export const INHERITED_ENV_PREFIXES = ['CARGO_', 'RUSTUP_', 'DOCKER_', 'LC_'];

/**
 * Environment for a child process: the allow-listed part of `base` plus
 * `extra`. Server configuration and credentials are never inherited; a
 * command sees only the secrets passed to it explicitly.
 */
export function childEnvironment(base: NodeJS.ProcessEnv, extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(base)) {
    if (value === undefined) continue;
    if (INHERITED_ENV.includes(name) || INHERITED_ENV_PREFIXES.some((prefix) => name.startsWith(prefix))) {
      env[name] = value;
    }
  }
  return { ...env, ...extra };
}

/** Run a command; a non-zero exit is reported, not thrown. */
export function runCommand(
  command: string,
  args: string[],
  cwd: string,
  options: RunCommandOptions,
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd,
        signal: options.signal,
        env: childEnvironment(process.env, options.env),
        encoding: 'utf-8',
        maxBuffer: 64 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        reject(error);
      },
    );
  });
}

export class ProcessCollaborators implements Collaborators {
  private log: Logger;

  constructor(private options: ProcessCollaboratorOptions = {}) {
    this.log = (options.logger ?? rootLogger).child({ component: 'collaborators' });
  }

  async checkout(workspace: Workspace, trigger: TriggerEvent, signal: AbortSignal): Promise<void> {
    const dir = await requireDir(workspace);
    const url = this.options.remoteUrl?.(trigger.repository) ?? `https://github.com/${trigger.repository}.git`;
    const steps: string[][] = [
      ['init', '--quiet'],
      ['remote', 'add', 'origin', url],
      ['fetch', '--quiet', '--tags', 'origin', trigger.commit],
      ['checkout', '--quiet', '--detach', trigger.commit],
    ];
    for (const args of steps) {
      await this.mustRun('git', args, dir, signal);
    }
    this.log.info('Checked out', { repository: trigger.repository, commit: trigger.commit });
  }

  async run(workspace: Workspace, command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
    const dir = await requireDir(workspace);
    this.log.debug('Running command', { command, args, cwd: dir });
    // cargo state stays inside the workspace so cache steps can see it
    return runCommand(command, args, dir, {
      ...options,
      env: { CARGO_HOME: join(dir, '.cargo'), ...options.env },
    });
  }

  async publishImage(workspace: Workspace, request: PublishImageRequest, signal: AbortSignal): Promise<PublishImageResult> {
    const dir = await requireDir(workspace);
    await this.mustRun('docker', ['build', '--tag', request.image, '.'], dir, signal);
    if (request.push) {
      await this.mustRun('docker', ['push', request.image], dir, signal);
      this.log.info('Image pushed', { image: request.image });
    }
    return { image: request.image, pushed: request.push };
  }

  async smokeTest(workspace: Workspace, request: SmokeTestRequest, signal: AbortSignal): Promise<boolean> {
    const dir = await requireDir(workspace);
    const image = this.options.smokeTestImage ?? 'marked-space:latest';
    const result = await runCommand(
      'docker',
      [
        'run', '--rm',
        '--volume', `${dir}:/workspace`,
        '--workdir', '/workspace',
        '--env', 'CONFLUENCE_HOST',
        '--env', 'API_USER',
        '--env', 'API_TOKEN',
        image,
        request.spaceDirectory,
      ],
      dir,
      {
        signal,
        env: {
          CONFLUENCE_HOST: request.confluenceHost,
          API_USER: request.apiUser,
          API_TOKEN: request.apiToken,
        },
      },
    );
    if (result.exitCode !== 0) {
      this.log.warn('Smoke test failed', { exitCode: result.exitCode });
    }
    return result.exitCode === 0;
  }

  private async mustRun(command: string, args: string[], cwd: string, signal: AbortSignal): Promise<void> {
    const result = await runCommand(command, args, cwd, { signal });
    if (result.exitCode !== 0) {
      throw new Error(`${command} ${args.join(' ')} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }
}
