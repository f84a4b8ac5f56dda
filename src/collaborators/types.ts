/**
 * Contracts for the external collaborators steps call into.
 *
 * The core only decides whether and with what inputs these run; what
 * they do is opaque to it.
 */

import { TriggerEvent } from '../domain/pipeline';
import { Workspace } from '../engine/workspace';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  signal: AbortSignal;
  env?: Record<string, string>;
}

export interface PublishImageRequest {
  /** Push to the registry; building alone needs no elevated permissions. */
  push: boolean;
  image: string;
}

export interface PublishImageResult {
  image: string;
  pushed: boolean;
}

export interface SmokeTestRequest {
  spaceDirectory: string;
  confluenceHost: string;
  apiUser: string;
  apiToken: string;
}

export interface Collaborators {
  /** Populate the workspace with the source tree at the trigger's commit. */
  checkout(workspace: Workspace, trigger: TriggerEvent, signal: AbortSignal): Promise<void>;
  /** Run a command inside the workspace. */
  run(workspace: Workspace, command: string, args: string[], options: RunCommandOptions): Promise<CommandResult>;
  publishImage(workspace: Workspace, request: PublishImageRequest, signal: AbortSignal): Promise<PublishImageResult>;
  /** True when the built tool completed against the external API. */
  smokeTest(workspace: Workspace, request: SmokeTestRequest, signal: AbortSignal): Promise<boolean>;
}
