/**
 * Step runner: executes the steps of one job instance, strictly in order.
 *
 * The first failing step fails the instance; the steps after it are
 * recorded as not run. The abort signal is checked before every step, so a
 * timed-out or canceled instance starts nothing new while the step in
 * flight is allowed to finish.
 */

import { Permission, StepDescriptor, TriggerEvent } from '../domain/pipeline';
import { StepResult } from '../domain/run';
import { ShipwrightError, TypedError, createTypedError, permissionError } from '../domain/errors';
import { ArtifactService } from '../artifacts/artifact-service';
import type { Collaborators } from '../collaborators/types';
import type { ReleaseComposer } from '../release/composer';
import type { GitClient } from '../release/git';
import type { TagSynchronizer } from '../release/tag-sync';
import { Logger } from '../logger';
import { Workspace } from './workspace';

/** Services shared by every instance of a run. */
export interface StepServices {
  artifacts: ArtifactService;
  releases: ReleaseComposer;
  tags: TagSynchronizer;
  collaborators: Collaborators;
  git(workspace: Workspace): GitClient;
}

/** Everything a step may touch. Built per instance by the executor. */
export interface StepExecutionContext {
  runId: string;
  /** Instance key, e.g. "build/build[ubuntu-latest]". */
  instanceKey: string;
  jobId: string;
  callSite?: string;
  matrix: Record<string, string>;
  matrixKey: string;
  trigger: TriggerEvent;
  features: Record<string, boolean>;
  permissions: Permission[];
  workspace: Workspace;
  /** Fires on timeout or run cancellation. */
  signal: AbortSignal;
  logger: Logger;
  /** A granted secret; throws SECRETS.MISSING when absent or not granted. */
  secret(name: string): string;
  variable(name: string): string | undefined;
  /** Outputs of earlier steps of this instance, by step name. */
  outputs: Record<string, Record<string, unknown>>;
  services: StepServices;
}

/** Input field constraint for a step handler. */
export interface InputFieldContract {
  type: 'string' | 'number' | 'boolean' | 'object' | 'array';
  required?: boolean;
  oneOf?: readonly string[];
  description?: string;
}

/** Step handler interface: pluggable step implementations keyed by `uses`. */
export interface StepHandler {
  type: string;

  /** Declare the expected shape of `with`; checked before `execute`. */
  inputContract?: Record<string, InputFieldContract>;

  /** Permissions the step needs for these inputs. */
  requiredPermissions?(step: StepDescriptor): Permission[];

  execute(
    step: StepDescriptor,
    context: StepExecutionContext,
  ): Promise<{ outputs?: Record<string, unknown> }>;
}

/** Registry of step handlers by type. */
const stepHandlers = new Map<string, StepHandler>();

export function registerStepHandler(handler: StepHandler): void {
  stepHandlers.set(handler.type, handler);
}

export function getStepHandler(type: string): StepHandler | undefined {
  return stepHandlers.get(type);
}

export function getRegisteredHandlers(): ReadonlyMap<string, StepHandler> {
  return stepHandlers;
}

/**
 * Error a handler throws for an ordinary, expected failure (non-zero exit,
 * failed smoke test). Its details are kept on the step result.
 */
export class StepFailedError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'StepFailedError';
  }
}

export interface StepsOutcome {
  status: 'succeeded' | 'failed';
  error?: TypedError;
  /** True when the signal stopped the instance before all steps ran. */
  interrupted: boolean;
}

/** Fresh results for a job's steps, all not run. */
export function initialStepResults(steps: StepDescriptor[]): StepResult[] {
  return steps.map((step) => ({ name: step.name, uses: step.uses, status: 'not-run' }));
}

/**
 * Run `steps` in order, writing progress into `results` in place so the
 * caller can observe the step in flight. Never rejects.
 */
export async function runSteps(
  steps: StepDescriptor[],
  results: StepResult[],
  context: StepExecutionContext,
): Promise<StepsOutcome> {
  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    const result = results[i];
    if (!step || !result) continue;

    if (context.signal.aborted) {
      return { status: 'failed', interrupted: true };
    }

    result.startedAt = new Date().toISOString();
    const error = await executeStep(step, context, result);
    result.completedAt = new Date().toISOString();
    result.durationMs = new Date(result.completedAt).getTime() - new Date(result.startedAt).getTime();

    if (error) {
      result.status = 'failed';
      result.error = error;
      context.logger.warn('Step failed', { step: step.name, code: error.code, error: error.message });
      return { status: 'failed', error, interrupted: false };
    }
    result.status = 'succeeded';
    context.logger.debug('Step succeeded', { step: step.name, durationMs: result.durationMs });
  }
  return { status: 'succeeded', interrupted: false };
}

async function executeStep(
  step: StepDescriptor,
  context: StepExecutionContext,
  result: StepResult,
): Promise<TypedError | undefined> {
  const handler = stepHandlers.get(step.uses);
  if (!handler) {
    return createTypedError({
      code: 'JOB.NO_HANDLER',
      message: `No handler registered for step type "${step.uses}"`,
      jobId: context.instanceKey,
      details: { step: step.name, uses: step.uses },
      suggestedFixes: [
        { type: 'REGISTER_HANDLER', params: { stepType: step.uses }, description: `Register a step handler for "${step.uses}"` },
      ],
    });
  }

  const inputErrors = checkInputContract(step, handler.inputContract);
  if (inputErrors.length > 0) {
    return createTypedError({
      code: 'JOB.INVALID_STEP_INPUT',
      message: `Step "${step.name}" has invalid inputs: ${inputErrors.join('; ')}`,
      jobId: context.instanceKey,
      details: { step: step.name, errors: inputErrors },
    });
  }

  const required = handler.requiredPermissions?.(step) ?? [];
  const missing = required.filter((p) => !context.permissions.includes(p));
  if (missing.length > 0) {
    return permissionError(context.instanceKey, missing);
  }

  try {
    const { outputs } = await handler.execute(step, context);
    if (outputs) {
      result.outputs = outputs;
      context.outputs[step.name] = outputs;
    }
    return undefined;
  } catch (err) {
    if (err instanceof ShipwrightError) {
      return { ...err.typedError, jobId: err.typedError.jobId ?? context.instanceKey };
    }
    return createTypedError({
      code: 'JOB.STEP_FAILED',
      message: err instanceof Error ? err.message : String(err),
      jobId: context.instanceKey,
      details: {
        step: step.name,
        ...(err instanceof StepFailedError ? err.details : {}),
      },
    });
  }
}

function checkInputContract(
  step: StepDescriptor,
  contract: Record<string, InputFieldContract> | undefined,
): string[] {
  if (!contract) return [];
  const errors: string[] = [];
  const inputs = step.with ?? {};
  for (const [field, rule] of Object.entries(contract)) {
    const value = inputs[field];
    if (value === undefined) {
      if (rule.required) errors.push(`"${field}" is required`);
      continue;
    }
    const actual = Array.isArray(value) ? 'array' : typeof value;
    if (actual !== rule.type) {
      errors.push(`"${field}" must be ${rule.type}, got ${actual}`);
      continue;
    }
    if (rule.oneOf && typeof value === 'string' && !rule.oneOf.includes(value)) {
      errors.push(`"${field}" must be one of ${rule.oneOf.join(', ')}`);
    }
  }
  return errors;
}

// --- Input accessors for handlers ---

export function stringInput(step: StepDescriptor, name: string): string | undefined {
  const value = step.with?.[name];
  return typeof value === 'string' ? value : undefined;
}

export function requireStringInput(step: StepDescriptor, name: string): string {
  const value = stringInput(step, name);
  if (value === undefined) {
    throw new StepFailedError(`Step "${step.name}" requires input "${name}"`);
  }
  return value;
}

export function booleanInput(step: StepDescriptor, name: string, fallback: boolean): boolean {
  const value = step.with?.[name];
  return typeof value === 'boolean' ? value : fallback;
}

export function stringListInput(step: StepDescriptor, name: string): string[] {
  const value = step.with?.[name];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return [];
}
