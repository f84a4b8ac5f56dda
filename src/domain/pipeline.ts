/**
 * Pipeline definition domain model.
 *
 * A pipeline is a declared set of jobs. Jobs either carry their own ordered
 * steps or invoke a named sub-pipeline template with typed inputs. Both may
 * fan out over a matrix and both may be gated by a condition evaluated
 * against the run context.
 */

/** Kinds of events that start a pipeline run. */
export enum TriggerKind {
  PullRequest = 'pull_request',
  PushBranch = 'push_branch',
  PushTag = 'push_tag',
}

/** A normalized trigger from the version control host. */
export interface TriggerEvent {
  kind: TriggerKind;
  /** Full git ref, e.g. "refs/heads/main" or "refs/tags/v1.4.0". */
  ref: string;
  /** Repository identity, "owner/name". */
  repository: string;
  /** Commit the run builds. */
  commit: string;
  /** Branch a pull request targets, e.g. "refs/heads/main". */
  baseRef?: string;
}

/**
 * Declarative gate condition.
 *
 * `ref` and `base-ref` patterns accept `*` as a wildcard for any run of characters.
 */
export type GateCondition =
  | { kind: 'trigger'; in: TriggerKind[] }
  | { kind: 'repository'; equals: string }
  | { kind: 'ref'; pattern: string }
  | { kind: 'base-ref'; pattern: string }
  | { kind: 'feature'; name: string }
  | { kind: 'all'; conditions: GateCondition[] }
  | { kind: 'any'; conditions: GateCondition[] }
  | { kind: 'not'; condition: GateCondition };

/** Matrix axes: each axis name maps to the values it fans out over. */
export type MatrixSpec = Record<string, string[]>;

/**
 * How a job reacts to its dependencies.
 * - `success`: every dependency instance must have Succeeded.
 * - `success-or-skipped`: gate-skipped dependencies are tolerated.
 */
export type DependencyPolicy = 'success' | 'success-or-skipped';

/** Secrets or variables granted to a job: all of them, or an explicit subset. */
export type CapabilityGrant = 'inherit' | string[];

export type Permission =
  | 'contents:read'
  | 'contents:write'
  | 'packages:write'
  | 'id-token:write';

export const ALL_PERMISSIONS: readonly Permission[] = [
  'contents:read',
  'contents:write',
  'packages:write',
  'id-token:write',
];

/** A single step inside a job. Its `uses` names the handler that runs it. */
export interface StepDescriptor {
  name: string;
  uses: string;
  with?: Record<string, unknown>;
}

interface JobBase {
  id: string;
  name?: string;
  /** Job (or call-site) ids that must finish first. */
  needs?: string[];
  if?: GateCondition;
  matrix?: MatrixSpec;
  requires?: DependencyPolicy;
  secrets?: CapabilityGrant;
  variables?: CapabilityGrant;
  permissions?: Permission[] | 'write-all';
  /** Wall-clock timeout for each instance. */
  timeoutMs?: number;
}

/** A job declared inline with its own steps. */
export interface StepJobDefinition extends JobBase {
  steps: StepDescriptor[];
}

/** A job that expands into a sub-pipeline template at plan time. */
export interface CallJobDefinition extends JobBase {
  uses: string;
  /** Inputs; strings may contain `${{ matrix.<axis> }}`. */
  with?: Record<string, string | boolean>;
}

export type JobDefinition = StepJobDefinition | CallJobDefinition;

export function isCallJob(job: JobDefinition): job is CallJobDefinition {
  return 'uses' in job;
}

export type TemplateInputValue = string | boolean;

export interface TemplateInputDefinition {
  type: 'string' | 'boolean';
  required?: boolean;
  default?: TemplateInputValue;
  description?: string;
}

/** A named, parameterized group of jobs invocable from several call sites. */
export interface SubPipelineTemplate {
  name: string;
  inputs: Record<string, TemplateInputDefinition>;
  jobs(inputs: Record<string, TemplateInputValue>): StepJobDefinition[];
}

/** An entry pipeline selected by trigger kind. */
export interface PipelineDefinition {
  name: string;
  on: TriggerKind[];
  jobs: JobDefinition[];
  /**
   * Jobs whose dependency closure decides the run outcome.
   * Defaults to every job in the pipeline.
   */
  criticalJobs?: string[];
}
