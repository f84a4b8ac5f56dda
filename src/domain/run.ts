/**
 * Run domain model.
 *
 * A PipelineRun is one execution triggered by an event. It owns one
 * JobInstance per (job, matrix value) pair, fixed at plan time.
 */

import { TypedError } from './errors';
import { Permission, TriggerEvent } from './pipeline';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Job instance lifecycle states. */
export enum JobStatus {
  Pending = 'pending',
  Blocked = 'blocked',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Why an instance was skipped. */
export type SkipReason = 'gate' | 'upstream' | 'canceled';

export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Queued, RunStatus.Canceled],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Canceled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Blocked, JobStatus.Running, JobStatus.Skipped],
  [JobStatus.Blocked]: [JobStatus.Running, JobStatus.Skipped],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
  [JobStatus.Skipped]: [],
};

export type StepStatus = 'succeeded' | 'failed' | 'not-run';

export interface StepResult {
  name: string;
  uses: string;
  status: StepStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  outputs?: Record<string, unknown>;
  error?: TypedError;
}

/** One concrete, matrix-resolved execution of a job. */
export interface JobInstance {
  /** Unique within the run, e.g. "build/build[ubuntu-latest]". */
  key: string;
  /** Job id after sub-pipeline expansion, e.g. "build/build". */
  jobId: string;
  /** Call-site id when the job came from a sub-pipeline template. */
  callSite?: string;
  matrix: Record<string, string>;
  /** Matrix values joined in axis order; empty when the job has no matrix. */
  matrixKey: string;
  status: JobStatus;
  skipReason?: SkipReason;
  /** Keys of the instances this one waits for. */
  needs: string[];
  permissions: Permission[];
  steps: StepResult[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

export interface PipelineRun {
  id: string;
  pipeline: string;
  trigger: TriggerEvent;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Instances indexed by key. */
  jobs: Record<string, JobInstance>;
  /** Topological order of instance keys. */
  order: string[];
  /** Hash of the compiled plan the run executes. */
  planHash?: string;
  /** Instance keys whose outcome decides the run status. */
  criticalPath: string[];
  error?: TypedError;
  canceledBy?: string;
  canceledAt?: string;
  cancelReason?: string;
}

export interface CreateRunInput {
  trigger: TriggerEvent;
  /** Pin a pipeline by name; otherwise the first pipeline listening on the trigger kind. */
  pipeline?: string;
  /** Run-scoped secrets. Held in memory for the run only, never persisted. */
  secrets?: Record<string, string>;
  variables?: Record<string, string>;
}

export interface CancelRunInput {
  runId: string;
  canceledBy: string;
  reason?: string;
}
