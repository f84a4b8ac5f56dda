/**
 * Run and job instance state machines.
 *
 * Enforces valid state transitions for runs and job instances,
 * producing typed errors on invalid transitions.
 */

import {
  JobStatus,
  RunStatus,
  VALID_JOB_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a job instance state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'JOB.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return (
    status === RunStatus.Succeeded ||
    status === RunStatus.Failed ||
    status === RunStatus.Canceled
  );
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return (
    status === JobStatus.Succeeded ||
    status === JobStatus.Failed ||
    status === JobStatus.Skipped
  );
}
