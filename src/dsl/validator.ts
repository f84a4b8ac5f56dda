/**
 * Pipeline definition validator.
 *
 * Checks structure, references and acyclicity at the job level. Problems
 * found here are plan-time fatal: no instance of the run is started.
 */

import {
  TypedError,
  createTypedError,
  planCycleError,
  planMissingInputError,
  planUnknownDependencyError,
} from '../domain/errors';
import {
  ALL_PERMISSIONS,
  JobDefinition,
  MatrixSpec,
  PipelineDefinition,
  SubPipelineTemplate,
  isCallJob,
} from '../domain/pipeline';
import { JOB_ID_PATTERN, MATRIX_KEY_SEPARATOR, SCHEMA_CONSTRAINTS } from './schema';

export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

export type TemplateRegistry = ReadonlyMap<string, SubPipelineTemplate>;

/** Validate a pipeline definition against the registered templates. */
export function validatePipeline(pipeline: PipelineDefinition, templates: TemplateRegistry): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!pipeline.name) {
    errors.push(createTypedError({ code: 'PLAN.REQUIRED_FIELD', message: 'Pipeline name is required' }));
  }
  if (pipeline.on.length === 0) {
    warnings.push(`Pipeline "${pipeline.name}" listens on no trigger kinds`);
  }
  if (pipeline.jobs.length === 0) {
    errors.push(createTypedError({ code: 'PLAN.NO_JOBS', message: `Pipeline "${pipeline.name}" declares no jobs` }));
    return { valid: false, errors, warnings };
  }
  if (pipeline.jobs.length > SCHEMA_CONSTRAINTS.maxJobs) {
    errors.push(createTypedError({
      code: 'PLAN.TOO_MANY_JOBS',
      message: `Pipeline declares ${pipeline.jobs.length} jobs (max ${SCHEMA_CONSTRAINTS.maxJobs})`,
    }));
  }

  const ids = new Set<string>();
  for (const job of pipeline.jobs) {
    if (!JOB_ID_PATTERN.test(job.id)) {
      errors.push(createTypedError({
        code: 'PLAN.INVALID_JOB_ID',
        message: `Invalid job id "${job.id}"`,
        jobId: job.id,
        details: { pattern: JOB_ID_PATTERN.source },
      }));
    }
    if (ids.has(job.id)) {
      errors.push(createTypedError({ code: 'PLAN.DUPLICATE_JOB', message: `Duplicate job id "${job.id}"`, jobId: job.id }));
    }
    ids.add(job.id);
  }

  for (const job of pipeline.jobs) {
    validateJob(job, ids, templates, errors);
  }

  for (const critical of pipeline.criticalJobs ?? []) {
    if (!ids.has(critical)) {
      errors.push(planUnknownDependencyError(`${pipeline.name}.criticalJobs`, critical));
    }
  }

  if (errors.length === 0) {
    const cycle = findCycle(pipeline.jobs);
    if (cycle) errors.push(planCycleError(cycle));
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateJob(
  job: JobDefinition,
  ids: Set<string>,
  templates: TemplateRegistry,
  errors: TypedError[],
): void {
  for (const dep of job.needs ?? []) {
    if (!ids.has(dep)) errors.push(planUnknownDependencyError(job.id, dep));
    if (dep === job.id) errors.push(planCycleError([job.id]));
  }

  for (const [axis, values] of Object.entries(job.matrix ?? {})) {
    if (values.length === 0) {
      errors.push(createTypedError({
        code: 'PLAN.EMPTY_MATRIX',
        message: `Matrix axis "${axis}" of job "${job.id}" has no values`,
        jobId: job.id,
      }));
    }
    if (values.length > SCHEMA_CONSTRAINTS.maxMatrixValues) {
      errors.push(createTypedError({
        code: 'PLAN.MATRIX_TOO_LARGE',
        message: `Matrix axis "${axis}" of job "${job.id}" exceeds ${SCHEMA_CONSTRAINTS.maxMatrixValues} values`,
        jobId: job.id,
      }));
    }
    if (new Set(values).size !== values.length) {
      errors.push(createTypedError({
        code: 'PLAN.DUPLICATE_MATRIX_VALUE',
        message: `Matrix axis "${axis}" of job "${job.id}" repeats a value`,
        jobId: job.id,
      }));
    }
  }
  validateMatrixValues(job.id, job.matrix, errors);

  if (job.timeoutMs !== undefined && (job.timeoutMs < SCHEMA_CONSTRAINTS.minTimeoutMs || job.timeoutMs > SCHEMA_CONSTRAINTS.maxTimeoutMs)) {
    errors.push(createTypedError({
      code: 'PLAN.INVALID_TIMEOUT',
      message: `Timeout of job "${job.id}" must be between ${SCHEMA_CONSTRAINTS.minTimeoutMs} and ${SCHEMA_CONSTRAINTS.maxTimeoutMs}ms`,
      jobId: job.id,
    }));
  }

  if (Array.isArray(job.permissions)) {
    for (const permission of job.permissions) {
      if (!ALL_PERMISSIONS.includes(permission)) {
        errors.push(createTypedError({
          code: 'PLAN.INVALID_PERMISSION',
          message: `Unknown permission "${permission}" on job "${job.id}"`,
          jobId: job.id,
        }));
      }
    }
  }

  if (isCallJob(job)) {
    validateCallSite(job.id, job.uses, job.with ?? {}, templates, errors);
  } else if (job.steps.length === 0) {
    errors.push(createTypedError({ code: 'PLAN.NO_STEPS', message: `Job "${job.id}" has no steps`, jobId: job.id }));
  } else if (job.steps.length > SCHEMA_CONSTRAINTS.maxStepsPerJob) {
    errors.push(createTypedError({
      code: 'PLAN.TOO_MANY_STEPS',
      message: `Job "${job.id}" exceeds ${SCHEMA_CONSTRAINTS.maxStepsPerJob} steps`,
      jobId: job.id,
    }));
  }
}

/** Reject matrix values that would make two instance keys collide. */
export function validateMatrixValues(jobId: string, matrix: MatrixSpec | undefined, errors: TypedError[]): void {
  for (const [axis, values] of Object.entries(matrix ?? {})) {
    const ambiguous = values.find((value) => value.includes(MATRIX_KEY_SEPARATOR));
    if (ambiguous !== undefined) {
      errors.push(createTypedError({
        code: 'PLAN.INVALID_MATRIX_VALUE',
        message: `Matrix value "${ambiguous}" on axis "${axis}" of job "${jobId}" contains "${MATRIX_KEY_SEPARATOR}"`,
        jobId,
      }));
    }
  }
}

/** Check call-site inputs against the template's declared inputs. */
export function validateCallSite(
  callSite: string,
  templateName: string,
  inputs: Record<string, unknown>,
  templates: TemplateRegistry,
  errors: TypedError[],
): void {
  const template = templates.get(templateName);
  if (!template) {
    errors.push(createTypedError({
      code: 'PLAN.UNKNOWN_TEMPLATE',
      message: `Job "${callSite}" uses unknown sub-pipeline "${templateName}"`,
      jobId: callSite,
      details: { template: templateName, known: [...templates.keys()] },
    }));
    return;
  }

  for (const [name, definition] of Object.entries(template.inputs)) {
    const value = inputs[name];
    if (value === undefined) {
      if (definition.required && definition.default === undefined) {
        errors.push(planMissingInputError(callSite, templateName, name));
      }
      continue;
    }
    if (typeof value !== definition.type) {
      errors.push(createTypedError({
        code: 'PLAN.INVALID_INPUT',
        message: `Input "${name}" of sub-pipeline "${templateName}" must be a ${definition.type}`,
        jobId: callSite,
        details: { template: templateName, input: name, expected: definition.type, actual: typeof value },
      }));
    }
  }

  for (const name of Object.keys(inputs)) {
    if (!(name in template.inputs)) {
      errors.push(createTypedError({
        code: 'PLAN.UNKNOWN_INPUT',
        message: `Sub-pipeline "${templateName}" has no input "${name}"`,
        jobId: callSite,
        details: { template: templateName, input: name },
      }));
    }
  }
}

/** Depth-first search over `needs`; returns the jobs on the first cycle found. */
export function findCycle(jobs: Array<{ id: string; needs?: string[] }>): string[] | null {
  const byId = new Map(jobs.map((job) => [job.id, job]));
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  function visit(id: string): string[] | null {
    if (onStack.has(id)) return stack.slice(stack.indexOf(id));
    if (visited.has(id)) return null;
    visited.add(id);
    stack.push(id);
    onStack.add(id);
    for (const dep of byId.get(id)?.needs ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    onStack.delete(id);
    return null;
  }

  for (const job of jobs) {
    const cycle = visit(job.id);
    if (cycle) return cycle;
  }
  return null;
}
