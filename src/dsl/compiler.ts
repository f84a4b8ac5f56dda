/**
 * Pipeline compiler.
 *
 * Turns a validated pipeline definition into an execution plan: sub-pipeline
 * calls are expanded in place, matrices fan out into one instance per
 * combination, dependencies are resolved to instance keys and the instances
 * are ordered topologically. Everything here happens before the first
 * instance runs.
 */

import { createHash } from 'crypto';
import {
  TypedError,
  createTypedError,
  planCycleError,
  planUnknownDependencyError,
} from '../domain/errors';
import {
  ALL_PERMISSIONS,
  CallJobDefinition,
  CapabilityGrant,
  DependencyPolicy,
  GateCondition,
  MatrixSpec,
  Permission,
  PipelineDefinition,
  StepDescriptor,
  StepJobDefinition,
  TemplateInputValue,
  isCallJob,
} from '../domain/pipeline';
import { combineGates } from './gate';
import { MATRIX_KEY_SEPARATOR, MATRIX_REFERENCE_PATTERN, SCHEMA_CONSTRAINTS } from './schema';
import { TemplateRegistry, ValidationResult, findCycle, validateMatrixValues, validatePipeline } from './validator';

/** A job instance as planned, before it runs. */
export interface CompiledInstance {
  key: string;
  jobId: string;
  name: string;
  callSite?: string;
  matrix: Record<string, string>;
  matrixKey: string;
  steps: StepDescriptor[];
  /** Instance keys this instance waits for. */
  needs: string[];
  gate?: GateCondition;
  requires: DependencyPolicy;
  secrets: CapabilityGrant;
  variables: CapabilityGrant;
  permissions: Permission[];
  timeoutMs?: number;
}

export interface ExecutionPlan {
  pipeline: string;
  instances: Record<string, CompiledInstance>;
  /** Topologically sorted instance keys. */
  order: string[];
  /** Instance keys in the dependency closure of the critical jobs. */
  criticalPath: string[];
  planHash: string;
}

export interface CompilationResult {
  success: boolean;
  plan?: ExecutionPlan;
  errors: TypedError[];
  validation: ValidationResult;
}

const DEFAULT_PERMISSIONS: Permission[] = ['contents:read'];

/** All combinations of the matrix axes, in declaration order. */
export function expandMatrix(matrix: MatrixSpec | undefined): Array<Record<string, string>> {
  let combinations: Array<Record<string, string>> = [{}];
  for (const [axis, values] of Object.entries(matrix ?? {})) {
    const next: Array<Record<string, string>> = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [axis]: value });
      }
    }
    combinations = next;
  }
  return combinations;
}

export function matrixKeyOf(matrix: Record<string, string>): string {
  return Object.values(matrix).join(MATRIX_KEY_SEPARATOR);
}

export function instanceKeyOf(jobId: string, matrixKey: string): string {
  return matrixKey ? `${jobId}[${matrixKey}]` : jobId;
}

/** Replace `${{ matrix.<axis> }}` references. Unknown axes are collected as errors. */
export function interpolateMatrix(
  value: string,
  matrix: Record<string, string>,
  jobId: string,
  errors: TypedError[],
): string {
  return value.replace(MATRIX_REFERENCE_PATTERN, (match, axis: string) => {
    const resolved = matrix[axis];
    if (resolved === undefined) {
      errors.push(createTypedError({
        code: 'PLAN.UNKNOWN_MATRIX_AXIS',
        message: `Job "${jobId}" references unknown matrix axis "${axis}"`,
        jobId,
        details: { reference: match },
      }));
      return match;
    }
    return resolved;
  });
}

function interpolateStep(step: StepDescriptor, matrix: Record<string, string>, jobId: string, errors: TypedError[]): StepDescriptor {
  if (!step.with) return step;
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(step.with)) {
    resolved[key] = typeof value === 'string' ? interpolateMatrix(value, matrix, jobId, errors) : value;
  }
  return { ...step, with: resolved };
}

function resolvePermissions(permissions: Permission[] | 'write-all' | undefined): Permission[] | undefined {
  if (permissions === 'write-all') return [...ALL_PERMISSIONS];
  return permissions ? [...permissions] : undefined;
}

/** A template job sees at most what its call site grants. */
export function intersectGrants(requested: CapabilityGrant | undefined, granted: CapabilityGrant | undefined): CapabilityGrant {
  if (!requested || !granted) return [];
  if (granted === 'inherit') return requested;
  if (requested === 'inherit') return [...granted];
  return requested.filter((name) => granted.includes(name));
}

interface Expansion {
  instances: CompiledInstance[];
  /** Job or call-site id → instance keys. */
  groups: Map<string, string[]>;
}

function addToGroup(groups: Map<string, string[]>, id: string, key: string): void {
  const keys = groups.get(id) ?? [];
  keys.push(key);
  groups.set(id, keys);
}

/** Compile a pipeline definition into an execution plan. */
export function compilePipeline(pipeline: PipelineDefinition, templates: TemplateRegistry): CompilationResult {
  const validation = validatePipeline(pipeline, templates);
  if (!validation.valid) {
    return { success: false, errors: validation.errors, validation };
  }

  const errors: TypedError[] = [];
  const expansion: Expansion = { instances: [], groups: new Map() };
  // needs are resolved after every group is known
  const pendingNeeds = new Map<string, { external: string[]; internal: string[]; callSite?: string; comboKey: string }>();

  for (const job of pipeline.jobs) {
    if (isCallJob(job)) {
      expandCallSite(job, templates, expansion, pendingNeeds, errors);
    } else {
      expandStepJob(job, expansion, pendingNeeds, errors);
    }
  }

  if (expansion.instances.length > SCHEMA_CONSTRAINTS.maxInstances) {
    errors.push(createTypedError({
      code: 'PLAN.TOO_MANY_INSTANCES',
      message: `Pipeline expands to ${expansion.instances.length} job instances (max ${SCHEMA_CONSTRAINTS.maxInstances})`,
    }));
  }

  const instances: Record<string, CompiledInstance> = {};
  for (const instance of expansion.instances) {
    const needs = pendingNeeds.get(instance.key);
    const resolved = new Set<string>();
    for (const dep of needs?.external ?? []) {
      for (const key of expansion.groups.get(dep) ?? []) resolved.add(key);
    }
    for (const dep of needs?.internal ?? []) {
      const scoped = `${needs?.callSite}/${dep}#${needs?.comboKey}`;
      const keys = expansion.groups.get(scoped);
      if (!keys) {
        errors.push(planUnknownDependencyError(instance.jobId, dep));
        continue;
      }
      for (const key of keys) resolved.add(key);
    }
    instance.needs = [...resolved];
    instances[instance.key] = instance;
  }

  if (errors.length > 0) {
    return { success: false, errors, validation };
  }

  const order = topologicalSort(Object.values(instances));
  if (!order) {
    const cycle = findCycle(Object.values(instances).map((i) => ({ id: i.key, needs: i.needs }))) ?? [];
    return { success: false, errors: [planCycleError(cycle)], validation };
  }

  const criticalRoots = pipeline.criticalJobs ?? pipeline.jobs.map((job) => job.id);
  const criticalPath = dependencyClosure(
    criticalRoots.flatMap((id) => expansion.groups.get(id) ?? []),
    instances,
  );

  const planHash = createHash('sha256')
    .update(JSON.stringify({ order, instances }))
    .digest('hex');

  return {
    success: true,
    plan: {
      pipeline: pipeline.name,
      instances,
      order,
      criticalPath: order.filter((key) => criticalPath.has(key)),
      planHash,
    },
    errors: [],
    validation,
  };
}

function expandStepJob(
  job: StepJobDefinition,
  expansion: Expansion,
  pendingNeeds: Map<string, { external: string[]; internal: string[]; callSite?: string; comboKey: string }>,
  errors: TypedError[],
): void {
  for (const matrix of expandMatrix(job.matrix)) {
    const matrixKey = matrixKeyOf(matrix);
    const key = instanceKeyOf(job.id, matrixKey);
    expansion.instances.push({
      key,
      jobId: job.id,
      name: job.name ?? job.id,
      matrix,
      matrixKey,
      steps: job.steps.map((step) => interpolateStep(step, matrix, job.id, errors)),
      needs: [],
      gate: job.if,
      requires: job.requires ?? 'success-or-skipped',
      secrets: job.secrets ?? [],
      variables: job.variables ?? [],
      permissions: resolvePermissions(job.permissions) ?? [...DEFAULT_PERMISSIONS],
      timeoutMs: job.timeoutMs,
    });
    addToGroup(expansion.groups, job.id, key);
    pendingNeeds.set(key, { external: job.needs ?? [], internal: [], comboKey: matrixKey });
  }
}

function expandCallSite(
  callSite: CallJobDefinition,
  templates: TemplateRegistry,
  expansion: Expansion,
  pendingNeeds: Map<string, { external: string[]; internal: string[]; callSite?: string; comboKey: string }>,
  errors: TypedError[],
): void {
  const template = templates.get(callSite.uses);
  if (!template) return; // reported by the validator

  const callerPermissions = resolvePermissions(callSite.permissions) ?? [...DEFAULT_PERMISSIONS];

  for (const callMatrix of expandMatrix(callSite.matrix)) {
    const comboKey = matrixKeyOf(callMatrix);
    const inputs = resolveInputs(callSite, template.inputs, callMatrix, errors);
    const templateJobs = template.jobs(inputs);
    const localIds = new Set(templateJobs.map((job) => job.id));

    for (const templateJob of templateJobs) {
      const jobId = `${callSite.id}/${templateJob.id}`;
      validateMatrixValues(jobId, templateJob.matrix, errors);
      for (const ownMatrix of expandMatrix(templateJob.matrix)) {
        const matrix = { ...callMatrix, ...ownMatrix };
        const matrixKey = matrixKeyOf(matrix);
        const key = instanceKeyOf(jobId, matrixKey);
        const ownPermissions = resolvePermissions(templateJob.permissions);

        expansion.instances.push({
          key,
          jobId,
          name: `${callSite.name ?? callSite.id} / ${templateJob.name ?? templateJob.id}`,
          callSite: callSite.id,
          matrix,
          matrixKey,
          steps: templateJob.steps.map((step) => interpolateStep(step, matrix, jobId, errors)),
          needs: [],
          gate: combineGates(callSite.if, templateJob.if),
          requires: templateJob.requires ?? callSite.requires ?? 'success-or-skipped',
          secrets: intersectGrants(templateJob.secrets, callSite.secrets),
          variables: intersectGrants(templateJob.variables, callSite.variables),
          permissions: ownPermissions
            ? ownPermissions.filter((p) => callerPermissions.includes(p))
            : callerPermissions,
          timeoutMs: templateJob.timeoutMs ?? callSite.timeoutMs,
        });
        addToGroup(expansion.groups, callSite.id, key);
        addToGroup(expansion.groups, `${callSite.id}/${templateJob.id}#${comboKey}`, key);

        const internal = (templateJob.needs ?? []).filter((dep) => {
          if (localIds.has(dep)) return true;
          errors.push(planUnknownDependencyError(jobId, dep));
          return false;
        });
        pendingNeeds.set(key, {
          external: callSite.needs ?? [],
          internal,
          callSite: callSite.id,
          comboKey,
        });
      }
    }
  }
}

function resolveInputs(
  callSite: CallJobDefinition,
  declared: Record<string, { type: 'string' | 'boolean'; default?: TemplateInputValue }>,
  matrix: Record<string, string>,
  errors: TypedError[],
): Record<string, TemplateInputValue> {
  const inputs: Record<string, TemplateInputValue> = {};
  for (const [name, definition] of Object.entries(declared)) {
    const provided = callSite.with?.[name];
    if (provided === undefined) {
      if (definition.default !== undefined) inputs[name] = definition.default;
      continue;
    }
    inputs[name] = typeof provided === 'string'
      ? interpolateMatrix(provided, matrix, callSite.id, errors)
      : provided;
  }
  return inputs;
}

/** Kahn's algorithm over instance keys. Returns null on a cycle. */
function topologicalSort(instances: CompiledInstance[]): string[] | null {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const instance of instances) {
    inDegree.set(instance.key, instance.needs.length);
    dependents.set(instance.key, []);
  }
  for (const instance of instances) {
    for (const dep of instance.needs) {
      dependents.get(dep)?.push(instance.key);
    }
  }

  const queue = instances.filter((i) => i.needs.length === 0).map((i) => i.key);
  const order: string[] = [];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    order.push(current);
    for (const next of dependents.get(current) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) queue.push(next);
    }
  }

  return order.length === instances.length ? order : null;
}

function dependencyClosure(roots: string[], instances: Record<string, CompiledInstance>): Set<string> {
  const closure = new Set<string>();
  const pending = [...roots];
  while (pending.length > 0) {
    const key = pending.pop();
    if (key === undefined || closure.has(key)) continue;
    closure.add(key);
    pending.push(...(instances[key]?.needs ?? []));
  }
  return closure;
}
