/**
 * Pipeline executor: the orchestration core.
 *
 * Compiles the pipeline selected by a trigger into job instances, then
 * schedules them: an instance starts once every instance it needs is
 * terminal, gates are evaluated before anything else, failures skip their
 * dependents, and at most `maxConcurrency` instances run at once.
 *
 * Cancellation policy: scheduling stops at once and every pending or
 * blocked instance is skipped with reason `canceled`. Running instances
 * see their abort signal; the step in flight finishes, no further step
 * starts, and the instance records its own outcome. The run ends
 * `canceled`.
 */

import { v4 as uuid } from 'uuid';
import { PipelineEventType } from '../domain/events';
import {
  ShipwrightError,
  PlanError,
  TypedError,
  createTypedError,
  jobTimeoutError,
  maskTypedError,
  runCanceledError,
  runInvalidStateTransition,
  runNotFoundError,
  secretMissingError,
} from '../domain/errors';
import { CapabilityGrant, PipelineDefinition, TriggerEvent } from '../domain/pipeline';
import {
  CancelRunInput,
  CreateRunInput,
  JobInstance,
  JobStatus,
  PipelineRun,
  RunStatus,
  SkipReason,
} from '../domain/run';
import { CompiledInstance, ExecutionPlan, compilePipeline } from '../dsl/compiler';
import { evaluateGate } from '../dsl/gate';
import { TemplateRegistry } from '../dsl/validator';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger, registerSecretValues } from '../logger';
import { ListOptions, Store } from '../storage/store';
import { isTerminalJobStatus, isTerminalRunStatus, transitionJobStatus, transitionRunStatus } from './state-machine';
import { StepExecutionContext, StepServices, initialStepResults, runSteps } from './step-runner';
import { WorkspaceFactory, memoryWorkspaces } from './workspace';

export interface ExecutorConfig {
  /** Upper bound on concurrently running instances per run. */
  maxConcurrency: number;
  /** Default wall-clock timeout per instance. */
  jobTimeoutMs: number;
  features: Record<string, boolean>;
  /** Secrets every run starts with; per-run secrets override them. */
  secrets: Record<string, string>;
  variables: Record<string, string>;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  maxConcurrency: 4,
  jobTimeoutMs: 60 * 60 * 1000,
  features: {},
  secrets: {},
  variables: {},
};

export interface ExecutorDependencies {
  store: Store;
  publisher: DataPlanePublisher;
  services: StepServices;
  pipelines: PipelineDefinition[];
  templates: TemplateRegistry;
  workspaces?: WorkspaceFactory;
  logger?: Logger;
}

/** Executor-specific error wrapper. */
export class ExecutorError extends ShipwrightError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ExecutorError';
  }
}

/** In-memory state of a run being executed; never persisted. */
interface RunSession {
  plan: ExecutionPlan;
  secrets: Record<string, string>;
  variables: Record<string, string>;
  controllers: Map<string, AbortController>;
  cancel?: { canceledBy: string; reason?: string; at: string };
  wake?: () => void;
}

export class PipelineExecutor {
  private config: ExecutorConfig;
  private store: Store;
  private publisher: DataPlanePublisher;
  private services: StepServices;
  private pipelines: PipelineDefinition[];
  private templates: TemplateRegistry;
  private workspaces: WorkspaceFactory;
  private log: Logger;

  private sessions = new Map<string, RunSession>();
  /** Guard against concurrent executeRun calls on the same run. */
  private executions = new Map<string, Promise<PipelineRun>>();

  constructor(deps: ExecutorDependencies, config?: Partial<ExecutorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.store = deps.store;
    this.publisher = deps.publisher;
    this.services = deps.services;
    this.pipelines = deps.pipelines;
    this.templates = deps.templates;
    this.workspaces = deps.workspaces ?? memoryWorkspaces;
    this.log = (deps.logger ?? rootLogger).child({ component: 'executor' });
  }

  pipelineNames(): string[] {
    return this.pipelines.map((p) => p.name);
  }

  /** The pipeline a trigger runs: pinned by name, or the first listening on its kind. */
  selectPipeline(trigger: TriggerEvent, name?: string): PipelineDefinition {
    const pipeline = name
      ? this.pipelines.find((p) => p.name === name)
      : this.pipelines.find((p) => p.on.includes(trigger.kind));
    if (!pipeline || !pipeline.on.includes(trigger.kind)) {
      throw new PlanError(createTypedError({
        code: 'PLAN.NO_PIPELINE',
        message: name
          ? `Pipeline "${name}" does not exist or does not run on ${trigger.kind}`
          : `No pipeline runs on ${trigger.kind}`,
        details: { trigger: trigger.kind, pipeline: name, known: this.pipelines.map((p) => p.name) },
      }));
    }
    return pipeline;
  }

  /** Compile a pipeline, throwing the first plan error with all others in details. */
  compile(pipeline: PipelineDefinition): ExecutionPlan {
    const compilation = compilePipeline(pipeline, this.templates);
    const [first] = compilation.errors;
    if (!compilation.success || !compilation.plan) {
      throw new PlanError(first
        ? { ...first, details: { ...first.details, errors: compilation.errors } }
        : createTypedError({ code: 'PLAN.INVALID', message: `Pipeline "${pipeline.name}" failed to compile` }));
    }
    return compilation.plan;
  }

  /** Plan a run. Plan errors surface here, before any instance exists. */
  async createRun(input: CreateRunInput): Promise<PipelineRun> {
    const pipeline = this.selectPipeline(input.trigger, input.pipeline);
    const plan = this.compile(pipeline);

    const now = new Date().toISOString();
    const jobs: Record<string, JobInstance> = {};
    for (const key of plan.order) {
      const compiled = plan.instances[key];
      if (!compiled) continue;
      jobs[key] = {
        key,
        jobId: compiled.jobId,
        callSite: compiled.callSite,
        matrix: compiled.matrix,
        matrixKey: compiled.matrixKey,
        status: JobStatus.Pending,
        needs: compiled.needs,
        permissions: compiled.permissions,
        steps: initialStepResults(compiled.steps),
      };
    }

    const run: PipelineRun = {
      id: `run_${uuid()}`,
      pipeline: pipeline.name,
      trigger: input.trigger,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      jobs,
      order: plan.order,
      planHash: plan.planHash,
      criticalPath: plan.criticalPath,
    };

    const secrets = { ...this.config.secrets, ...input.secrets };
    registerSecretValues(Object.values(secrets));
    this.sessions.set(run.id, {
      plan,
      secrets,
      variables: { ...this.config.variables, ...input.variables },
      controllers: new Map(),
    });

    await this.store.runs.create(run);
    this.log.info('Run created', { runId: run.id, pipeline: run.pipeline, trigger: run.trigger.kind, instances: plan.order.length });
    await this.safePublishRunEvent(run, 'run.created');
    return run;
  }

  /** Execute a created run to completion. */
  async executeRun(runId: string): Promise<PipelineRun> {
    if (this.executions.has(runId)) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.ALREADY_RUNNING',
        message: `Run "${runId}" is already being executed`,
        runId,
      }));
    }
    const execution = this.executeRunInternal(runId).finally(() => {
      this.executions.delete(runId);
    });
    this.executions.set(runId, execution);
    return execution;
  }

  /** Create and execute in one call. */
  async runPipeline(input: CreateRunInput): Promise<PipelineRun> {
    const run = await this.createRun(input);
    return this.executeRun(run.id);
  }

  /** Resolves once the run's execution (if any is in progress) has finished. */
  async whenSettled(runId: string): Promise<PipelineRun | null> {
    const execution = this.executions.get(runId);
    if (execution) return execution;
    return this.store.runs.getById(runId);
  }

  async getRun(runId: string): Promise<PipelineRun> {
    const run = await this.store.runs.getById(runId);
    if (!run) throw new ExecutorError(runNotFoundError(runId));
    return run;
  }

  async listRuns(options?: ListOptions & { pipeline?: string }): Promise<PipelineRun[]> {
    const runs = await this.store.runs.list({ limit: 10_000 });
    const filtered = options?.pipeline ? runs.filter((r) => r.pipeline === options.pipeline) : runs;
    const offset = options?.offset ?? 0;
    return filtered.slice(offset, offset + (options?.limit ?? 100));
  }

  /** Request cancellation. See the module doc for the policy. */
  async cancelRun(input: CancelRunInput): Promise<PipelineRun> {
    const run = await this.getRun(input.runId);
    if (isTerminalRunStatus(run.status)) {
      throw new ExecutorError(runInvalidStateTransition(run.id, run.status, RunStatus.Canceled));
    }

    const cancel = { canceledBy: input.canceledBy, reason: input.reason, at: new Date().toISOString() };
    const session = this.sessions.get(run.id);

    if (session && this.executions.has(run.id)) {
      session.cancel = cancel;
      for (const controller of session.controllers.values()) {
        controller.abort(runCanceledError(run.id, input.reason));
      }
      session.wake?.();
      this.log.info('Run cancellation requested', { runId: run.id, canceledBy: input.canceledBy });
      return { ...run, canceledBy: cancel.canceledBy, canceledAt: cancel.at, cancelReason: cancel.reason };
    }

    // not executing: nothing is running, finish the cancellation here
    return this.finishCanceled(run, cancel);
  }

  private async executeRunInternal(runId: string): Promise<PipelineRun> {
    let run = await this.getRun(runId);
    let session = this.sessions.get(runId);
    if (!session) {
      // executor restarted since createRun: recompile, secrets are gone
      const pipeline = this.selectPipeline(run.trigger, run.pipeline);
      session = {
        plan: this.compile(pipeline),
        secrets: { ...this.config.secrets },
        variables: { ...this.config.variables },
        controllers: new Map(),
      };
      this.sessions.set(runId, session);
    }

    try {
      run = await this.transitionRun(run, RunStatus.Queued);
      if (session.cancel) return await this.finishCanceled(run, session.cancel);

      run = await this.transitionRun(run, RunStatus.Running);
      run.startedAt = new Date().toISOString();
      await this.persist(run);
      await this.safePublishRunEvent(run, 'run.started');
      this.log.info('Run started', { runId, pipeline: run.pipeline });

      await this.schedule(run, session);

      if (session.cancel) return await this.finishCanceled(run, session.cancel);
      return await this.finishRun(run, session.plan);
    } finally {
      this.sessions.delete(runId);
    }
  }

  /** Main scheduling loop; returns when every instance is terminal. */
  private async schedule(run: PipelineRun, session: RunSession): Promise<void> {
    const active = new Map<string, Promise<void>>();

    for (;;) {
      if (session.cancel) {
        await this.skipRemaining(run, 'canceled');
      } else {
        await this.advance(run, session, active);
      }

      if (active.size === 0) {
        const stuck = run.order.filter((key) => !isTerminalJobStatus(this.instance(run, key).status));
        if (stuck.length > 0 && !session.cancel) {
          // unreachable for an acyclic plan; skip rather than hang
          this.log.error('Scheduler made no progress', { runId: run.id, instances: stuck });
          await this.skipRemaining(run, 'upstream');
        }
        return;
      }

      await new Promise<void>((resolve) => {
        session.wake = resolve;
        for (const task of active.values()) void task.then(resolve);
      });
      session.wake = undefined;
    }
  }

  /** Resolve gates and dependencies, start what can start. */
  private async advance(run: PipelineRun, session: RunSession, active: Map<string, Promise<void>>): Promise<void> {
    for (const key of run.order) {
      const instance = this.instance(run, key);
      if (instance.status !== JobStatus.Pending && instance.status !== JobStatus.Blocked) continue;
      const compiled = session.plan.instances[key];
      if (!compiled) continue;

      if (!evaluateGate(compiled.gate, { trigger: run.trigger, features: this.config.features })) {
        await this.skip(run, instance, 'gate');
        continue;
      }

      const deps = instance.needs.map((dep) => this.instance(run, dep));
      const brokenUpstream = deps.some((dep) =>
        dep.status === JobStatus.Failed ||
        (dep.status === JobStatus.Skipped && dep.skipReason !== 'gate'));
      if (brokenUpstream) {
        await this.skip(run, instance, 'upstream');
        continue;
      }
      if (compiled.requires === 'success' && deps.some((dep) => dep.status === JobStatus.Skipped)) {
        // a strict dependent of a gated-off branch is gated off with it
        await this.skip(run, instance, 'gate');
        continue;
      }

      if (!deps.every((dep) => isTerminalJobStatus(dep.status))) {
        if (instance.status === JobStatus.Pending) {
          await this.transitionJob(run, instance, JobStatus.Blocked);
          await this.safePublishJobEvent(run, instance, 'job.blocked');
        }
        continue;
      }

      if (active.size >= this.config.maxConcurrency) continue;

      const task = this.runInstance(run, session, instance, compiled).catch((err: unknown) => {
        this.log.error('Instance execution crashed', {
          runId: run.id,
          job: key,
          error: err instanceof Error ? err.message : String(err),
        });
      }).finally(() => {
        active.delete(key);
      });
      active.set(key, task);
    }
  }

  private async runInstance(
    run: PipelineRun,
    session: RunSession,
    instance: JobInstance,
    compiled: CompiledInstance,
  ): Promise<void> {
    const log = this.log.child({ runId: run.id, job: instance.key });
    const controller = new AbortController();
    session.controllers.set(instance.key, controller);

    await this.transitionJob(run, instance, JobStatus.Running, { startedAt: new Date().toISOString() });
    await this.safePublishJobEvent(run, instance, 'job.started');
    log.info('Job started');

    const timeoutMs = compiled.timeoutMs ?? this.config.jobTimeoutMs;
    const results = initialStepResults(compiled.steps);
    const context = this.buildContext(run, session, compiled, controller.signal, log);

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([runSteps(compiled.steps, results, context), expired]);
    clearTimeout(timer);
    session.controllers.delete(instance.key);

    let status: JobStatus.Succeeded | JobStatus.Failed;
    let error: TypedError | undefined;
    if (outcome === 'timeout') {
      error = jobTimeoutError(instance.key, timeoutMs);
      controller.abort(error);
      status = JobStatus.Failed;
      for (const result of results) {
        if (result.startedAt && !result.completedAt) {
          result.status = 'failed';
          result.error = error;
        }
      }
    } else if (outcome.status === 'succeeded') {
      status = JobStatus.Succeeded;
    } else {
      status = JobStatus.Failed;
      error = outcome.error ?? (outcome.interrupted ? runCanceledError(run.id, session.cancel?.reason) : undefined);
    }

    // no secret value is recorded in an error
    const secretValues = Object.values(session.secrets);
    const steps = structuredClone(results).map((result) => (
      result.error ? { ...result, error: maskTypedError(result.error, secretValues) } : result
    ));
    const completedAt = new Date().toISOString();
    const startedAt = instance.startedAt ?? completedAt;
    await this.transitionJob(run, instance, status, {
      steps,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
      error: error
        ? maskTypedError({ ...error, runId: run.id, jobId: error.jobId ?? instance.key }, secretValues)
        : undefined,
    });
    await this.safePublishJobEvent(run, instance, status === JobStatus.Succeeded ? 'job.succeeded' : 'job.failed');
    if (status === JobStatus.Succeeded) {
      log.info('Job succeeded', { durationMs: instance.durationMs });
    } else {
      log.warn('Job failed', { code: error?.code, error: error?.message });
    }
  }

  /** Capability-scoped context: only the granted secrets and variables. */
  private buildContext(
    run: PipelineRun,
    session: RunSession,
    compiled: CompiledInstance,
    signal: AbortSignal,
    log: Logger,
  ): StepExecutionContext {
    const secrets = grantedValues(compiled.secrets, session.secrets);
    const variables = grantedValues(compiled.variables, session.variables);
    return {
      runId: run.id,
      instanceKey: compiled.key,
      jobId: compiled.jobId,
      callSite: compiled.callSite,
      matrix: compiled.matrix,
      matrixKey: compiled.matrixKey,
      trigger: run.trigger,
      features: this.config.features,
      permissions: compiled.permissions,
      workspace: this.workspaces(run.id, compiled.key),
      signal,
      logger: log,
      secret(name: string): string {
        const value = secrets[name];
        if (value === undefined) throw new ShipwrightError(secretMissingError(name, compiled.key));
        return value;
      },
      variable(name: string): string | undefined {
        return variables[name];
      },
      outputs: {},
      services: this.services,
    };
  }

  private async finishRun(run: PipelineRun, plan: ExecutionPlan): Promise<PipelineRun> {
    const failing = plan.criticalPath
      .map((key) => this.instance(run, key))
      .filter((i) => i.status === JobStatus.Failed || (i.status === JobStatus.Skipped && i.skipReason === 'upstream'));

    const target = failing.length > 0 ? RunStatus.Failed : RunStatus.Succeeded;
    if (target === RunStatus.Failed) {
      const firstFailure = failing.find((i) => i.status === JobStatus.Failed);
      run.error = createTypedError({
        code: 'RUN.FAILED',
        message: `Run failed: ${failing.map((i) => i.key).join(', ')}`,
        runId: run.id,
        details: { failed: failing.map((i) => i.key), cause: firstFailure?.error },
      });
    }
    run = await this.transitionRun(run, target);
    run.completedAt = new Date().toISOString();
    await this.persist(run);
    await this.safePublishRunEvent(run, target === RunStatus.Failed ? 'run.failed' : 'run.succeeded');
    this.log.info('Run finished', { runId: run.id, status: run.status });
    return run;
  }

  private async finishCanceled(
    run: PipelineRun,
    cancel: { canceledBy: string; reason?: string; at: string },
  ): Promise<PipelineRun> {
    await this.skipRemaining(run, 'canceled');
    run = await this.transitionRun(run, RunStatus.Canceled);
    run.canceledBy = cancel.canceledBy;
    run.cancelReason = cancel.reason;
    run.canceledAt = cancel.at;
    run.completedAt = new Date().toISOString();
    run.error = runCanceledError(run.id, cancel.reason);
    await this.persist(run);
    await this.safePublishRunEvent(run, 'run.canceled');
    this.log.info('Run canceled', { runId: run.id, canceledBy: cancel.canceledBy });
    this.sessions.delete(run.id);
    return run;
  }

  private async skipRemaining(run: PipelineRun, reason: SkipReason): Promise<void> {
    for (const key of run.order) {
      const instance = this.instance(run, key);
      if (instance.status === JobStatus.Pending || instance.status === JobStatus.Blocked) {
        await this.skip(run, instance, reason);
      }
    }
  }

  private async skip(run: PipelineRun, instance: JobInstance, reason: SkipReason): Promise<void> {
    await this.transitionJob(run, instance, JobStatus.Skipped, {
      skipReason: reason,
      completedAt: new Date().toISOString(),
    });
    await this.safePublishJobEvent(run, instance, 'job.skipped');
    this.log.info('Job skipped', { runId: run.id, job: instance.key, reason });
  }

  private instance(run: PipelineRun, key: string): JobInstance {
    const instance = run.jobs[key];
    if (!instance) {
      throw new ExecutorError(createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: `Run ${run.id} has no job instance "${key}"`,
        runId: run.id,
      }));
    }
    return instance;
  }

  private async transitionJob(
    run: PipelineRun,
    instance: JobInstance,
    target: JobStatus,
    fields: Partial<JobInstance> = {},
  ): Promise<void> {
    const result = transitionJobStatus(instance.status, target);
    if (!result.success) {
      throw new ExecutorError({ ...result.error, runId: run.id, jobId: instance.key });
    }
    Object.assign(instance, fields, { status: result.newStatus });
    await this.persist(run);
  }

  private async transitionRun(run: PipelineRun, target: RunStatus): Promise<PipelineRun> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new ExecutorError({ ...result.error, runId: run.id });
    }
    run.status = result.newStatus;
    run.updatedAt = new Date().toISOString();
    await this.persist(run);
    return run;
  }

  private async persist(run: PipelineRun): Promise<void> {
    await this.store.runs.update(run.id, run);
  }

  // Publishing is observational: a failing event store or subscriber must
  // not change the outcome of the run.

  private async safePublishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      this.log.warn('Failed to publish run event', { runId: run.id, eventType, error: errorMessage(err) });
    }
  }

  private async safePublishJobEvent(run: PipelineRun, instance: JobInstance, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishJobEvent(run, instance, eventType);
    } catch (err) {
      this.log.warn('Failed to publish job event', { runId: run.id, job: instance.key, eventType, error: errorMessage(err) });
    }
  }
}

/** The subset of `values` a grant allows. */
export function grantedValues(grant: CapabilityGrant, values: Record<string, string>): Record<string, string> {
  if (grant === 'inherit') return { ...values };
  const granted: Record<string, string> = {};
  for (const name of grant) {
    const value = values[name];
    if (value !== undefined) granted[name] = value;
  }
  return granted;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
