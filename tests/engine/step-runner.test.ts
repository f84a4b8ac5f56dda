import { StepDescriptor } from '../../src/domain/pipeline';
import { ArtifactError, artifactNotFoundError } from '../../src/domain/errors';
import {
  StepFailedError,
  getStepHandler,
  initialStepResults,
  registerStepHandler,
  runSteps,
  stringListInput,
} from '../../src/engine/step-runner';
import { createStepContext, createTestServices } from '../helpers/context';

describe('runSteps', () => {
  const executed: string[] = [];

  beforeAll(() => {
    registerStepHandler({
      type: 'test.record',
      async execute(step) {
        executed.push(step.name);
        return { outputs: { name: step.name } };
      },
    });
    registerStepHandler({
      type: 'test.fail',
      async execute() {
        throw new StepFailedError('exit code 2', { exitCode: 2 });
      },
    });
    registerStepHandler({
      type: 'test.crash',
      async execute() {
        throw new Error('unexpected');
      },
    });
    registerStepHandler({
      type: 'test.typed',
      async execute() {
        throw new ArtifactError(artifactNotFoundError('build/linux'));
      },
    });
    registerStepHandler({
      type: 'test.contract',
      inputContract: {
        mode: { type: 'string', required: true, oneOf: ['a', 'b'] },
        count: { type: 'number' },
      },
      async execute() {
        return {};
      },
    });
    registerStepHandler({
      type: 'test.privileged',
      requiredPermissions: () => ['packages:write'],
      async execute() {
        return {};
      },
    });
  });

  beforeEach(() => {
    executed.length = 0;
  });

  function steps(...uses: string[]): StepDescriptor[] {
    return uses.map((u, i) => ({ name: `s${i + 1}`, uses: u }));
  }

  test('runs every step in order and records outputs', async () => {
    const list = steps('test.record', 'test.record', 'test.record');
    const results = initialStepResults(list);
    const ctx = createStepContext(createTestServices().services);

    const outcome = await runSteps(list, results, ctx);

    expect(outcome).toEqual({ status: 'succeeded', interrupted: false });
    expect(executed).toEqual(['s1', 's2', 's3']);
    expect(results.map((r) => r.status)).toEqual(['succeeded', 'succeeded', 'succeeded']);
    expect(ctx.outputs).toEqual({ s1: { name: 's1' }, s2: { name: 's2' }, s3: { name: 's3' } });
  });

  test('the first failure stops the instance and later steps are not run', async () => {
    const list = steps('test.record', 'test.fail', 'test.record');
    const results = initialStepResults(list);

    const outcome = await runSteps(list, results, createStepContext(createTestServices().services, { instanceKey: 'build[linux]' }));

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toMatchObject({
      code: 'JOB.STEP_FAILED',
      message: 'exit code 2',
      jobId: 'build[linux]',
      details: { step: 's2', exitCode: 2 },
    });
    expect(executed).toEqual(['s1']);
    expect(results.map((r) => r.status)).toEqual(['succeeded', 'failed', 'not-run']);
    expect(results[2]?.startedAt).toBeUndefined();
  });

  test('plain errors become JOB.STEP_FAILED', async () => {
    const list = steps('test.crash');
    const outcome = await runSteps(list, initialStepResults(list), createStepContext(createTestServices().services));
    expect(outcome.error?.code).toBe('JOB.STEP_FAILED');
    expect(outcome.error?.message).toBe('unexpected');
  });

  test('typed errors keep their code', async () => {
    const list = steps('test.typed');
    const outcome = await runSteps(list, initialStepResults(list), createStepContext(createTestServices().services));
    expect(outcome.error?.code).toBe('ARTIFACT.NOT_FOUND');
    expect(outcome.error?.jobId).toBe('job');
  });

  test('unknown step types fail with JOB.NO_HANDLER', async () => {
    const list = steps('test.unregistered');
    const outcome = await runSteps(list, initialStepResults(list), createStepContext(createTestServices().services));
    expect(outcome.error?.code).toBe('JOB.NO_HANDLER');
  });

  test('inputs are checked against the handler contract', async () => {
    const list: StepDescriptor[] = [{ name: 'c', uses: 'test.contract', with: { mode: 'z', count: 'three' } }];
    const outcome = await runSteps(list, initialStepResults(list), createStepContext(createTestServices().services));
    expect(outcome.error?.code).toBe('JOB.INVALID_STEP_INPUT');
    expect(outcome.error?.details).toEqual({
      step: 'c',
      errors: ['"mode" must be one of a, b', '"count" must be number, got string'],
    });
  });

  test('missing required inputs are reported', async () => {
    const list: StepDescriptor[] = [{ name: 'c', uses: 'test.contract' }];
    const outcome = await runSteps(list, initialStepResults(list), createStepContext(createTestServices().services));
    expect(outcome.error?.details).toEqual({ step: 'c', errors: ['"mode" is required'] });
  });

  test('steps needing ungranted permissions fail with PERMISSION.DENIED', async () => {
    const list = steps('test.privileged');
    const outcome = await runSteps(
      list,
      initialStepResults(list),
      createStepContext(createTestServices().services, { permissions: ['contents:read'] }),
    );
    expect(outcome.error?.code).toBe('PERMISSION.DENIED');
    expect(outcome.error?.details).toEqual({ missing: ['packages:write'] });
  });

  test('an aborted signal starts no further steps', async () => {
    const controller = new AbortController();
    registerStepHandler({
      type: 'test.abort-after',
      async execute() {
        controller.abort();
        return {};
      },
    });
    const list = steps('test.abort-after', 'test.record');
    const results = initialStepResults(list);

    const outcome = await runSteps(list, results, createStepContext(createTestServices().services, { signal: controller.signal }));

    expect(outcome).toEqual({ status: 'failed', interrupted: true });
    expect(results.map((r) => r.status)).toEqual(['succeeded', 'not-run']);
    expect(executed).toEqual([]);
  });
});

describe('handler registry and input helpers', () => {
  test('registering again replaces the handler', async () => {
    registerStepHandler({ type: 'test.replace', async execute() { return { outputs: { v: 1 } }; } });
    registerStepHandler({ type: 'test.replace', async execute() { return { outputs: { v: 2 } }; } });
    const list: StepDescriptor[] = [{ name: 'r', uses: 'test.replace' }];
    const ctx = createStepContext(createTestServices().services);

    await runSteps(list, initialStepResults(list), ctx);

    expect(getStepHandler('test.replace')?.type).toBe('test.replace');
    expect(ctx.outputs).toEqual({ r: { v: 2 } });
  });

  test('stringListInput accepts a single string or a list', () => {
    expect(stringListInput({ name: 's', uses: 'x', with: { p: 'a' } }, 'p')).toEqual(['a']);
    expect(stringListInput({ name: 's', uses: 'x', with: { p: ['a', 1, 'b'] } }, 'p')).toEqual(['a', 'b']);
    expect(stringListInput({ name: 's', uses: 'x' }, 'p')).toEqual([]);
  });
});
