/**
 * RUN, JOB and ARTIFACT error factories: codes, retryability and the
 * details the executor and the HTTP layer read back.
 */

import {
  artifactExistsError,
  artifactNotFoundError,
  jobTimeoutError,
  permissionError,
  runCanceledError,
  runInvalidStateTransition,
  runNotFoundError,
} from '../../src/domain/errors';

describe('runNotFoundError', () => {
  it('names the run', () => {
    const error = runNotFoundError('run_abc123');
    expect(error.code).toBe('RUN.NOT_FOUND');
    expect(error.message).toBe('Run not found: run_abc123');
    expect(error.runId).toBe('run_abc123');
    expect(error.retryable).toBe(false);
  });
});

describe('runCanceledError', () => {
  it('carries the reason when one is given', () => {
    const error = runCanceledError('run_1', 'wrong commit');
    expect(error.message).toBe('Run canceled: wrong commit');
    expect(error.details).toEqual({ reason: 'wrong commit' });
  });

  it('omits details without a reason', () => {
    const error = runCanceledError('run_1');
    expect(error.message).toBe('Run canceled');
    expect(error.details).toBeUndefined();
  });
});

describe('runInvalidStateTransition', () => {
  it('records both states', () => {
    const error = runInvalidStateTransition('run_1', 'succeeded', 'canceled');
    expect(error.code).toBe('RUN.INVALID_STATE_TRANSITION');
    expect(error.message).toBe('Cannot transition run from "succeeded" to "canceled"');
    expect(error.details).toEqual({ from: 'succeeded', to: 'canceled' });
  });
});

describe('jobTimeoutError', () => {
  it('is retryable and suggests doubling the timeout', () => {
    const error = jobTimeoutError('build/build[ubuntu-latest]', 5000);
    expect(error.code).toBe('JOB.TIMEOUT');
    expect(error.jobId).toBe('build/build[ubuntu-latest]');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ timeoutMs: 5000 });
    expect(error.suggestedFixes).toEqual([{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: 10000 } }]);
  });
});

describe('permissionError', () => {
  it('lists the missing grants', () => {
    const error = permissionError('release', ['contents:write', 'packages:write']);
    expect(error.code).toBe('PERMISSION.DENIED');
    expect(error.message).toBe('Job "release" lacks required permissions: contents:write, packages:write');
    expect(error.details).toEqual({ missing: ['contents:write', 'packages:write'] });
  });
});

describe('artifact errors', () => {
  it('distinguish a missing slot from a rewritten one', () => {
    expect(artifactNotFoundError('build/windows-latest')).toMatchObject({
      code: 'ARTIFACT.NOT_FOUND',
      details: { slot: 'build/windows-latest' },
    });
    expect(artifactExistsError('build/windows-latest')).toMatchObject({
      code: 'ARTIFACT.ALREADY_EXISTS',
      message: 'Artifact slot already written in this run: build/windows-latest',
    });
  });
});
