import {
  LogEntry,
  LogLevel,
  clearSecretValues,
  createLogger,
  registerSecretValues,
  setLogHandler,
  setLogLevel,
} from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
    setLogLevel(LogLevel.Debug);
  });

  afterEach(() => {
    setLogHandler(() => {});
    setLogLevel(LogLevel.Info);
    clearSecretValues();
  });

  test('child loggers merge context fields', () => {
    const log = createLogger({ component: 'executor' }).child({ runId: 'run_1' });
    log.info('Job started', { job: 'format' });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe(LogLevel.Info);
    expect(entries[0]?.message).toBe('Job started');
    expect(entries[0]?.context).toEqual({ component: 'executor', runId: 'run_1', job: 'format' });
  });

  test('suppresses entries below the minimum level', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger();
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');
    expect(entries.map((e) => e.level)).toEqual([LogLevel.Warn, LogLevel.Error]);
  });

  test('masks registered secret values in messages and context', () => {
    registerSecretValues(['test-secret']);
    createLogger().warn('login with test-secret failed', { token: 'test-secret', attempts: 2 });

    expect(entries[0]?.message).toBe('login with *******cret failed');
    expect(entries[0]?.context).toEqual({ token: '*******cret', attempts: 2 });
  });

  test('masks secrets nested in objects and arrays', () => {
    registerSecretValues(['test-secret']);
    createLogger().error('Step failed', {
      error: { code: 'JOB.STEP_FAILED', details: { stderr: 'denied for test-secret' } },
      args: ['--token', 'test-secret'],
    });

    expect(entries[0]?.context).toEqual({
      error: { code: 'JOB.STEP_FAILED', details: { stderr: 'denied for *******cret' } },
      args: ['--token', '*******cret'],
    });
  });
});
