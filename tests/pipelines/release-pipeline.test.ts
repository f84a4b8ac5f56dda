/**
 * End-to-end runs of the release pipeline against fake collaborators.
 */

import { TriggerKind } from '../../src/domain/pipeline';
import { JobStatus, PipelineRun, RunStatus } from '../../src/domain/run';
import { compilePipeline } from '../../src/dsl/compiler';
import {
  RELEASE_PIPELINE,
  binaryFileName,
  builtinTemplates,
  createReleasePipeline,
  releaseArtifacts,
} from '../../src/pipelines';
import { createHarness } from '../helpers/harness';
import { HEAD_COMMIT, InMemoryGitRemote, makeTrigger } from '../helpers/fakes';

const UBUNTU = 'build/build[ubuntu-latest]';
const WINDOWS = 'build/build[windows-latest]';

function statuses(run: PipelineRun): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of run.order) {
    const job = run.jobs[key];
    if (!job) continue;
    result[key] = job.status === JobStatus.Skipped ? `skipped:${job.skipReason}` : job.status;
  }
  return result;
}

describe('release pipeline definition', () => {
  it('compiles into one instance per job and build target', () => {
    const compilation = compilePipeline(createReleasePipeline({ repository: 'acme/marked-space' }), builtinTemplates());

    expect(compilation.success).toBe(true);
    expect(compilation.plan?.order).toEqual([
      'format',
      'audit',
      UBUNTU,
      WINDOWS,
      'docker',
      'prerelease',
      'release',
      'smoke-test',
      'update-version-tags',
    ]);
    expect(compilation.plan?.instances.docker?.needs).toEqual([UBUNTU, WINDOWS]);
  });

  it('builds with the release profile and uploads the target executable', () => {
    const plan = compilePipeline(createReleasePipeline({ repository: 'acme/marked-space' }), builtinTemplates()).plan;
    const upload = plan?.instances[WINDOWS]?.steps.find((s) => s.uses === 'artifact.upload');

    expect(upload?.with).toEqual({ name: 'windows-latest', path: 'target/release/marked-space.exe', 'if-no-files-found': 'error' });
  });

  it('names one release asset per build target', () => {
    expect(binaryFileName('windows-latest')).toBe('marked-space.exe');
    expect(binaryFileName('ubuntu-latest')).toBe('marked-space');
    expect(releaseArtifacts()).toEqual([
      { name: 'ubuntu-latest', file: 'marked-space', 'call-site': 'build' },
      { name: 'windows-latest', file: 'marked-space.exe', 'call-site': 'build' },
    ]);
  });
});

describe('release pipeline runs', () => {
  it('pull request: checks and builds run, publishing is skipped', async () => {
    const { ctx, collaborators } = createHarness();

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PullRequest) });

    expect(run.pipeline).toBe(RELEASE_PIPELINE);
    expect(run.status).toBe(RunStatus.Succeeded);
    expect(statuses(run)).toEqual({
      format: 'succeeded',
      audit: 'skipped:gate',
      [UBUNTU]: 'succeeded',
      [WINDOWS]: 'succeeded',
      docker: 'skipped:gate',
      prerelease: 'skipped:gate',
      release: 'skipped:gate',
      'smoke-test': 'succeeded',
      'update-version-tags': 'skipped:gate',
    });
    expect(collaborators.commandsFor('format')).toEqual(['cargo fmt --all -- --check']);
    expect(collaborators.commandsFor(UBUNTU)).toEqual([
      'cargo clippy --all-targets --all-features -- -D warnings',
      'cargo build --release',
      'cargo test --release',
    ]);
    expect(collaborators.published).toEqual([]);
    expect(await ctx.store.releases.count()).toBe(0);
  });

  it('pull request with the audit flag runs cargo deny', async () => {
    const { ctx, collaborators } = createHarness({ config: { features: { tagSync: false, dependencyAudit: true } } });

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PullRequest) });

    expect(run.jobs.audit?.status).toBe(JobStatus.Succeeded);
    expect(collaborators.commandsFor('audit')).toEqual(['cargo deny check']);
  });

  it('smoke test is skipped for other repositories', async () => {
    const { ctx, collaborators } = createHarness();

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PullRequest, { repository: 'someone/fork' }) });

    expect(run.jobs['smoke-test']?.skipReason).toBe('gate');
    expect(collaborators.smokeTests).toEqual([]);
    expect(run.status).toBe(RunStatus.Succeeded);
  });

  it('push to main: image, smoke test and development build', async () => {
    const { ctx, collaborators } = createHarness();

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushBranch) });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(statuses(run)).toMatchObject({
      docker: 'succeeded',
      'smoke-test': 'succeeded',
      prerelease: 'succeeded',
      release: 'skipped:gate',
    });
    expect(collaborators.published).toEqual([{ push: true, image: 'ghcr.io/acme/marked-space:latest' }]);
    expect(collaborators.smokeTests).toEqual([
      { spaceDirectory: 'example/team', confluenceHost: 'confluence.test', apiUser: 'test-user', apiToken: 'test-secret' },
    ]);

    const latest = await ctx.releases.get('latest');
    expect(latest).toMatchObject({ prerelease: true, draft: false, commit: HEAD_COMMIT, runId: run.id });
    expect(latest?.assets.map((a) => a.name)).toEqual(['marked-space', 'marked-space.exe']);
  });

  it('tag push: builds, drafts the release and leaves matching tags alone', async () => {
    const remote = new InMemoryGitRemote();
    for (const tag of ['v1.4.0', 'v1.4', 'v1']) remote.tags.set(tag, HEAD_COMMIT);
    const { ctx } = createHarness({ remote, config: { features: { tagSync: true, dependencyAudit: false } } });

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushTag) });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(statuses(run)).toEqual({
      format: 'skipped:gate',
      audit: 'skipped:gate',
      [UBUNTU]: 'succeeded',
      [WINDOWS]: 'succeeded',
      docker: 'skipped:gate',
      prerelease: 'skipped:gate',
      release: 'succeeded',
      'smoke-test': 'skipped:gate',
      'update-version-tags': 'succeeded',
    });

    const release = await ctx.releases.get('v1.4.0');
    expect(release).toMatchObject({ title: 'v1.4.0', draft: true, prerelease: false });
    expect(release?.assets.map((a) => [a.name, a.sourceSlot])).toEqual([
      ['marked-space', 'build/ubuntu-latest'],
      ['marked-space.exe', 'build/windows-latest'],
    ]);
    expect(run.jobs['update-version-tags']?.steps[1]?.outputs).toMatchObject({ pushed: false, updated: [] });
    expect(remote.pushes).toBe(0);
  });

  it('tag push without tag sync leaves the tags job gated off', async () => {
    const { ctx, remote } = createHarness();

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushTag) });

    expect(run.jobs['update-version-tags']?.skipReason).toBe('gate');
    expect(run.status).toBe(RunStatus.Succeeded);
    expect(remote.pushes).toBe(0);
  });

  it('push to another branch runs nothing and publishes nothing', async () => {
    const { ctx, collaborators } = createHarness();

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushBranch, { ref: 'refs/heads/feature/x' }) });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(Object.values(statuses(run))).toEqual(new Array<string>(9).fill('skipped:gate'));
    expect(collaborators.published).toEqual([]);
    expect(collaborators.smokeTests).toEqual([]);
    expect(await ctx.releases.get('latest')).toBeNull();
  });

  it('pull request into another branch runs no checks', async () => {
    const { ctx, collaborators } = createHarness();

    const run = await ctx.executor.runPipeline({
      trigger: makeTrigger(TriggerKind.PullRequest, { baseRef: 'refs/heads/release-1.x' }),
    });

    expect(Object.values(statuses(run))).toEqual(new Array<string>(9).fill('skipped:gate'));
    expect(collaborators.commandsFor('format')).toEqual([]);
    expect(collaborators.smokeTests).toEqual([]);
  });

  it('a tag that is not a version drafts no release and moves no tags', async () => {
    const { ctx, remote } = createHarness({ config: { features: { tagSync: true, dependencyAudit: false } } });

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushTag, { ref: 'refs/tags/nightly' }) });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(statuses(run)).toMatchObject({ release: 'skipped:gate', 'update-version-tags': 'skipped:gate' });
    expect(await ctx.store.releases.count()).toBe(0);
    expect(remote.pushes).toBe(0);
  });

  it('a tag that disagrees with the manifest fails the release', async () => {
    const { ctx } = createHarness({ config: { features: { tagSync: true, dependencyAudit: false } } });

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushTag, { ref: 'refs/tags/v9.9.9' }) });

    expect(run.jobs.release?.error?.code).toBe('VERSION.TAG_MISMATCH');
    expect(run.jobs['update-version-tags']?.skipReason).toBe('upstream');
    expect(run.status).toBe(RunStatus.Failed);
    expect(await ctx.releases.get('v9.9.9')).toBeNull();
  });

  it('a failed windows build skips everything downstream and fails the run', async () => {
    const { ctx } = createHarness({
      collaborators: { fail: (call) => call.instanceKey === WINDOWS && call.args[0] === 'build' },
    });

    const run = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PushBranch) });

    expect(run.status).toBe(RunStatus.Failed);
    expect(statuses(run)).toMatchObject({
      [UBUNTU]: 'succeeded',
      [WINDOWS]: 'failed',
      docker: 'skipped:upstream',
      'smoke-test': 'skipped:upstream',
      prerelease: 'skipped:upstream',
      release: 'skipped:gate',
    });
    expect(run.jobs[WINDOWS]?.error?.message).toBe('cargo build --release exited with code 1');
    expect(run.jobs[WINDOWS]?.steps.map((s) => s.status)).toEqual([
      'succeeded',
      'succeeded',
      'succeeded',
      'failed',
      'not-run',
      'not-run',
      'not-run',
    ]);
    expect(await ctx.store.releases.count()).toBe(0);
    expect(await ctx.artifacts.list(run.id)).toHaveLength(1);
  });

  it('a second run restores the build cache', async () => {
    const { ctx } = createHarness();

    await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PullRequest) });
    const second = await ctx.executor.runPipeline({ trigger: makeTrigger(TriggerKind.PullRequest) });

    expect(second.jobs[UBUNTU]?.steps[1]?.outputs).toMatchObject({ hit: 'exact' });
    expect(second.jobs[UBUNTU]?.steps[5]?.outputs).toMatchObject({ result: 'exists' });
  });
});
