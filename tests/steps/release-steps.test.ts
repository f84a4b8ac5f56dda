import { MemoryWorkspace } from '../../src/engine/workspace';
import { TriggerKind } from '../../src/domain/pipeline';
import { parseArtifactRefs, registerBuiltinStepHandlers } from '../../src/steps';
import { createStepContext, createTestServices, runStep } from '../helpers/context';
import { HEAD_COMMIT, makeTrigger, manifest } from '../helpers/fakes';

const bytes = (text: string) => new TextEncoder().encode(text);

const ARTIFACTS = [
  { name: 'ubuntu-latest', file: 'marked-space', 'call-site': 'build' },
  { name: 'windows-latest', file: 'marked-space.exe', 'call-site': 'build' },
];

beforeAll(() => {
  registerBuiltinStepHandlers();
});

async function withBinaries() {
  const testServices = createTestServices();
  const { artifacts } = testServices.services;
  await artifacts.put('run_test', { name: 'ubuntu-latest', callSite: 'build' }, [{ path: 'marked-space', content: bytes('elf') }], 'build/build[ubuntu-latest]');
  await artifacts.put('run_test', { name: 'windows-latest', callSite: 'build' }, [{ path: 'marked-space.exe', content: bytes('pe32') }], 'build/build[windows-latest]');
  return testServices;
}

describe('parseArtifactRefs', () => {
  it('maps entries to slot references', () => {
    expect(parseArtifactRefs([{ name: 'linux', file: 'app', 'call-site': 'build', 'matrix-value': 'x' }, { name: 'site', file: 'index.html' }])).toEqual([
      { slot: { name: 'linux', callSite: 'build', matrixValue: 'x' }, file: 'app' },
      { slot: { name: 'site' }, file: 'index.html' },
    ]);
  });

  it('rejects malformed input', () => {
    expect(() => parseArtifactRefs('linux')).toThrow('"artifacts" must be a list');
    expect(() => parseArtifactRefs([{ name: 'linux' }])).toThrow('artifacts[0] needs string "name" and "file"');
    expect(() => parseArtifactRefs([null])).toThrow('artifacts[0] needs string "name" and "file"');
  });
});

describe('release.compose', () => {
  it('publishes the development build from both binaries', async () => {
    const { services, store } = await withBinaries();

    const { result } = await runStep(
      { name: 'release', uses: 'release.compose', with: { mode: 'prerelease', artifacts: ARTIFACTS } },
      createStepContext(services, { instanceKey: 'prerelease' }),
    );

    expect(result?.outputs).toEqual({ release: 'latest', assets: ['marked-space', 'marked-space.exe'] });
    expect((await store.releases.getById('latest'))?.commit).toBe(HEAD_COMMIT);
  });

  it('drafts a tag release from the manifest in the workspace', async () => {
    const { services } = await withBinaries();

    const { result } = await runStep(
      { name: 'release', uses: 'release.compose', with: { mode: 'tag', artifacts: ARTIFACTS } },
      createStepContext(services, {
        trigger: makeTrigger(TriggerKind.PushTag),
        workspace: new MemoryWorkspace({ 'Cargo.toml': manifest('1.4.0') }),
      }),
    );

    expect(result?.outputs).toEqual({ release: 'v1.4.0', assets: ['marked-space', 'marked-space.exe'] });
  });

  it('fails a tag release without a manifest', async () => {
    const { services } = await withBinaries();

    const { outcome } = await runStep(
      { name: 'release', uses: 'release.compose', with: { mode: 'tag', artifacts: ARTIFACTS } },
      createStepContext(services, { trigger: makeTrigger(TriggerKind.PushTag) }),
    );

    expect(outcome.error).toMatchObject({
      code: 'JOB.STEP_FAILED',
      message: 'Manifest not found in workspace: Cargo.toml',
      details: { step: 'release', path: 'Cargo.toml' },
    });
  });

  it('needs contents:write', async () => {
    const { services } = await withBinaries();

    const { outcome } = await runStep(
      { name: 'release', uses: 'release.compose', with: { mode: 'prerelease', artifacts: ARTIFACTS } },
      createStepContext(services, { permissions: ['contents:read'] }),
    );

    expect(outcome.error).toMatchObject({ code: 'PERMISSION.DENIED', details: { missing: ['contents:write'] } });
  });

  it('rejects an unknown mode before running', async () => {
    const { services, store } = await withBinaries();

    const { outcome } = await runStep(
      { name: 'release', uses: 'release.compose', with: { mode: 'final', artifacts: ARTIFACTS } },
      createStepContext(services),
    );

    expect(outcome.error?.code).toBe('JOB.INVALID_STEP_INPUT');
    expect(await store.releases.count()).toBe(0);
  });
});

describe('tags.sync', () => {
  it('moves the version tags to the checked-out commit', async () => {
    const { services, remote } = createTestServices();

    const { result } = await runStep(
      { name: 'sync', uses: 'tags.sync' },
      createStepContext(services, { workspace: new MemoryWorkspace({ 'Cargo.toml': manifest('3.2.1') }) }),
    );

    expect(result?.outputs).toEqual({
      version: '3.2.1',
      tags: ['v3.2.1', 'v3.2', 'v3'],
      pushed: true,
      updated: ['v3.2.1', 'v3.2', 'v3'],
    });
    expect(remote.tags.get('v3')).toBe(HEAD_COMMIT);
  });
});
