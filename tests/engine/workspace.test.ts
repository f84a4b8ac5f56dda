import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DirectoryWorkspace, MemoryWorkspace, Workspace, directoryWorkspaces } from '../../src/engine/workspace';

const text = (content: Uint8Array | null) => (content ? Buffer.from(content).toString('utf8') : null);

function contract(name: string, create: () => Promise<Workspace>): void {
  describe(name, () => {
    it('reads back what was written', async () => {
      const ws = await create();
      await ws.writeFile('target/release/marked-space', 'bin');

      expect(text(await ws.readFile('target/release/marked-space'))).toBe('bin');
      expect(await ws.readFile('missing')).toBeNull();
    });

    it('exists covers files and directories', async () => {
      const ws = await create();
      await ws.writeFile('target/release/marked-space', 'bin');

      expect(await ws.exists('target')).toBe(true);
      expect(await ws.exists('target/release/marked-space')).toBe(true);
      expect(await ws.exists('target/debug')).toBe(false);
    });

    it('lists files under a prefix, sorted', async () => {
      const ws = await create();
      await ws.writeFile('b.txt', '');
      await ws.writeFile('target/release/z', '');
      await ws.writeFile('target/release/a', '');
      await ws.writeFile('targets', '');

      expect(await ws.list('target')).toEqual(['target/release/a', 'target/release/z']);
      expect(await ws.list('b.txt')).toEqual(['b.txt']);
      expect(await ws.list('nothing')).toEqual([]);
      expect(await ws.list()).toEqual(['b.txt', 'target/release/a', 'target/release/z', 'targets']);
    });
  });
}

describe('workspaces', () => {
  const dirs: string[] = [];

  afterAll(async () => {
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  });

  contract('MemoryWorkspace', async () => new MemoryWorkspace());
  contract('DirectoryWorkspace', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shipwright-ws-'));
    dirs.push(dir);
    return new DirectoryWorkspace(dir);
  });

  it('MemoryWorkspace accepts initial files and normalizes separators', async () => {
    const ws = new MemoryWorkspace({ './Cargo.toml': 'x', 'target\\debug\\app.exe': 'y' });

    expect(await ws.list()).toEqual(['Cargo.toml', 'target/debug/app.exe']);
  });

  it('DirectoryWorkspace refuses paths outside its root', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shipwright-ws-'));
    dirs.push(dir);
    const ws = new DirectoryWorkspace(dir);

    await expect(ws.writeFile('../escape', 'x')).rejects.toThrow('Path escapes the workspace: ../escape');
  });

  it('directoryWorkspaces gives every instance its own directory', () => {
    const factory = directoryWorkspaces('/var/shipwright');

    expect(factory('run_1', 'build/build[ubuntu-latest]').dir).toBe('/var/shipwright/run_1/build_build_ubuntu-latest_');
  });
});
