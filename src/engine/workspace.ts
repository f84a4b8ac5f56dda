/**
 * Per-instance job workspaces.
 *
 * Every job instance gets its own workspace; nothing is shared between
 * instances except through the artifact store and the cache.
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { dirname, join, relative, resolve, sep } from 'path';

export interface Workspace {
  /** Directory on disk, or null for in-memory workspaces. */
  readonly dir: string | null;
  readFile(path: string): Promise<Uint8Array | null>;
  writeFile(path: string, content: Uint8Array | string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Files at or below `prefix`, as workspace-relative paths with forward slashes. */
  list(prefix?: string): Promise<string[]>;
}

export type WorkspaceFactory = (runId: string, instanceKey: string) => Workspace;

function normalize(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
}

function underPrefix(path: string, prefix: string): boolean {
  const p = normalize(prefix);
  return p === '' || path === p || path.startsWith(`${p}/`);
}

export class MemoryWorkspace implements Workspace {
  readonly dir = null;
  private files = new Map<string, Uint8Array>();

  constructor(initial: Record<string, Uint8Array | string> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.files.set(normalize(path), toBytes(content));
    }
  }

  async readFile(path: string): Promise<Uint8Array | null> {
    const content = this.files.get(normalize(path));
    return content ? new Uint8Array(content) : null;
  }

  async writeFile(path: string, content: Uint8Array | string): Promise<void> {
    this.files.set(normalize(path), toBytes(content));
  }

  async exists(path: string): Promise<boolean> {
    const p = normalize(path);
    if (this.files.has(p)) return true;
    return [...this.files.keys()].some((file) => file.startsWith(`${p}/`));
  }

  async list(prefix = ''): Promise<string[]> {
    return [...this.files.keys()].filter((file) => underPrefix(file, prefix)).sort();
  }
}

/** Workspace backed by a directory; paths may not escape it. */
export class DirectoryWorkspace implements Workspace {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  private resolvePath(path: string): string {
    const full = resolve(this.dir, path);
    if (full !== this.dir && !full.startsWith(this.dir + sep)) {
      throw new Error(`Path escapes the workspace: ${path}`);
    }
    return full;
  }

  async readFile(path: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.resolvePath(path)));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async writeFile(path: string, content: Uint8Array | string): Promise<void> {
    const full = this.resolvePath(path);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolvePath(path));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async list(prefix = ''): Promise<string[]> {
    const root = this.resolvePath(prefix);
    const files: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) await walk(full);
        else if (entry.isFile()) files.push(normalize(relative(this.dir, full)));
      }
    };
    try {
      const info = await stat(root);
      if (info.isFile()) return [normalize(relative(this.dir, root))];
      await walk(root);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return files.sort();
  }
}

export function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === 'string' ? new TextEncoder().encode(content) : new Uint8Array(content);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** One fresh in-memory workspace per instance. */
export const memoryWorkspaces: WorkspaceFactory = () => new MemoryWorkspace();

/** One directory per instance under `root`. */
export function directoryWorkspaces(root: string): WorkspaceFactory {
  return (runId, instanceKey) =>
    new DirectoryWorkspace(join(root, runId, instanceKey.replace(/[^A-Za-z0-9_.-]+/g, '_')));
}
