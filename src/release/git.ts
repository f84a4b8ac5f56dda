/**
 * Git access for the tag synchronizer.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface GitClient {
  headCommit(): Promise<string>;
  /** Commit each tag points at on the remote; absent tags are omitted. */
  remoteTagCommits(tags: string[]): Promise<Record<string, string>>;
  /** Create or move a local tag. */
  forceTag(tag: string, commit: string): Promise<void>;
  /** Force-push all given tags in one push. */
  forcePush(tags: string[]): Promise<void>;
}

/** GitClient backed by the `git` executable in a working tree. */
export class ShellGitClient implements GitClient {
  constructor(
    private cwd: string,
    private remote = 'origin',
  ) {}

  private async git(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync('git', args, {
      cwd: this.cwd,
      encoding: 'utf-8',
      maxBuffer: 10 * 1024 * 1024,
    });
    return stdout.trim();
  }

  async headCommit(): Promise<string> {
    return this.git(['rev-parse', 'HEAD']);
  }

  async remoteTagCommits(tags: string[]): Promise<Record<string, string>> {
    const output = await this.git(['ls-remote', '--tags', this.remote, ...tags.map((t) => `refs/tags/${t}`)]);
    return parseLsRemote(output);
  }

  async forceTag(tag: string, commit: string): Promise<void> {
    await this.git(['tag', '-f', tag, commit]);
  }

  async forcePush(tags: string[]): Promise<void> {
    await this.git(['push', '--force', this.remote, ...tags.map((t) => `refs/tags/${t}`)]);
  }
}

/**
 * Parse `git ls-remote --tags` output. Peeled entries (`^{}`) win over the
 * tag object id, so annotated tags report the commit they point at.
 */
export function parseLsRemote(output: string): Record<string, string> {
  const commits: Record<string, string> = {};
  const peeled = new Set<string>();
  for (const line of output.split('\n')) {
    const [sha, ref] = line.trim().split(/\s+/);
    if (!sha || !ref?.startsWith('refs/tags/')) continue;
    const isPeeled = ref.endsWith('^{}');
    const tag = ref.slice('refs/tags/'.length).replace(/\^\{\}$/, '');
    if (isPeeled) {
      commits[tag] = sha;
      peeled.add(tag);
    } else if (!peeled.has(tag)) {
      commits[tag] = sha;
    }
  }
  return commits;
}
