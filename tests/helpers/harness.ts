import { ShipwrightConfig, loadConfig } from '../../src/config';
import { AppContext, AppOverrides, createAppContext } from '../../src/server';
import {
  FakeCollaboratorOptions,
  FakeCollaborators,
  HEAD_COMMIT,
  InMemoryGitRemote,
  KeyedWorkspaces,
  MemoryGitClient,
} from './fakes';

export interface Harness {
  ctx: AppContext;
  collaborators: FakeCollaborators;
  workspaces: KeyedWorkspaces;
  remote: InMemoryGitRemote;
}

export function testConfig(overrides: Partial<ShipwrightConfig> = {}): ShipwrightConfig {
  return {
    ...loadConfig({}),
    repository: 'acme/marked-space',
    secrets: { API_USER: 'test-user', API_TOKEN: 'test-secret' },
    variables: { CONFLUENCE_HOST: 'confluence.test' },
    ...overrides,
  };
}

/** The whole system in process: memory store, memory workspaces, fakes. */
export function createHarness(options: {
  config?: Partial<ShipwrightConfig>;
  collaborators?: FakeCollaboratorOptions;
  remote?: InMemoryGitRemote;
  head?: string;
  overrides?: AppOverrides;
} = {}): Harness {
  const workspaces = new KeyedWorkspaces();
  const collaborators = new FakeCollaborators(workspaces, options.collaborators);
  const remote = options.remote ?? new InMemoryGitRemote();
  const ctx = createAppContext(testConfig(options.config), {
    collaborators,
    workspaces: workspaces.factory,
    git: () => new MemoryGitClient(remote, options.head ?? HEAD_COMMIT),
    ...options.overrides,
  });
  return { ctx, collaborators, workspaces, remote };
}
