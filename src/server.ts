/**
 * Express server configuration.
 *
 * Assembles the services and the API surface. Every collaborator can be
 * replaced through `overrides`, which is how the tests run the whole
 * system in process.
 */

import express from 'express';
import { ShipwrightConfig, loadConfig } from './config';
import { PipelineDefinition } from './domain/pipeline';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { DataPlanePublisher } from './data-plane/publisher';
import { ArtifactService } from './artifacts/artifact-service';
import { ReleaseComposer } from './release/composer';
import { TagSynchronizer } from './release/tag-sync';
import { GitClient, ShellGitClient } from './release/git';
import { PipelineExecutor } from './engine/executor';
import { StepServices } from './engine/step-runner';
import { Workspace, WorkspaceFactory, directoryWorkspaces } from './engine/workspace';
import { Collaborators } from './collaborators/types';
import { ProcessCollaborators } from './collaborators/process';
import { TemplateRegistry } from './dsl/validator';
import { builtinPipelines, builtinTemplates } from './pipelines';
import { registerBuiltinStepHandlers } from './steps';
import { errorHandler, captureRawBody } from './api/middleware';
import { createTriggerRoutes } from './api/triggers';
import { createRunRoutes } from './api/runs';
import { createReleaseRoutes } from './api/releases';
import { logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: ShipwrightConfig;
  store: Store;
  publisher: DataPlanePublisher;
  artifacts: ArtifactService;
  releases: ReleaseComposer;
  tags: TagSynchronizer;
  executor: PipelineExecutor;
}

export interface AppOverrides {
  store?: Store;
  collaborators?: Collaborators;
  git?: (workspace: Workspace) => GitClient;
  workspaces?: WorkspaceFactory;
  pipelines?: PipelineDefinition[];
  templates?: TemplateRegistry;
}

function shellGit(workspace: Workspace): GitClient {
  if (!workspace.dir) {
    throw new Error('Tag synchronization needs a directory workspace');
  }
  return new ShellGitClient(workspace.dir);
}

/** Create the application context with all services. */
export function createAppContext(config: ShipwrightConfig = loadConfig(), overrides: AppOverrides = {}): AppContext {
  registerBuiltinStepHandlers();

  const store = overrides.store ?? createMemoryStore();
  const publisher = new DataPlanePublisher(store);
  const artifacts = new ArtifactService(store, publisher, { retentionDays: config.artifactRetentionDays });
  const releases = new ReleaseComposer(store, artifacts, publisher);
  const tags = new TagSynchronizer(publisher);

  const services: StepServices = {
    artifacts,
    releases,
    tags,
    collaborators: overrides.collaborators ?? new ProcessCollaborators(),
    git: overrides.git ?? shellGit,
  };

  const executor = new PipelineExecutor(
    {
      store,
      publisher,
      services,
      pipelines: overrides.pipelines ?? builtinPipelines({ repository: config.repository }),
      templates: overrides.templates ?? builtinTemplates(),
      workspaces: overrides.workspaces ?? directoryWorkspaces(config.workdir),
    },
    {
      maxConcurrency: config.maxConcurrency,
      jobTimeoutMs: config.jobTimeoutMs,
      features: { ...config.features },
      secrets: config.secrets,
      variables: config.variables,
    },
  );

  return { config, store, publisher, artifacts, releases, tags, executor };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '10mb', verify: captureRawBody }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  app.use('/api', createTriggerRoutes(ctx.executor, { webhookSecret: ctx.config.webhookSecret }));
  app.use('/api', createRunRoutes(ctx.executor, ctx.artifacts, ctx.publisher));
  app.use('/api', createReleaseRoutes(ctx.store));

  app.use(errorHandler);

  logger.debug('Application assembled', { pipelines: ctx.executor.pipelineNames() });
  return app;
}
