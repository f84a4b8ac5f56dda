import { PipelineDefinition, SubPipelineTemplate } from '../domain/pipeline';
import { TemplateRegistry } from '../dsl/validator';
import { ReleasePipelineOptions, createReleasePipeline } from './release-pipeline';
import { sharedBuildTemplate } from './shared-build';

export * from './shared-build';
export {
  RELEASE_PIPELINE,
  BUILD_TARGETS,
  createReleasePipeline,
  releaseArtifacts,
} from './release-pipeline';
export type { ReleasePipelineOptions } from './release-pipeline';

export function builtinTemplates(): TemplateRegistry {
  const templates: SubPipelineTemplate[] = [sharedBuildTemplate];
  return new Map(templates.map((t) => [t.name, t]));
}

export function builtinPipelines(options: ReleasePipelineOptions): PipelineDefinition[] {
  return [createReleasePipeline(options)];
}
