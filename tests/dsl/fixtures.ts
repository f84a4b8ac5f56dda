import { PipelineDefinition, StepJobDefinition, SubPipelineTemplate, TriggerKind } from '../../src/domain/pipeline';
import { TemplateRegistry } from '../../src/dsl/validator';

export function stepJob(id: string, overrides: Partial<StepJobDefinition> = {}): StepJobDefinition {
  return { id, steps: [{ name: 'work', uses: 'test.noop' }], ...overrides };
}

export function pipeline(jobs: PipelineDefinition['jobs'], overrides: Partial<PipelineDefinition> = {}): PipelineDefinition {
  return { name: 'test-pipeline', on: [TriggerKind.PushBranch], jobs, ...overrides };
}

/** compile → package, where package needs compile. */
export const twoStepTemplate: SubPipelineTemplate = {
  name: 'two-step',
  inputs: {
    target: { type: 'string', required: true },
    optimize: { type: 'boolean', default: false },
  },
  jobs: (inputs) => [
    {
      id: 'compile',
      steps: [{ name: 'compile', uses: 'test.noop', with: { target: String(inputs.target), optimize: inputs.optimize } }],
      secrets: ['TOKEN'],
    },
    {
      id: 'package',
      needs: ['compile'],
      steps: [{ name: 'package', uses: 'test.noop' }],
      permissions: ['contents:read', 'packages:write'],
    },
  ],
};

export const templates: TemplateRegistry = new Map([[twoStepTemplate.name, twoStepTemplate]]);
