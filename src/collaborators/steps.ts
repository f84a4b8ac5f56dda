/**
 * Step handlers that delegate to the external collaborators.
 */

import { Permission } from '../domain/pipeline';
import {
  StepFailedError,
  booleanInput,
  registerStepHandler,
  requireStringInput,
  stringInput,
  stringListInput,
} from '../engine/step-runner';

const PUBLISH_PERMISSIONS: Permission[] = ['contents:read', 'packages:write', 'id-token:write'];

/** Keep the tail of command output in failure details. */
function tail(text: string, lines = 20): string {
  return text.split('\n').slice(-lines).join('\n');
}

export function registerCollaboratorSteps(): void {
  registerStepHandler({
    type: 'checkout',
    async execute(_step, ctx) {
      await ctx.services.collaborators.checkout(ctx.workspace, ctx.trigger, ctx.signal);
      return { outputs: { commit: ctx.trigger.commit } };
    },
  });

  registerStepHandler({
    type: 'run',
    inputContract: {
      command: { type: 'string', required: true },
      args: { type: 'array' },
    },
    async execute(step, ctx) {
      const command = requireStringInput(step, 'command');
      const args = stringListInput(step, 'args');
      const result = await ctx.services.collaborators.run(ctx.workspace, command, args, { signal: ctx.signal });
      if (result.exitCode !== 0) {
        throw new StepFailedError(`${[command, ...args].join(' ')} exited with code ${result.exitCode}`, {
          exitCode: result.exitCode,
          stderr: tail(result.stderr),
        });
      }
      return { outputs: { exitCode: 0 } };
    },
  });

  registerStepHandler({
    type: 'docker.publish',
    inputContract: {
      push: { type: 'boolean', required: true },
      image: { type: 'string' },
    },
    requiredPermissions: (step) => (booleanInput(step, 'push', false) ? PUBLISH_PERMISSIONS : []),
    async execute(step, ctx) {
      const image = stringInput(step, 'image') ?? `ghcr.io/${ctx.trigger.repository.toLowerCase()}:latest`;
      const result = await ctx.services.collaborators.publishImage(
        ctx.workspace,
        { push: booleanInput(step, 'push', false), image },
        ctx.signal,
      );
      return { outputs: { image: result.image, pushed: result.pushed } };
    },
  });

  registerStepHandler({
    type: 'smoke-test',
    inputContract: {
      'space-directory': { type: 'string', required: true },
    },
    async execute(step, ctx) {
      const confluenceHost = ctx.variable('CONFLUENCE_HOST');
      if (!confluenceHost) {
        throw new StepFailedError('Variable CONFLUENCE_HOST is not set', { variable: 'CONFLUENCE_HOST' });
      }
      const passed = await ctx.services.collaborators.smokeTest(
        ctx.workspace,
        {
          spaceDirectory: requireStringInput(step, 'space-directory'),
          confluenceHost,
          apiUser: ctx.secret('API_USER'),
          apiToken: ctx.secret('API_TOKEN'),
        },
        ctx.signal,
      );
      if (!passed) {
        throw new StepFailedError('Smoke test reported failure');
      }
      return { outputs: { passed } };
    },
  });
}
