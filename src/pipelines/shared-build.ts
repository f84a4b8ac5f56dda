/**
 * `shared-build`: checkout, cached clippy/build/test, and upload of the
 * executable into the artifact slot named by the target OS.
 */

import { StepJobDefinition, SubPipelineTemplate, TemplateInputValue } from '../domain/pipeline';

export const SHARED_BUILD = 'shared-build';

export const BINARY_NAME = 'marked-space';

const CARGO_CACHE_PATHS = [
  '.cargo/bin',
  '.cargo/registry/index',
  '.cargo/registry/cache',
  '.cargo/git/db',
  'target',
];

/** File name of the built executable on a runner OS. */
export function binaryFileName(os: string): string {
  return os.startsWith('windows') ? `${BINARY_NAME}.exe` : BINARY_NAME;
}

function buildJob(inputs: Record<string, TemplateInputValue>): StepJobDefinition {
  const os = String(inputs.os);
  const release = inputs.release === true;
  const profileArgs = release ? ['--release'] : [];
  const cache = { prefix: `${os}-cargo-`, 'hash-files': ['Cargo.lock'] };

  return {
    id: 'build',
    name: `Build (${os})`,
    steps: [
      { name: 'checkout', uses: 'checkout' },
      { name: 'restore cargo cache', uses: 'cache.restore', with: cache },
      {
        name: 'clippy',
        uses: 'run',
        with: { command: 'cargo', args: ['clippy', '--all-targets', '--all-features', '--', '-D', 'warnings'] },
      },
      { name: 'build', uses: 'run', with: { command: 'cargo', args: ['build', ...profileArgs] } },
      { name: 'test', uses: 'run', with: { command: 'cargo', args: ['test', ...profileArgs] } },
      { name: 'save cargo cache', uses: 'cache.save', with: { ...cache, paths: CARGO_CACHE_PATHS } },
      {
        name: 'upload executable',
        uses: 'artifact.upload',
        with: {
          name: os,
          path: `target/${release ? 'release' : 'debug'}/${binaryFileName(os)}`,
          'if-no-files-found': 'error',
        },
      },
    ],
  };
}

export const sharedBuildTemplate: SubPipelineTemplate = {
  name: SHARED_BUILD,
  inputs: {
    os: { type: 'string', required: true, description: 'Runner OS; also names the uploaded artifact' },
    release: { type: 'boolean', default: false, description: 'Build with the release profile' },
  },
  jobs: (inputs) => [buildJob(inputs)],
};
