/**
 * Built-in step types.
 */

import { registerCollaboratorSteps } from '../collaborators/steps';
import { registerArtifactSteps } from './artifact-steps';
import { registerReleaseSteps } from './release-steps';

export { collectFiles, commonDirectory, hashFiles } from './artifact-steps';
export { parseArtifactRefs } from './release-steps';

/** Register every built-in handler. Safe to call more than once. */
export function registerBuiltinStepHandlers(): void {
  registerArtifactSteps();
  registerReleaseSteps();
  registerCollaboratorSteps();
}
