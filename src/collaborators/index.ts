export * from './types';
export * from './process';
export { registerCollaboratorSteps } from './steps';
