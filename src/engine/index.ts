export * from './state-machine';
export * from './workspace';
export * from './step-runner';
export * from './executor';
