/**
 * Shipwright: build-test-release pipeline orchestrator.
 *
 * Public exports for programmatic use. The HTTP server starts from
 * `main.ts`.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppOverrides } from './server';
export { loadConfig } from './config';
export type { ShipwrightConfig, FeatureFlags } from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './storage';
export * from './data-plane/publisher';
export * from './artifacts/artifact-service';
export * from './release';
export * from './collaborators';
export * from './steps';
export * from './pipelines';
