/**
 * Runtime configuration, read from environment variables.
 */

import { ShipwrightError, configError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export type FeatureFlags = {
  /** Force-update vX.Y.Z / vX.Y / vX tags after a tag release. */
  tagSync: boolean;
  /** Run the dependency audit job on pull requests. */
  dependencyAudit: boolean;
};

export interface ShipwrightConfig {
  port: number;
  logLevel: LogLevel;
  /** Upper bound on concurrently running job instances (runner pool size). */
  maxConcurrency: number;
  /** Default wall-clock timeout per job instance. */
  jobTimeoutMs: number;
  artifactRetentionDays: number;
  /** Repository identity gated jobs (the smoke test) are restricted to. */
  repository: string;
  /** Shared secret for GitHub webhook signatures; unset disables verification. */
  webhookSecret?: string;
  /** Root directory for per-instance workspaces of the process collaborators. */
  workdir: string;
  features: FeatureFlags;
  /** Run-scoped secrets, from SHIPWRIGHT_SECRET_<NAME>. */
  secrets: Record<string, string>;
  /** Repository variables, from SHIPWRIGHT_VAR_<NAME>. */
  variables: Record<string, string>;
}

const SECRET_PREFIX = 'SHIPWRIGHT_SECRET_';
const VARIABLE_PREFIX = 'SHIPWRIGHT_VAR_';

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ShipwrightError(configError(name, raw, `an integer >= ${min}`));
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ShipwrightError(configError(name, raw, 'true or false'));
  }
}

function readPrefixed(env: Env, prefix: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(prefix) && key.length > prefix.length && value !== undefined) {
      values[key.slice(prefix.length)] = value;
    }
  }
  return values;
}

/** Build the configuration from an environment map (defaults to process.env). */
export function loadConfig(env: Env = process.env): ShipwrightConfig {
  const rawLevel = env.SHIPWRIGHT_LOG_LEVEL;
  let logLevel = LogLevel.Info;
  if (rawLevel) {
    const parsed = parseLogLevel(rawLevel);
    if (!parsed) {
      throw new ShipwrightError(configError('SHIPWRIGHT_LOG_LEVEL', rawLevel, 'debug, info, warn or error'));
    }
    logLevel = parsed;
  }

  return {
    port: readInt(env, 'PORT', 5000),
    logLevel,
    maxConcurrency: readInt(env, 'SHIPWRIGHT_MAX_CONCURRENCY', 4, 1),
    jobTimeoutMs: readInt(env, 'SHIPWRIGHT_JOB_TIMEOUT_MS', 60 * 60 * 1000, 1),
    artifactRetentionDays: readInt(env, 'SHIPWRIGHT_ARTIFACT_RETENTION_DAYS', 5, 1),
    repository: env.SHIPWRIGHT_REPOSITORY ?? 'marked-space/marked-space',
    webhookSecret: env.SHIPWRIGHT_WEBHOOK_SECRET || undefined,
    workdir: env.SHIPWRIGHT_WORKDIR ?? '.shipwright',
    features: {
      tagSync: readBool(env, 'SHIPWRIGHT_FEATURE_TAG_SYNC', false),
      dependencyAudit: readBool(env, 'SHIPWRIGHT_FEATURE_AUDIT', false),
    },
    secrets: readPrefixed(env, SECRET_PREFIX),
    variables: readPrefixed(env, VARIABLE_PREFIX),
  };
}
