/**
 * Typed error model.
 *
 * Failures are described by a namespaced code plus structured details so
 * callers (the executor, the HTTP layer, tests) can branch on the code
 * instead of parsing messages.
 *
 * Code namespaces:
 * - PLAN.*       plan-time fatal, raised before any job instance runs
 * - JOB.*        instance-fatal, fails one job instance
 * - ARTIFACT.*   artifact store integrity (write-once, not found)
 * - CACHE.*      advisory, never fails a run
 * - RELEASE.*    release composition
 * - VERSION.*    manifest version derivation
 * - SECRETS.*, PERMISSION.*, RUN.*, VALIDATION.*, AUTH.*, SYSTEM.*
 */

export type ErrorDomain =
  | 'PLAN'
  | 'JOB'
  | 'ARTIFACT'
  | 'CACHE'
  | 'RELEASE'
  | 'VERSION'
  | 'SECRETS'
  | 'PERMISSION'
  | 'RUN'
  | 'VALIDATION'
  | 'AUTH'
  | 'SYSTEM';

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and run records. */
export interface TypedError {
  /** Namespaced error code (e.g., "ARTIFACT.NOT_FOUND"). */
  code: string;
  message: string;
  /** Job instance key the error belongs to, if any. */
  jobId?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  jobId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for errors that carry a TypedError. */
export class ShipwrightError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ShipwrightError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Malformed pipeline definition or call-site inputs. Raised before execution. */
export class PlanError extends ShipwrightError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'PlanError';
  }
}

export class ArtifactError extends ShipwrightError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ArtifactError';
  }
}

export class VersionError extends ShipwrightError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'VersionError';
  }
}

export class ReleaseError extends ShipwrightError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ReleaseError';
  }
}

/** Extract a TypedError from anything thrown. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof ShipwrightError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
  });
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
    suggestedFixes: fixes,
  });
}

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
  });
}

export function configError(variable: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message: `Invalid value for ${variable}: "${value}" (expected ${expected})`,
    details: { variable, expected },
  });
}

// --- PLAN ---

export function planCycleError(jobIds: string[]): TypedError {
  return createTypedError({
    code: 'PLAN.CYCLE',
    message: `Circular dependency detected between jobs: ${jobIds.join(', ')}`,
    details: { jobIds },
  });
}

export function planUnknownDependencyError(jobId: string, dependency: string): TypedError {
  return createTypedError({
    code: 'PLAN.UNKNOWN_DEPENDENCY',
    message: `Job "${jobId}" depends on unknown job "${dependency}"`,
    jobId,
    details: { dependency },
  });
}

export function planMissingInputError(callSite: string, template: string, input: string): TypedError {
  return createTypedError({
    code: 'PLAN.MISSING_INPUT',
    message: `Call site "${callSite}" does not provide required input "${input}" of sub-pipeline "${template}"`,
    jobId: callSite,
    details: { template, input },
    suggestedFixes: [
      { type: 'ADD_INPUT', params: { input }, description: `Pass "${input}" in the call site's "with" block` },
    ],
  });
}

// --- JOB ---

export function jobTimeoutError(jobId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JOB.TIMEOUT',
    message: `Job instance "${jobId}" exceeded its timeout of ${timeoutMs}ms`,
    jobId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function secretMissingError(secretKey: string, jobId?: string): TypedError {
  return createTypedError({
    code: 'SECRETS.MISSING',
    message: `Required secret not found: ${secretKey}`,
    jobId,
    suggestedFixes: [
      { type: 'PROVIDE_SECRET', params: { key: secretKey }, description: `Provide value for secret "${secretKey}"` },
    ],
  });
}

export function permissionError(jobId: string, missing: string[]): TypedError {
  return createTypedError({
    code: 'PERMISSION.DENIED',
    message: `Job "${jobId}" lacks required permissions: ${missing.join(', ')}`,
    jobId,
    details: { missing },
  });
}

// --- ARTIFACT ---

export function artifactNotFoundError(slot: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.NOT_FOUND',
    message: `Artifact not found: ${slot}`,
    details: { slot },
  });
}

export function artifactExistsError(slot: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.ALREADY_EXISTS',
    message: `Artifact slot already written in this run: ${slot}`,
    details: { slot },
  });
}

// --- RUN ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    details: reason ? { reason } : undefined,
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_STATE_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    details: { from, to },
  });
}

/**
 * Mask a secret value, keeping only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of secret characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/** Mask secrets in every string inside a value; plain objects and arrays are copied. */
export function maskSecretsInValue(value: unknown, secrets: string[]): unknown {
  if (typeof value === 'string') return maskSecretsInMessage(value, secrets);
  if (Array.isArray(value)) return value.map((entry: unknown) => maskSecretsInValue(entry, secrets));
  if (isPlainRecord(value)) return maskSecretsInRecord(value, secrets);
  return value;
}

export function maskSecretsInRecord(record: Record<string, unknown>, secrets: string[]): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    masked[key] = maskSecretsInValue(entry, secrets);
  }
  return masked;
}

/** A copy of `error` with secret values masked in its message, details and fixes. */
export function maskTypedError(error: TypedError, secrets: string[]): TypedError {
  if (secrets.length === 0) return error;
  return {
    ...error,
    message: maskSecretsInMessage(error.message, secrets),
    details: error.details ? maskSecretsInRecord(error.details, secrets) : undefined,
    suggestedFixes: error.suggestedFixes.map((fix) => ({
      ...fix,
      params: maskSecretsInRecord(fix.params, secrets),
      description: fix.description === undefined ? undefined : maskSecretsInMessage(fix.description, secrets),
    })),
  };
}

export function isTypedError(value: unknown): value is TypedError {
  return isPlainRecord(value)
    && typeof value.code === 'string'
    && typeof value.message === 'string'
    && typeof value.retryable === 'boolean'
    && Array.isArray(value.suggestedFixes);
}

/**
 * Throw when `signal` has fired. The abort reason is kept when it is a
 * TypedError (timeouts and cancellations abort with one).
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw new ShipwrightError(isTypedError(reason)
    ? reason
    : createTypedError({
        code: 'JOB.ABORTED',
        message: reason instanceof Error ? reason.message : 'Operation aborted',
      }));
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
