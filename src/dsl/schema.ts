/**
 * Pipeline definition constraints.
 */

/** Job ids: letters, digits, dash and underscore. "/" is reserved for expanded template jobs. */
export const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** `${{ matrix.<axis> }}` references inside call-site inputs and step inputs. */
export const MATRIX_REFERENCE_PATTERN = /\$\{\{\s*matrix\.([A-Za-z0-9_-]+)\s*\}\}/g;

/** Joins matrix values into an instance key, so no value may contain it. */
export const MATRIX_KEY_SEPARATOR = ', ';

export const VALID_TEMPLATE_INPUT_TYPES = ['string', 'boolean'] as const;

export const SCHEMA_CONSTRAINTS = {
  maxJobs: 100,
  /** Values per matrix axis. */
  maxMatrixValues: 32,
  /** Job instances per run after all expansion. */
  maxInstances: 64,
  maxStepsPerJob: 100,
  minTimeoutMs: 1,
  maxTimeoutMs: 6 * 60 * 60 * 1000,
} as const;
