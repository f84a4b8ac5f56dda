/**
 * Run-time event model.
 *
 * Events are emitted for every run and job transition plus the side effects
 * that leave the core (artifacts, releases, tags).
 */

export type PipelineEventType =
  | 'run.created'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.canceled'
  | 'job.blocked'
  | 'job.started'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.skipped'
  | 'artifact.created'
  | 'release.published'
  | 'tags.synced';

export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  pipeline?: string;
  /** Job instance key. */
  jobId?: string;
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Restrict delivery to one run. */
  runId?: string;
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}
