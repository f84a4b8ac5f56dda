/**
 * Run API routes.
 *
 * GET /runs — List runs (optionally by pipeline)
 * GET /runs/:runId — Get run status with its job instances
 * POST /runs/:runId/cancel — Cancel a run
 * GET /runs/:runId/artifacts — List artifact slots written by a run
 * GET /runs/:runId/events — List events of a run
 */

import { Router } from 'express';
import { ArtifactSlot } from '../domain/artifact';
import { PipelineEventType } from '../domain/events';
import { ArtifactService } from '../artifacts/artifact-service';
import { DataPlanePublisher } from '../data-plane/publisher';
import { PipelineExecutor } from '../engine/executor';
import { toListResult } from '../storage/store';
import { intQuery, isRecord, sendError } from './middleware';

const VALID_EVENT_TYPES: ReadonlySet<string> = new Set<PipelineEventType>([
  'run.created', 'run.started', 'run.succeeded', 'run.failed', 'run.canceled',
  'job.blocked', 'job.started', 'job.succeeded', 'job.failed', 'job.skipped',
  'artifact.created', 'release.published', 'tags.synced',
]);

function isEventType(value: string): value is PipelineEventType {
  return VALID_EVENT_TYPES.has(value);
}

/** Slot metadata without file contents. */
export function summarizeSlot(slot: ArtifactSlot) {
  return {
    slotId: slot.slotId,
    key: slot.key,
    producedBy: slot.producedBy,
    createdAt: slot.createdAt,
    expiresAt: slot.expiresAt,
    files: slot.files.map((f) => ({ path: f.path, sizeBytes: f.sizeBytes, sha256: f.sha256 })),
  };
}

export function createRunRoutes(
  executor: PipelineExecutor,
  artifacts: ArtifactService,
  publisher: DataPlanePublisher,
): Router {
  const router = Router();

  router.get('/runs', async (req, res) => {
    try {
      const limit = intQuery(req.query.limit, 100, 1000);
      const offset = intQuery(req.query.offset, 0);
      const pipeline = typeof req.query.pipeline === 'string' ? req.query.pipeline : undefined;
      const all = await executor.listRuns({ pipeline, limit: Number.MAX_SAFE_INTEGER });
      res.json(toListResult(all.slice(offset, offset + limit), all.length, { limit, offset }));
    } catch (err) {
      sendError(res, err, 'Failed to list runs');
    }
  });

  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await executor.getRun(req.params.runId);
      res.json({ run });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run');
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Body: { canceledBy?, reason? }
   */
  router.post('/runs/:runId/cancel', async (req, res) => {
    try {
      const body: unknown = req.body;
      const canceledBy = isRecord(body) && typeof body.canceledBy === 'string' ? body.canceledBy : 'api';
      const reason = isRecord(body) && typeof body.reason === 'string' ? body.reason : undefined;
      const run = await executor.cancelRun({ runId: req.params.runId, canceledBy, reason });
      res.json({ run });
    } catch (err) {
      sendError(res, err, 'Run cancellation failed');
    }
  });

  router.get('/runs/:runId/artifacts', async (req, res) => {
    try {
      const run = await executor.getRun(req.params.runId);
      const slots = await artifacts.list(run.id);
      res.json({ artifacts: slots.map(summarizeSlot) });
    } catch (err) {
      sendError(res, err, 'Failed to fetch artifacts');
    }
  });

  /** GET /runs/:runId/events?types=job.failed,job.skipped */
  router.get('/runs/:runId/events', async (req, res) => {
    try {
      const run = await executor.getRun(req.params.runId);
      const eventTypes = typeof req.query.types === 'string'
        ? req.query.types.split(',').filter(isEventType)
        : undefined;
      const events = await publisher.getEventsByRun(run.id, eventTypes);
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run events');
    }
  });

  return router;
}
