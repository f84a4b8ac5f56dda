/**
 * Trigger API routes.
 *
 * POST /triggers — Start a run from a normalized trigger event
 * POST /webhooks/github — Start a run from a GitHub webhook delivery
 */

import { Router } from 'express';
import { ShipwrightError, apiError, authError, createTypedError, validationError } from '../domain/errors';
import { TriggerEvent, TriggerKind } from '../domain/pipeline';
import { PipelineRun } from '../domain/run';
import { PipelineExecutor } from '../engine/executor';
import { logger } from '../logger';
import { EVENT_HEADER, SIGNATURE_HEADER, normalizeGitHubEvent, verifySignature } from './github';
import { isRecord, rawBodyOf, sendError, stringMap } from './middleware';

const log = logger.child({ component: 'api' });

const TRIGGER_KINDS: ReadonlySet<string> = new Set<string>(Object.values(TriggerKind));

function isTriggerKind(value: unknown): value is TriggerKind {
  return typeof value === 'string' && TRIGGER_KINDS.has(value);
}

/** Validate a trigger from a request body. */
export function parseTrigger(body: unknown): TriggerEvent {
  if (!isRecord(body)) {
    throw new ShipwrightError(validationError('Request body must be an object'));
  }
  const { kind, ref, repository, commit, baseRef } = body;
  const errors: string[] = [];
  if (!isTriggerKind(kind)) errors.push(`kind must be one of ${[...TRIGGER_KINDS].join(', ')}`);
  if (typeof ref !== 'string' || !ref.startsWith('refs/')) errors.push('ref must be a full git ref');
  if (typeof repository !== 'string' || !repository.includes('/')) errors.push('repository must be "owner/name"');
  if (typeof commit !== 'string' || commit === '') errors.push('commit is required');
  if (baseRef !== undefined && (typeof baseRef !== 'string' || !baseRef.startsWith('refs/'))) errors.push('baseRef must be a full git ref');
  if (!isTriggerKind(kind) || typeof ref !== 'string' || typeof repository !== 'string' || typeof commit !== 'string' || errors.length > 0) {
    throw new ShipwrightError(validationError(`Invalid trigger: ${errors.join('; ')}`, { errors }));
  }
  return typeof baseRef === 'string' ? { kind, ref, repository, commit, baseRef } : { kind, ref, repository, commit };
}

export function createTriggerRoutes(executor: PipelineExecutor, options: { webhookSecret?: string }): Router {
  const router = Router();

  /** Execute in the background; the outcome is recorded on the run. */
  const startRun = (run: PipelineRun): void => {
    executor.executeRun(run.id).catch((err: unknown) => {
      log.error('Run execution failed', { runId: run.id, error: err instanceof Error ? err.message : String(err) });
    });
  };

  /**
   * POST /triggers
   * Body: { kind, ref, repository, commit, baseRef?, pipeline?, secrets?, variables? }
   */
  router.post('/triggers', async (req, res) => {
    try {
      const body: unknown = req.body;
      const trigger = parseTrigger(body);
      const run = await executor.createRun({
        trigger,
        pipeline: isRecord(body) && typeof body.pipeline === 'string' ? body.pipeline : undefined,
        secrets: isRecord(body) ? stringMap(body.secrets) : undefined,
        variables: isRecord(body) ? stringMap(body.variables) : undefined,
      });
      startRun(run);
      res.status(202).json({ run });
    } catch (err) {
      sendError(res, err, 'Run creation failed');
    }
  });

  /**
   * POST /webhooks/github
   * Verifies `x-hub-signature-256` when a webhook secret is configured.
   */
  router.post('/webhooks/github', async (req, res) => {
    try {
      if (options.webhookSecret) {
        const signature = req.get(SIGNATURE_HEADER);
        if (!verifySignature(options.webhookSecret, rawBodyOf(req) ?? Buffer.alloc(0), signature)) {
          res.status(401).json(apiError(
            signature
              ? createTypedError({ code: 'AUTH.INVALID_SIGNATURE', message: 'Webhook signature does not match' })
              : authError('Webhook signature required'),
          ));
          return;
        }
      }

      const event = req.get(EVENT_HEADER) ?? '';
      if (event === 'ping') {
        res.json({ ok: true });
        return;
      }

      const trigger = normalizeGitHubEvent(event, req.body);
      if (!trigger) {
        res.status(202).json({ ignored: true, event });
        return;
      }

      const run = await executor.createRun({ trigger });
      startRun(run);
      res.status(202).json({ run });
    } catch (err) {
      sendError(res, err, 'Webhook handling failed');
    }
  });

  return router;
}
