/**
 * Release API routes.
 *
 * GET /releases — List release records
 * GET /releases/:id — Get one release record by tag or rolling identifier
 */

import { Router } from 'express';
import { ShipwrightError, notFoundError } from '../domain/errors';
import { Store, toListResult } from '../storage/store';
import { intQuery, sendError } from './middleware';

export function createReleaseRoutes(store: Store): Router {
  const router = Router();

  router.get('/releases', async (req, res) => {
    try {
      const limit = intQuery(req.query.limit, 100, 1000);
      const offset = intQuery(req.query.offset, 0);
      const [releases, total] = await Promise.all([
        store.releases.list({ limit, offset }),
        store.releases.count(),
      ]);
      res.json(toListResult(releases, total, { limit, offset }));
    } catch (err) {
      sendError(res, err, 'Failed to list releases');
    }
  });

  router.get('/releases/:id', async (req, res) => {
    try {
      const release = await store.releases.getById(req.params.id);
      if (!release) throw new ShipwrightError(notFoundError('Release', req.params.id));
      res.json({ release });
    } catch (err) {
      sendError(res, err, 'Failed to fetch release');
    }
  });

  return router;
}
