import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import type { AppServices } from '../../services.js';
import { createCostController } from './cost.controller.js';

export function createCostRouter(services: AppServices): Router {
  const router = Router();
  const { getExpensiveQueries, getQueryDetails } = createCostController(services);

  /**
   * GET /api/cost/expensive-queries
   * Ranked most-expensive warehouse/user groups over the lookback window.
   */
  router.get('/expensive-queries', authenticate, getExpensiveQueries);

  /**
   * GET /api/cost/queries/:queryId
   * Full execution-history row of one query.
   */
  router.get('/queries/:queryId', authenticate, getQueryDetails);

  return router;
}
