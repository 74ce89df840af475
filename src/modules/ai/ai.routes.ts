import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import type { AppServices } from '../../services.js';
import { createAIController } from './ai.controller.js';

export function createAIRouter(services: AppServices): Router {
  const router = Router();
  const { extractTables, optimize, getStats } = createAIController(services);

  /**
   * POST /api/ai/extract-tables
   * List the tables a SQL text references.
   */
  router.post('/extract-tables', authenticate, extractTables);

  /**
   * POST /api/ai/optimize
   * Gather table metadata for a sample query and ask Cortex for optimizations.
   */
  router.post('/optimize', authenticate, optimize);

  /**
   * GET /api/ai/stats
   * Return advisory and leaderboard cache metrics.
   */
  router.get('/stats', authenticate, getStats);

  return router;
}
