import type { Response } from 'express';
import { z } from 'zod';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { AppServices } from '../../services.js';
import { NoActiveConnectionError } from '../workspace/workspace.service.js';
import { MAX_LOOKBACK_DAYS } from './cost-aggregator.js';

const flag = z.enum(['true', 'false']).transform((value) => value === 'true');

const ExpensiveQueriesSchema = z.object({
  days: z.coerce.number().int().min(1).max(MAX_LOOKBACK_DAYS, `days must be at most ${MAX_LOOKBACK_DAYS}`).optional(),
  top: z.coerce.number().int().positive().max(1000).optional(),
  limit: z.coerce.number().int().positive().optional(),
  metric: z.enum(['duration', 'cost_factor']).optional(),
  grouping: z.enum(['warehouse_user', 'warehouse_user_schema']).optional(),
  requireExecutionTime: flag.optional(),
  refresh: flag.optional()
});

const QueryIdSchema = z.string().trim().min(1, 'queryId is required').max(256);

function logControllerError(userId: string | undefined, operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[${new Date().toISOString()}] [COST-CONTROLLER] [USER-${userId ?? 'unknown'}] [${operation}] ${message}`);
}

export function createCostController({ connections, costService }: Pick<AppServices, 'connections' | 'costService'>) {
  /**
   * GET /api/cost/expensive-queries
   */
  const getExpensiveQueries = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    const validation = ExpensiveQueriesSchema.safeParse(req.query);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
      });
    }

    try {
      const { days, top, limit, metric, grouping, requireExecutionTime, refresh } = validation.data;
      const client = await connections.getClient(userId);
      const result = await costService.getExpensiveQueries(
        userId,
        client,
        { lookbackDays: days, topPerWarehouse: top, limit, metric, grouping, requireExecutionTime },
        { refresh }
      );

      if (!result.success) {
        return res.status(502).json({ success: false, error: 'Leaderboard unavailable', details: result.error });
      }

      const { success, ...data } = result;
      return res.json({ success, data });
    } catch (error) {
      logControllerError(userId, 'getExpensiveQueries', error);
      if (error instanceof NoActiveConnectionError) {
        return res.status(400).json({ success: false, error: 'Bad request', details: error.message });
      }
      return res.status(500).json({ success: false, error: 'Leaderboard failed', details: 'Internal server error' });
    }
  };

  /**
   * GET /api/cost/queries/:queryId
   */
  const getQueryDetails = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    const validation = QueryIdSchema.safeParse(req.params.queryId);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => issue.message).join(', ')
      });
    }

    try {
      const client = await connections.getClient(userId);
      const details = await costService.getQueryDetails(client, validation.data);
      if (!details) {
        return res.status(404).json({ success: false, error: 'Not found', details: `Query ${validation.data} not found in history` });
      }
      return res.json({ success: true, data: details });
    } catch (error) {
      logControllerError(userId, 'getQueryDetails', error);
      if (error instanceof NoActiveConnectionError) {
        return res.status(400).json({ success: false, error: 'Bad request', details: error.message });
      }
      return res.status(500).json({ success: false, error: 'Query lookup failed', details: 'Internal server error' });
    }
  };

  return { getExpensiveQueries, getQueryDetails };
}
