import type { Response } from 'express';
import { z } from 'zod';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import { WarehouseError, type WarehouseClient } from '../../core/warehouse-client.js';
import type { AppServices } from '../../services.js';
import { NoActiveConnectionError } from '../workspace/workspace.service.js';
import { OptimizationError } from './optimization.service.js';
import { extractTableReferences } from './table-extractor.js';

const ExtractTablesSchema = z.object({
  sql: z.string().min(1, 'sql cannot be empty').max(1_000_000)
});

const GroupSummarySchema = z.object({
  warehouseName: z.string().optional(),
  warehouseSize: z.string().nullable().optional(),
  userName: z.string().optional(),
  queryCount: z.number().int().nonnegative().optional(),
  durationSeconds: z.number().nonnegative().optional(),
  costFactor: z.number().nonnegative().optional(),
  minStartTime: z.string().nullable().optional(),
  maxEndTime: z.string().nullable().optional()
});

const OptimizeSchema = z.object({
  queryId: z.string().trim().min(1, 'queryId is required'),
  queryText: z.string().optional(),
  model: z.string().trim().min(1).max(100).optional(),
  group: GroupSummarySchema.optional()
});

function logControllerError(userId: string | undefined, operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[${new Date().toISOString()}] [AI-CONTROLLER] [USER-${userId ?? 'unknown'}] [${operation}] ${message}`);
}

function isSessionError(error: unknown): boolean {
  return error instanceof NoActiveConnectionError || error instanceof WarehouseError;
}

export function createAIController({
  connections,
  costService,
  aiService,
  optimizationService
}: AppServices) {
  // Without a session the analysis still runs on the supplied SQL; metadata and advice come back unavailable
  const openSession = async (userId: string): Promise<WarehouseClient | null> => {
    try {
      return await connections.getClient(userId);
    } catch (error) {
      if (!isSessionError(error)) throw error;
      logControllerError(userId, 'optimize', error);
      return null;
    }
  };

  /**
   * POST /api/ai/extract-tables
   */
  const extractTables = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const validation = ExtractTablesSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => issue.message).join(', ')
      });
    }

    return res.json({ success: true, data: { tables: extractTableReferences(validation.data.sql) } });
  };

  /**
   * POST /api/ai/optimize
   */
  const optimize = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    const validation = OptimizeSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => issue.message).join(', ')
      });
    }

    try {
      const client = await openSession(userId);
      const data = await optimizationService.analyze(userId, client, validation.data);
      return res.json({ success: true, data });
    } catch (error) {
      logControllerError(userId, 'optimize', error);
      if (error instanceof OptimizationError) {
        return res.status(400).json({ success: false, error: 'Bad request', details: error.message });
      }
      return res.status(500).json({ success: false, error: 'Optimization failed', details: 'Internal server error' });
    }
  };

  /**
   * GET /api/ai/stats
   */
  const getStats = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    return res.json({
      success: true,
      data: {
        aiService: aiService.getCacheStats(),
        costService: costService.getCacheStats()
      }
    });
  };

  return { extractTables, optimize, getStats };
}
