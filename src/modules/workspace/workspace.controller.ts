import type { Response } from 'express';
import { z } from 'zod';
import { env } from '../../config/env.js';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { AppServices } from '../../services.js';
import {
  ConnectionProfileSchema,
  activateConnection,
  countConnections,
  listConnectionsForUser,
  saveConnection
} from './workspace.service.js';

const AddConnectionSchema = z.object({
  label: z.string().trim().min(1, 'label is required').max(100),
  profile: ConnectionProfileSchema
});

const SwitchConnectionSchema = z.object({
  connectionId: z.string().uuid('connectionId must be a UUID')
});

function logControllerError(userId: string | undefined, operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[${new Date().toISOString()}] [WORKSPACE-CONTROLLER] [USER-${userId ?? 'unknown'}] [${operation}] ${message}`);
}

export function createWorkspaceController({ connections, costService }: Pick<AppServices, 'connections' | 'costService'>) {
  /**
   * POST /api/workspace/add
   */
  const addConnection = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    const validation = AddConnectionSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
      });
    }

    try {
      const count = await countConnections(userId);
      if (count >= env.MAX_CONNECTIONS_PER_USER) {
        return res.status(400).json({
          success: false,
          error: 'Bad request',
          details: `Maximum limit of ${env.MAX_CONNECTIONS_PER_USER} warehouse profiles reached.`
        });
      }

      // The first profile becomes the active one
      await saveConnection(userId, validation.data.label, validation.data.profile, count === 0);
      return res.status(201).json({ success: true, data: { message: 'Warehouse profile saved successfully.' } });
    } catch (error) {
      logControllerError(userId, 'addConnection', error);
      return res.status(500).json({ success: false, error: 'Failed to save profile', details: 'Internal server error' });
    }
  };

  /**
   * GET /api/workspace/list
   */
  const listConnections = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    try {
      return res.json({ success: true, data: await listConnectionsForUser(userId) });
    } catch (error) {
      logControllerError(userId, 'listConnections', error);
      return res.status(500).json({ success: false, error: 'Failed to fetch profiles', details: 'Internal server error' });
    }
  };

  /**
   * POST /api/workspace/switch
   */
  const switchConnection = async (req: AuthRequest, res: Response): Promise<Response | void> => {
    const userId = req.user?.userId;
    if (!userId) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
    }

    const validation = SwitchConnectionSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: validation.error.issues.map((issue) => issue.message).join(', ')
      });
    }

    try {
      const switched = await activateConnection(userId, validation.data.connectionId);
      if (!switched) {
        return res.status(404).json({ success: false, error: 'Not found', details: 'Profile not found or access denied' });
      }

      // After activation, so a login racing the switch cannot cache the old profile
      await connections.closeClient(userId);
      costService.invalidateUserCache(userId);
      return res.json({ success: true, data: { message: 'Workspace switched successfully.' } });
    } catch (error) {
      logControllerError(userId, 'switchConnection', error);
      return res.status(500).json({ success: false, error: 'Failed to switch workspace', details: 'Internal server error' });
    }
  };

  return { addConnection, listConnections, switchConnection };
}
