import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import type { AppServices } from '../../services.js';
import { createWorkspaceController } from './workspace.controller.js';

export function createWorkspaceRouter(services: AppServices): Router {
  const router = Router();
  const { addConnection, listConnections, switchConnection } = createWorkspaceController(services);

  // All routes here are protected by JWT authentication
  router.post('/add', authenticate, addConnection);
  router.get('/list', authenticate, listConnections);
  router.post('/switch', authenticate, switchConnection);

  return router;
}
