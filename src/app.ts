import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { createRateLimiter } from './middleware/rate-limit.middleware.js';
import { createAIRouter } from './modules/ai/ai.routes.js';
import authRoutes from './modules/auth/auth.routes.js';
import { createCostRouter } from './modules/cost/cost.routes.js';
import { createWorkspaceRouter } from './modules/workspace/workspace.routes.js';
import { createServices, type AppServices } from './services.js';

export function createApp(overrides: Partial<AppServices> = {}): Express {
  const services = createServices(overrides);
  const app = express();

  app.use(helmet());

  app.use(cors({
    origin: env.CORS_ORIGIN,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  const limiter = createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS });

  // Routes
  app.use('/api/auth', authRoutes);
  app.use('/api/workspace', createWorkspaceRouter(services));
  app.use('/api/cost', limiter, createCostRouter(services));
  app.use('/api/ai', limiter, createAIRouter(services));

  app.get('/health', (_req, res) => {
    res.json({ success: true, data: { status: 'ok' } });
  });

  // Error middleware MUST be the last one added
  app.use(errorMiddleware);

  return app;
}
