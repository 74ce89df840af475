import { env } from './config/env.js';
import { connectionManager, type WarehouseClientProvider } from './core/connection-manager.js';
import { AIService } from './modules/ai/ai.service.js';
import { OptimizationService } from './modules/ai/optimization.service.js';
import { CostService } from './modules/cost/cost.service.js';

export interface AppServices {
  connections: WarehouseClientProvider;
  costService: CostService;
  aiService: AIService;
  optimizationService: OptimizationService;
}

/**
 * Wire the services from configuration. Tests swap the warehouse connections
 * for an in-process provider.
 */
export function createServices(overrides: Partial<AppServices> = {}): AppServices {
  const connections = overrides.connections ?? connectionManager;

  const costService =
    overrides.costService ??
    new CostService({
      defaults: {
        lookbackDays: env.LOOKBACK_DAYS,
        topPerWarehouse: env.LEADERBOARD_SIZE,
        metric: env.RANK_METRIC,
        grouping: env.GROUPING,
        requireExecutionTime: env.REQUIRE_EXECUTION_TIME,
        limit: env.LEADERBOARD_LIMIT
      },
      historyRowLimit: env.HISTORY_ROW_LIMIT,
      cacheTtlSeconds: env.LEADERBOARD_CACHE_TTL
    });

  const aiService =
    overrides.aiService ??
    new AIService({ cacheTtlSeconds: env.AI_CACHE_TTL, maxCacheSize: env.AI_MAX_CACHE_SIZE });

  const optimizationService =
    overrides.optimizationService ??
    new OptimizationService({
      costService,
      aiService,
      defaults: { database: env.DEFAULT_DATABASE ?? null, schema: env.DEFAULT_SCHEMA ?? null },
      defaultModel: env.CORTEX_MODEL
    });

  return { connections, costService, aiService, optimizationService };
}
