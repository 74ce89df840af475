import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const optionalIdentifier = z
  .string()
  .trim()
  .min(1)
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
  ENCRYPTION_KEY: z.string().regex(/^[0-9a-fA-F]{64}$/, "ENCRYPTION_KEY must be a 64-character hex string (32 bytes)"),
  METADATA_DB_URL: z.string().url("METADATA_DB_URL must be a valid connection string"),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Cortex advisory
  CORTEX_MODEL: z.string().min(1).default('claude-3-5-sonnet'),
  AI_CACHE_TTL: z.coerce.number().int().positive().default(3600),
  AI_MAX_CACHE_SIZE: z.coerce.number().int().positive().default(500),

  // Leaderboard
  LOOKBACK_DAYS: z.coerce.number().int().min(1).max(30).default(30),
  LEADERBOARD_SIZE: z.coerce.number().int().positive().default(20),
  LEADERBOARD_LIMIT: z.coerce.number().int().positive().optional(),
  RANK_METRIC: z.enum(['duration', 'cost_factor']).default('duration'),
  GROUPING: z.enum(['warehouse_user', 'warehouse_user_schema']).default('warehouse_user'),
  REQUIRE_EXECUTION_TIME: booleanFlag,
  HISTORY_ROW_LIMIT: z.coerce.number().int().positive().default(200000),
  LEADERBOARD_CACHE_TTL: z.coerce.number().int().positive().default(600),

  // Unqualified table references
  DEFAULT_DATABASE: optionalIdentifier,
  DEFAULT_SCHEMA: optionalIdentifier,

  WAREHOUSE_STATEMENT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  MAX_CONNECTIONS_PER_USER: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),
});

export type Env = z.infer<typeof envSchema>;

// Parse and export
const _env = envSchema.safeParse(process.env);

if (!_env.success) {
  console.error('❌ Invalid Environment Variables:', _env.error.format());
  process.exit(1); // Stop the server if config is wrong
}

export const env: Env = _env.data;
