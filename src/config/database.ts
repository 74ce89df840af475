import pg, { type QueryResult, type QueryResultRow } from 'pg';
import { env } from './env.js';

const { Pool } = pg;

// Operator accounts and saved warehouse profiles live here, not in Snowflake
const metadataPool = new Pool({
  connectionString: env.METADATA_DB_URL,
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
  max: 10,
  idleTimeoutMillis: 30000,
});

metadataPool.on('error', (err) => {
  console.error(`[${new Date().toISOString()}] [METADATA-DB] Idle client error: ${err.message}`);
});

export const queryMetadata = <R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<R>> => metadataPool.query<R>(text, params);

export const closeMetadataPool = (): Promise<void> => metadataPool.end();
