import snowflake from 'snowflake-sdk';
import { isRecord } from './row-values.js';

export type WarehouseBind = string | number;

/**
 * One result row, keyed by lower-cased column name.
 */
export type WarehouseRow = Record<string, unknown>;

export interface WarehouseResult {
  columns: string[];
  rows: WarehouseRow[];
}

/**
 * Read contract of the warehouse collaborator. The active session is passed
 * around as one of these instead of living in module state.
 */
export interface WarehouseClient {
  query(sql: string, binds?: WarehouseBind[]): Promise<WarehouseResult>;
}

export class WarehouseError extends Error {
  constructor(
    message: string,
    readonly code: 'WAREHOUSE_CONNECTION_FAILED' | 'WAREHOUSE_QUERY_FAILED',
    readonly details?: string
  ) {
    super(message);
    this.name = 'WarehouseError';
  }
}

// Snowflake's expired-session, missing-session and expired-token codes, plus the driver's terminated-connection code
const SESSION_LOST_CODES = new Set(['390111', '390112', '390114', '407002']);
const SESSION_LOST_MESSAGE =
  /session (?:has expired|no longer exists|does not exist)|authentication token has expired|terminated connection|connection (?:already|has been) terminated/i;

/**
 * True when a driver error means the session is gone and a new login is needed.
 */
export function isSessionLost(err: { message: string; code?: unknown }): boolean {
  return (err.code != null && SESSION_LOST_CODES.has(String(err.code))) || SESSION_LOST_MESSAGE.test(err.message);
}

type SnowflakeConnection = ReturnType<typeof snowflake.createConnection>;
export type SnowflakeConnectionOptions = Parameters<typeof snowflake.createConnection>[0];

/**
 * Lower-case column names the way the history and catalog views are addressed
 * throughout the code base (Snowflake returns them upper-cased).
 */
export function normalizeRows(rawRows: unknown[]): WarehouseResult {
  const rows: WarehouseRow[] = [];
  for (const raw of rawRows) {
    if (!isRecord(raw)) continue;
    rows.push(Object.fromEntries(Object.entries(raw).map(([key, value]) => [key.toLowerCase(), value])));
  }
  const columns = rows.length ? Object.keys(rows[0]) : [];
  return { columns, rows };
}

export class SnowflakeWarehouseClient implements WarehouseClient {
  private constructor(private readonly connection: SnowflakeConnection) {}

  /**
   * Open a session and bound every statement by the configured timeout.
   */
  static async connect(
    options: SnowflakeConnectionOptions,
    statementTimeoutSeconds: number
  ): Promise<SnowflakeWarehouseClient> {
    const connection = snowflake.createConnection(options);

    await new Promise<void>((resolve, reject) => {
      connection.connect((err) => {
        if (err) {
          reject(new WarehouseError(`Failed to connect to Snowflake: ${err.message}`, 'WAREHOUSE_CONNECTION_FAILED', err.message));
          return;
        }
        resolve();
      });
    });

    const client = new SnowflakeWarehouseClient(connection);
    try {
      await client.query(`ALTER SESSION SET STATEMENT_TIMEOUT_IN_SECONDS = ${Math.trunc(statementTimeoutSeconds)}`);
    } catch (err) {
      await client.close().catch((closeError: unknown) => {
        console.error(`[${new Date().toISOString()}] [WAREHOUSE] Error closing half-open session: ${closeError instanceof Error ? closeError.message : String(closeError)}`);
      });
      throw err;
    }
    return client;
  }

  query(sql: string, binds?: WarehouseBind[]): Promise<WarehouseResult> {
    return new Promise<WarehouseResult>((resolve, reject) => {
      this.connection.execute({
        sqlText: sql,
        binds,
        complete: (err, _statement, rawRows) => {
          if (err) {
            const code = isSessionLost(err) ? 'WAREHOUSE_CONNECTION_FAILED' : 'WAREHOUSE_QUERY_FAILED';
            reject(new WarehouseError(`Warehouse query failed: ${err.message}`, code, err.message));
            return;
          }
          const rows: unknown[] = Array.isArray(rawRows) ? rawRows : [];
          resolve(normalizeRows(rows));
        }
      });
    });
  }

  close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.connection.destroy((err) => {
        if (err) {
          reject(new WarehouseError(`Failed to close Snowflake session: ${err.message}`, 'WAREHOUSE_CONNECTION_FAILED', err.message));
          return;
        }
        resolve();
      });
    });
  }
}
