import { createHash } from 'node:crypto';
import NodeCache from 'node-cache';
import { toDateOrNull, toNumber, toNumberOrNull, toStringOrNull } from '../../core/row-values.js';
import type { WarehouseClient, WarehouseRow } from '../../core/warehouse-client.js';
import { aggregateExpensiveQueries } from './cost-aggregator.js';
import type {
  ExecutionRecord,
  Leaderboard,
  LeaderboardOptions,
  LeaderboardResult,
  QueryDetails
} from './types/cost.types.js';

const HISTORY_VIEW = 'SNOWFLAKE.ACCOUNT_USAGE.QUERY_HISTORY';

const EXECUTION_RECORDS_SQL = `
SELECT
    warehouse_name,
    warehouse_size,
    database_name,
    schema_name,
    user_name,
    query_id,
    query_text,
    total_elapsed_time,
    execution_time,
    start_time,
    end_time,
    execution_status,
    bytes_spilled_to_local_storage,
    bytes_spilled_to_remote_storage,
    CURRENT_TIMESTAMP() AS observed_at
FROM ${HISTORY_VIEW}
WHERE
    warehouse_name IS NOT NULL
    AND execution_status = 'SUCCESS'
    AND start_time >= DATEADD(DAY, -?, CURRENT_TIMESTAMP())
ORDER BY start_time, query_id
LIMIT ?`;

const QUERY_DETAILS_SQL = `
SELECT
    QUERY_ID,
    QUERY_TEXT,
    QUERY_TYPE,
    WAREHOUSE_NAME,
    WAREHOUSE_SIZE,
    USER_NAME,
    ROLE_NAME,
    DATABASE_NAME,
    SCHEMA_NAME,
    TOTAL_ELAPSED_TIME / 1000 AS duration_seconds,
    BYTES_SCANNED,
    BYTES_SPILLED_TO_LOCAL_STORAGE,
    BYTES_SPILLED_TO_REMOTE_STORAGE,
    PARTITIONS_SCANNED,
    PARTITIONS_TOTAL,
    ROWS_PRODUCED,
    ROWS_INSERTED,
    ROWS_UPDATED,
    ROWS_DELETED,
    COMPILATION_TIME / 1000 AS compilation_time_seconds,
    EXECUTION_TIME / 1000 AS execution_time_seconds,
    QUEUED_OVERLOAD_TIME / 1000 AS queued_time_seconds,
    TRANSACTION_BLOCKED_TIME / 1000 AS blocked_time_seconds,
    START_TIME,
    END_TIME,
    EXECUTION_STATUS
FROM ${HISTORY_VIEW}
WHERE QUERY_ID = ?`;

export interface CostServiceOptions {
  defaults: LeaderboardOptions;
  historyRowLimit: number;
  cacheTtlSeconds: number;
  now?: () => Date;
}

export function mapExecutionRecord(row: WarehouseRow): ExecutionRecord {
  return {
    warehouseName: toStringOrNull(row.warehouse_name),
    warehouseSize: toStringOrNull(row.warehouse_size),
    databaseName: toStringOrNull(row.database_name),
    schemaName: toStringOrNull(row.schema_name),
    userName: toStringOrNull(row.user_name) ?? '',
    queryId: toStringOrNull(row.query_id) ?? '',
    queryText: toStringOrNull(row.query_text) ?? '',
    totalElapsedTime: toNumber(row.total_elapsed_time),
    executionTime: toNumberOrNull(row.execution_time),
    startTime: toDateOrNull(row.start_time),
    endTime: toDateOrNull(row.end_time),
    executionStatus: toStringOrNull(row.execution_status) ?? '',
    bytesSpilledToLocalStorage: toNumber(row.bytes_spilled_to_local_storage),
    bytesSpilledToRemoteStorage: toNumber(row.bytes_spilled_to_remote_storage)
  };
}

export function mapQueryDetails(row: WarehouseRow): QueryDetails {
  return {
    queryId: toStringOrNull(row.query_id) ?? '',
    queryText: toStringOrNull(row.query_text) ?? '',
    queryType: toStringOrNull(row.query_type),
    warehouseName: toStringOrNull(row.warehouse_name),
    warehouseSize: toStringOrNull(row.warehouse_size),
    userName: toStringOrNull(row.user_name),
    roleName: toStringOrNull(row.role_name),
    databaseName: toStringOrNull(row.database_name),
    schemaName: toStringOrNull(row.schema_name),
    durationSeconds: toNumberOrNull(row.duration_seconds),
    bytesScanned: toNumberOrNull(row.bytes_scanned),
    bytesSpilledToLocalStorage: toNumberOrNull(row.bytes_spilled_to_local_storage),
    bytesSpilledToRemoteStorage: toNumberOrNull(row.bytes_spilled_to_remote_storage),
    partitionsScanned: toNumberOrNull(row.partitions_scanned),
    partitionsTotal: toNumberOrNull(row.partitions_total),
    rowsProduced: toNumberOrNull(row.rows_produced),
    rowsInserted: toNumberOrNull(row.rows_inserted),
    rowsUpdated: toNumberOrNull(row.rows_updated),
    rowsDeleted: toNumberOrNull(row.rows_deleted),
    compilationTimeSeconds: toNumberOrNull(row.compilation_time_seconds),
    executionTimeSeconds: toNumberOrNull(row.execution_time_seconds),
    queuedTimeSeconds: toNumberOrNull(row.queued_time_seconds),
    blockedTimeSeconds: toNumberOrNull(row.blocked_time_seconds),
    startTime: toDateOrNull(row.start_time),
    endTime: toDateOrNull(row.end_time),
    executionStatus: toStringOrNull(row.execution_status)
  };
}

export class CostService {
  private readonly cache: NodeCache;
  private readonly defaults: LeaderboardOptions;
  private readonly historyRowLimit: number;
  private readonly now: () => Date;

  private hits = 0;
  private misses = 0;

  constructor(options: CostServiceOptions) {
    this.defaults = options.defaults;
    this.historyRowLimit = options.historyRowLimit;
    this.now = options.now ?? (() => new Date());
    this.cache = new NodeCache({ stdTTL: options.cacheTtlSeconds, checkperiod: 120, useClones: false });
  }

  /**
   * Build the most-expensive-queries leaderboard for the operator's warehouse account.
   * Warehouse failures come back as `success: false`, never as a thrown error.
   */
  async getExpensiveQueries(
    userId: string,
    client: WarehouseClient,
    overrides: Partial<LeaderboardOptions> = {},
    { refresh = false }: { refresh?: boolean } = {}
  ): Promise<LeaderboardResult> {
    const startedAt = Date.now();
    const options = this.resolveOptions(overrides);
    const cacheKey = this.getCacheKey(userId, options);

    if (!refresh) {
      const cached = this.cache.get<Leaderboard>(cacheKey);
      if (cached) {
        this.hits += 1;
        this.log(userId, 'getExpensiveQueries', 'SUCCESS', Date.now() - startedAt, 'Cache:HIT');
        return { ...cached, cached: true };
      }
    }

    this.misses += 1;

    try {
      // One row past the cap tells a complete window apart from a truncated one
      const result = await client.query(EXECUTION_RECORDS_SQL, [options.lookbackDays, this.historyRowLimit + 1]);
      if (result.rows.length > this.historyRowLimit) {
        const error =
          `Execution history exceeds ${this.historyRowLimit} rows for the ${options.lookbackDays}-day window; ` +
          'narrow the window or raise HISTORY_ROW_LIMIT';
        this.log(userId, 'getExpensiveQueries', 'ERROR', Date.now() - startedAt, error);
        return { success: false, error };
      }

      const records = result.rows.map(mapExecutionRecord);
      // Close the window on the warehouse clock, the one the SQL lower bound used
      const windowEnd = toDateOrNull(result.rows[0]?.observed_at) ?? this.now();
      const generatedAt = this.now();
      const groups = aggregateExpensiveQueries(records, { ...options, now: windowEnd });
      const leaderboard: Leaderboard = {
        success: true,
        groups,
        options,
        generatedAt,
        cached: false
      };

      this.cache.set<Leaderboard>(cacheKey, leaderboard);
      this.log(
        userId,
        'getExpensiveQueries',
        'SUCCESS',
        Date.now() - startedAt,
        `Records:${records.length} Groups:${groups.length}`
      );
      return leaderboard;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown warehouse error';
      this.log(userId, 'getExpensiveQueries', 'ERROR', Date.now() - startedAt, message);
      return { success: false, error: message };
    }
  }

  /**
   * Fetch the full execution-history row of one query, or null if unknown.
   */
  async getQueryDetails(client: WarehouseClient, queryId: string): Promise<QueryDetails | null> {
    const result = await client.query(QUERY_DETAILS_SQL, [queryId]);
    const row = result.rows[0];
    return row ? mapQueryDetails(row) : null;
  }

  invalidateUserCache(userId: string): void {
    const prefix = `leaderboard:${userId}:`;
    for (const key of this.cache.keys()) {
      if (key.startsWith(prefix)) {
        this.cache.del(key);
      }
    }
  }

  getCacheStats(): { cachedLeaderboards: number; hits: number; misses: number } {
    return {
      cachedLeaderboards: this.cache.keys().length,
      hits: this.hits,
      misses: this.misses
    };
  }

  private resolveOptions(overrides: Partial<LeaderboardOptions>): LeaderboardOptions {
    return {
      lookbackDays: overrides.lookbackDays ?? this.defaults.lookbackDays,
      topPerWarehouse: overrides.topPerWarehouse ?? this.defaults.topPerWarehouse,
      metric: overrides.metric ?? this.defaults.metric,
      grouping: overrides.grouping ?? this.defaults.grouping,
      requireExecutionTime: overrides.requireExecutionTime ?? this.defaults.requireExecutionTime,
      limit: overrides.limit ?? this.defaults.limit
    };
  }

  private getCacheKey(userId: string, options: LeaderboardOptions): string {
    const digest = createHash('sha256').update(JSON.stringify(options)).digest('hex').slice(0, 32);
    return `leaderboard:${userId}:${digest}`;
  }

  private log(userId: string, operation: string, status: string, durationMs: number, details: string): void {
    console.log(
      `[${new Date().toISOString()}] [COST-SERVICE] [USER-${userId}] [${operation}] [${status}] ${durationMs}ms ${details}`
    );
  }
}
