/**
 * Metric the leaderboard ranks and sorts by.
 */
export type RankMetric = 'duration' | 'cost_factor';

/**
 * Grouping key: (warehouse, user) or (warehouse, user, database, schema).
 */
export type GroupingMode = 'warehouse_user' | 'warehouse_user_schema';

/**
 * One historical query execution, as read from the execution-history view.
 */
export interface ExecutionRecord {
  warehouseName: string | null;
  warehouseSize: string | null;
  databaseName: string | null;
  schemaName: string | null;
  userName: string;
  queryId: string;
  queryText: string;
  totalElapsedTime: number;
  executionTime?: number | null;
  startTime: Date | null;
  endTime: Date | null;
  executionStatus: string;
  bytesSpilledToLocalStorage: number;
  bytesSpilledToRemoteStorage: number;
}

/**
 * One ranked warehouse/user group of the leaderboard.
 */
export interface CostGroup {
  warehouseName: string;
  warehouseSize: string | null;
  userName: string;
  databaseName: string | null;
  schemaName: string | null;
  queryCount: number;
  sampleQueryId: string;
  sampleQueryText: string;
  minStartTime: Date;
  maxEndTime: Date | null;
  totalElapsedTime: number;
  durationSeconds: number;
  durationHours: number;
  costFactor: number;
  bytesSpilledToLocalStorage: number;
  bytesSpilledToRemoteStorage: number;
  rank: number;
}

export interface AggregationOptions {
  /** Window length in days, 1 to 30. */
  lookbackDays: number;
  /** K: groups kept per warehouse partition. */
  topPerWarehouse: number;
  metric: RankMetric;
  grouping: GroupingMode;
  /** Drop records that never reached execution (queued only). */
  requireExecutionTime?: boolean;
  /** Global cap applied after the per-warehouse cut. */
  limit?: number;
  now?: Date;
}

export type LeaderboardOptions = Omit<AggregationOptions, 'now'>;

export type LeaderboardResult =
  | {
      success: true;
      groups: CostGroup[];
      options: LeaderboardOptions;
      generatedAt: Date;
      cached: boolean;
    }
  | {
      success: false;
      error: string;
    };

export type Leaderboard = Extract<LeaderboardResult, { success: true }>;

/**
 * Full execution-history row for a single query id.
 */
export interface QueryDetails {
  queryId: string;
  queryText: string;
  queryType: string | null;
  warehouseName: string | null;
  warehouseSize: string | null;
  userName: string | null;
  roleName: string | null;
  databaseName: string | null;
  schemaName: string | null;
  durationSeconds: number | null;
  bytesScanned: number | null;
  bytesSpilledToLocalStorage: number | null;
  bytesSpilledToRemoteStorage: number | null;
  partitionsScanned: number | null;
  partitionsTotal: number | null;
  rowsProduced: number | null;
  rowsInserted: number | null;
  rowsUpdated: number | null;
  rowsDeleted: number | null;
  compilationTimeSeconds: number | null;
  executionTimeSeconds: number | null;
  queuedTimeSeconds: number | null;
  blockedTimeSeconds: number | null;
  startTime: Date | null;
  endTime: Date | null;
  executionStatus: string | null;
}
