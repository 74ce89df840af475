/**
 * A lexically extracted table identifier: `table`, `schema.table` or `database.schema.table`.
 */
export type TableReference = string;

/**
 * Database/schema used to complete one- and two-part table references.
 */
export interface NameDefaults {
  database?: string | null;
  schema?: string | null;
}

export interface ResolvedTableName {
  database: string | null;
  schema: string | null;
  table: string;
}

/**
 * Column metadata from INFORMATION_SCHEMA.COLUMNS, in ordinal order.
 */
export interface ColumnMetadata {
  columnName: string;
  dataType: string | null;
  isNullable: boolean | null;
  columnDefault: string | null;
  comment: string | null;
}

export interface TableStatistics {
  rowCount: number | null;
  bytes: number | null;
  retentionTime: number | null;
  created: string | null;
  lastAltered: string | null;
}

export interface ConstraintMetadata {
  constraintName: string;
  constraintType: string;
}

/**
 * Catalog metadata for one referenced table. `statistics` is empty when the
 * table was not found; `error` collects the messages of failed lookups.
 */
export interface TableMetadataRecord {
  columns: ColumnMetadata[];
  statistics: TableStatistics | Record<string, never>;
  constraints: ConstraintMetadata[];
  error?: string;
}

export type TablesMetadata = Record<TableReference, TableMetadataRecord>;

export type MetadataValue = string | number | boolean | null;

/**
 * Flat execution facts handed to the prompt. Missing upstream values are `null`.
 */
export type ExecutionMetadata = Record<string, MetadataValue>;

/**
 * Leaderboard facts about the group the sample query was picked from.
 */
export interface GroupSummary {
  warehouseName?: string;
  warehouseSize?: string | null;
  userName?: string;
  queryCount?: number;
  durationSeconds?: number;
  costFactor?: number;
  minStartTime?: string | null;
  maxEndTime?: string | null;
}

export interface OptimizeRequest {
  queryId: string;
  queryText?: string;
  model?: string;
  group?: GroupSummary;
}

export type AdvisoryResult =
  | { status: 'ok'; suggestions: string; cached: boolean }
  | { status: 'unavailable'; suggestions: null; reason: string };

export interface OptimizationReport {
  queryId: string;
  queryText: string;
  model: string;
  tables: TableReference[];
  tablesMetadata: TablesMetadata;
  executionMetadata: ExecutionMetadata;
  advisory: AdvisoryResult;
}

/**
 * Cache metrics for observability.
 */
export interface CacheStats {
  cachedItems: number;
  hits: number;
  misses: number;
  requests: number;
  hitRate: number;
}
