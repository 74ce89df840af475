import { toBooleanOrNull, toNumberOrNull, toStringOrNull } from '../../core/row-values.js';
import type { WarehouseBind, WarehouseClient, WarehouseRow } from '../../core/warehouse-client.js';
import type {
  ColumnMetadata,
  ConstraintMetadata,
  NameDefaults,
  ResolvedTableName,
  TableMetadataRecord,
  TableReference,
  TablesMetadata,
  TableStatistics
} from './types/ai.types.js';

const NO_CONNECTION = 'No active connection';

const SIMPLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * Split `database.schema.table`, `schema.table` or `table`, filling the
 * missing qualifiers from `defaults`. Returns null for more than three parts.
 */
export function resolveTableName(qualifiedName: string, defaults: NameDefaults = {}): ResolvedTableName | null {
  const parts = qualifiedName.split('.');
  const database = defaults.database ?? null;
  const schema = defaults.schema ?? null;

  switch (parts.length) {
    case 3:
      return { database: parts[0], schema: parts[1], table: parts[2] };
    case 2:
      return { database, schema: parts[0], table: parts[1] };
    case 1:
      return { database, schema, table: qualifiedName };
    default:
      return null;
  }
}

/**
 * The database qualifier cannot be bound, so it is spliced in: bare when it is
 * a plain identifier, otherwise double-quoted with embedded quotes doubled.
 */
export function quoteDatabase(database: string): string {
  return SIMPLE_IDENTIFIER.test(database) ? database : `"${database.replace(/"/g, '""')}"`;
}

function catalogQuery(
  view: 'COLUMNS' | 'TABLES' | 'TABLE_CONSTRAINTS',
  selectList: string,
  name: ResolvedTableName,
  orderBy?: string
): { sql: string; binds: WarehouseBind[] } {
  const source = name.database
    ? `${quoteDatabase(name.database)}.INFORMATION_SCHEMA.${view}`
    : `INFORMATION_SCHEMA.${view}`;

  const conditions = ['UPPER(TABLE_NAME) = UPPER(?)'];
  const binds: WarehouseBind[] = [name.table];
  if (name.schema) {
    conditions.unshift('UPPER(TABLE_SCHEMA) = UPPER(?)');
    binds.unshift(name.schema);
  }

  const sql = `SELECT ${selectList} FROM ${source} WHERE ${conditions.join(' AND ')}${orderBy ? ` ORDER BY ${orderBy}` : ''}`;
  return { sql, binds };
}

function mapColumn(row: WarehouseRow): ColumnMetadata {
  return {
    columnName: toStringOrNull(row.column_name) ?? '',
    dataType: toStringOrNull(row.data_type),
    isNullable: toBooleanOrNull(row.is_nullable),
    columnDefault: toStringOrNull(row.column_default),
    comment: toStringOrNull(row.comment)
  };
}

function mapStatistics(row: WarehouseRow): TableStatistics {
  return {
    rowCount: toNumberOrNull(row.row_count),
    bytes: toNumberOrNull(row.bytes),
    retentionTime: toNumberOrNull(row.retention_time),
    created: toStringOrNull(row.created),
    lastAltered: toStringOrNull(row.last_altered)
  };
}

function mapConstraint(row: WarehouseRow): ConstraintMetadata {
  return {
    constraintName: toStringOrNull(row.constraint_name) ?? '',
    constraintType: toStringOrNull(row.constraint_type) ?? ''
  };
}

function emptyRecord(error?: string): TableMetadataRecord {
  const record: TableMetadataRecord = { columns: [], statistics: {}, constraints: [] };
  if (error) record.error = error;
  return record;
}

function reasonMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

/**
 * Read columns, statistics and constraints of one table. The three reads are
 * independent: a failed read leaves its part empty and adds its message to
 * `error`. Never rejects.
 */
export async function getTableMetadata(
  client: WarehouseClient | null,
  qualifiedName: TableReference,
  defaults: NameDefaults = {}
): Promise<TableMetadataRecord> {
  if (!client) {
    return emptyRecord(NO_CONNECTION);
  }

  const name = resolveTableName(qualifiedName, defaults);
  if (!name) {
    return emptyRecord(`Cannot resolve table name "${qualifiedName}": expected at most database.schema.table`);
  }

  const columnsQuery = catalogQuery(
    'COLUMNS',
    'COLUMN_NAME, DATA_TYPE, IS_NULLABLE, COLUMN_DEFAULT, COMMENT',
    name,
    'ORDINAL_POSITION'
  );
  const statsQuery = catalogQuery('TABLES', 'ROW_COUNT, BYTES, RETENTION_TIME, CREATED, LAST_ALTERED', name);
  const constraintsQuery = catalogQuery('TABLE_CONSTRAINTS', 'CONSTRAINT_NAME, CONSTRAINT_TYPE', name);

  const [columns, statistics, constraints] = await Promise.allSettled([
    client.query(columnsQuery.sql, columnsQuery.binds),
    client.query(statsQuery.sql, statsQuery.binds),
    client.query(constraintsQuery.sql, constraintsQuery.binds)
  ]);

  const record = emptyRecord();
  const errors: string[] = [];

  if (columns.status === 'fulfilled') {
    record.columns = columns.value.rows.map(mapColumn);
  } else {
    errors.push(reasonMessage(columns.reason));
  }

  if (statistics.status === 'fulfilled') {
    const first = statistics.value.rows[0];
    record.statistics = first ? mapStatistics(first) : {};
  } else {
    errors.push(reasonMessage(statistics.reason));
  }

  if (constraints.status === 'fulfilled') {
    record.constraints = constraints.value.rows.map(mapConstraint);
  } else {
    errors.push(reasonMessage(constraints.reason));
  }

  if (errors.length) {
    record.error = errors.join('; ');
  }
  return record;
}

/**
 * Fetch metadata for every name concurrently. The map keeps the order of
 * `names`; one table's failure never affects another's record.
 */
export async function assembleTablesMetadata(
  client: WarehouseClient | null,
  names: readonly TableReference[],
  defaults: NameDefaults = {}
): Promise<TablesMetadata> {
  const records = await Promise.all(names.map((name) => getTableMetadata(client, name, defaults)));

  // fromEntries defines own keys, so a table named __proto__ stays a table
  return Object.fromEntries(names.map((name, index) => [name, records[index]]));
}
