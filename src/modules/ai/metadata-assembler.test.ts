import test from 'node:test';
import assert from 'node:assert/strict';
import { assembleTablesMetadata, getTableMetadata, quoteDatabase, resolveTableName } from './metadata-assembler.js';
import type { WarehouseBind, WarehouseClient, WarehouseResult, WarehouseRow } from '../../core/warehouse-client.js';

type Responder = (sql: string, binds: WarehouseBind[]) => WarehouseRow[] | Promise<WarehouseRow[]>;

class FakeWarehouseClient implements WarehouseClient {
  readonly calls: Array<{ sql: string; binds: WarehouseBind[] }> = [];

  constructor(private readonly respond: Responder) {}

  async query(sql: string, binds: WarehouseBind[] = []): Promise<WarehouseResult> {
    this.calls.push({ sql, binds });
    const rows = await this.respond(sql, binds);
    return { columns: rows.length ? Object.keys(rows[0]) : [], rows };
  }
}

const catalog: Responder = (sql) => {
  if (sql.includes('INFORMATION_SCHEMA.COLUMNS')) {
    return [
      { column_name: 'ID', data_type: 'NUMBER', is_nullable: 'NO', column_default: null, comment: null },
      { column_name: 'EMAIL', data_type: 'TEXT', is_nullable: 'YES', column_default: null, comment: 'contact' }
    ];
  }
  if (sql.includes('INFORMATION_SCHEMA.TABLES')) {
    return [{ row_count: '1500', bytes: 2048, retention_time: 1, created: '2024-01-01T00:00:00.000Z', last_altered: null }];
  }
  return [{ constraint_name: 'PK_USERS', constraint_type: 'PRIMARY KEY' }];
};

test('resolveTableName fills missing qualifiers from defaults', () => {
  const defaults = { database: 'ANALYTICS', schema: 'PUBLIC' };
  assert.deepEqual(resolveTableName('db.sch.t', defaults), { database: 'db', schema: 'sch', table: 't' });
  assert.deepEqual(resolveTableName('sch.t', defaults), { database: 'ANALYTICS', schema: 'sch', table: 't' });
  assert.deepEqual(resolveTableName('t', defaults), { database: 'ANALYTICS', schema: 'PUBLIC', table: 't' });
  assert.deepEqual(resolveTableName('t'), { database: null, schema: null, table: 't' });
  assert.equal(resolveTableName('a.b.c.d', defaults), null);
});

test('quoteDatabase leaves plain identifiers bare and quotes the rest', () => {
  assert.equal(quoteDatabase('ANALYTICS_01'), 'ANALYTICS_01');
  assert.equal(quoteDatabase('my-db'), '"my-db"');
  assert.equal(quoteDatabase('x"; DROP'), '"x""; DROP"');
});

test('getTableMetadata reads columns, statistics and constraints with bound names', async () => {
  const client = new FakeWarehouseClient(catalog);
  const record = await getTableMetadata(client, 'analytics.public.users');

  assert.equal(record.error, undefined);
  assert.deepEqual(record.columns.map((column) => [column.columnName, column.isNullable]), [
    ['ID', false],
    ['EMAIL', true]
  ]);
  assert.deepEqual(record.statistics, {
    rowCount: 1500,
    bytes: 2048,
    retentionTime: 1,
    created: '2024-01-01T00:00:00.000Z',
    lastAltered: null
  });
  assert.deepEqual(record.constraints, [{ constraintName: 'PK_USERS', constraintType: 'PRIMARY KEY' }]);

  assert.equal(client.calls.length, 3);
  assert.equal(
    client.calls[0].sql,
    'SELECT COLUMN_NAME, DATA_TYPE, IS_NULLABLE, COLUMN_DEFAULT, COMMENT FROM analytics.INFORMATION_SCHEMA.COLUMNS WHERE UPPER(TABLE_SCHEMA) = UPPER(?) AND UPPER(TABLE_NAME) = UPPER(?) ORDER BY ORDINAL_POSITION'
  );
  for (const call of client.calls) {
    assert.deepEqual(call.binds, ['public', 'users']);
  }
});

test('unqualified names without defaults filter on table name only', async () => {
  const client = new FakeWarehouseClient(() => []);
  const record = await getTableMetadata(client, 'users');

  assert.deepEqual(record, { columns: [], statistics: {}, constraints: [] });
  assert.equal(
    client.calls[2].sql,
    'SELECT CONSTRAINT_NAME, CONSTRAINT_TYPE FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS WHERE UPPER(TABLE_NAME) = UPPER(?)'
  );
  assert.deepEqual(client.calls[2].binds, ['users']);
});

test('a failed read only empties its own part', async () => {
  const client = new FakeWarehouseClient((sql, binds) => {
    if (sql.includes('INFORMATION_SCHEMA.TABLES')) {
      throw new Error('Warehouse query failed: stats unavailable');
    }
    return catalog(sql, binds);
  });

  const record = await getTableMetadata(client, 'analytics.public.users');
  assert.equal(record.columns.length, 2);
  assert.deepEqual(record.statistics, {});
  assert.equal(record.constraints.length, 1);
  assert.equal(record.error, 'Warehouse query failed: stats unavailable');
});

test('names with too many parts get an error and no lookups', async () => {
  const client = new FakeWarehouseClient(catalog);
  const record = await getTableMetadata(client, 'a.b.c.d');

  assert.equal(client.calls.length, 0);
  assert.deepEqual(record.columns, []);
  assert.match(record.error ?? '', /Cannot resolve table name "a\.b\.c\.d"/);
});

test('assembleTablesMetadata isolates failures and keeps input order', async () => {
  const client = new FakeWarehouseClient(async (sql, binds) => {
    if (binds.includes('broken')) {
      throw new Error('Object does not exist');
    }
    // Finish the first table last
    if (binds.includes('slow')) {
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    return catalog(sql, binds);
  });

  const metadata = await assembleTablesMetadata(client, ['slow', 'broken', 'fast']);

  assert.deepEqual(Object.keys(metadata), ['slow', 'broken', 'fast']);
  assert.equal(metadata.slow.columns.length, 2);
  assert.equal(metadata.fast.columns.length, 2);
  assert.equal(metadata.broken.error, 'Object does not exist; Object does not exist; Object does not exist');
  assert.deepEqual(metadata.broken.columns, []);
});

test('without a session every table reports no active connection', async () => {
  const metadata = await assembleTablesMetadata(null, ['orders', 'customers']);
  assert.deepEqual(metadata, {
    orders: { columns: [], statistics: {}, constraints: [], error: 'No active connection' },
    customers: { columns: [], statistics: {}, constraints: [], error: 'No active connection' }
  });
});

test('a table named __proto__ is kept as its own entry', async () => {
  const metadata = await assembleTablesMetadata(null, ['__proto__', 'orders']);
  const [[firstName, firstRecord]] = Object.entries(metadata);
  assert.deepEqual(Object.keys(metadata), ['__proto__', 'orders']);
  assert.equal(firstName, '__proto__');
  assert.equal(firstRecord.error, 'No active connection');
  assert.equal(Object.getPrototypeOf(metadata), Object.prototype);
});
