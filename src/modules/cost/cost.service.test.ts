import test from 'node:test';
import assert from 'node:assert/strict';
import { CostService, mapExecutionRecord } from './cost.service.js';
import type { WarehouseBind, WarehouseClient, WarehouseResult, WarehouseRow } from '../../core/warehouse-client.js';
import type { LeaderboardOptions } from './types/cost.types.js';

const now = new Date('2024-06-30T12:00:00.000Z');

const defaults: LeaderboardOptions = {
  lookbackDays: 30,
  topPerWarehouse: 20,
  metric: 'duration',
  grouping: 'warehouse_user'
};

class FakeWarehouseClient implements WarehouseClient {
  readonly calls: Array<{ sql: string; binds?: WarehouseBind[] }> = [];

  constructor(private readonly respond: (sql: string) => WarehouseRow[]) {}

  async query(sql: string, binds?: WarehouseBind[]): Promise<WarehouseResult> {
    this.calls.push({ sql, binds });
    const rows = this.respond(sql);
    return { columns: rows.length ? Object.keys(rows[0]) : [], rows };
  }
}

function historyRow(overrides: WarehouseRow = {}): WarehouseRow {
  return {
    warehouse_name: 'WH_A',
    warehouse_size: 'Large',
    database_name: 'ANALYTICS',
    schema_name: 'PUBLIC',
    user_name: 'ALICE',
    query_id: 'q-1',
    query_text: 'SELECT * FROM orders',
    total_elapsed_time: '7200000',
    execution_time: 7100000,
    start_time: '2024-06-30T08:00:00.000Z',
    end_time: '2024-06-30T10:00:00.000Z',
    execution_status: 'SUCCESS',
    bytes_spilled_to_local_storage: null,
    bytes_spilled_to_remote_storage: '512',
    ...overrides
  };
}

function createService(historyRowLimit = 1000): CostService {
  return new CostService({ defaults, historyRowLimit, cacheTtlSeconds: 60, now: () => now });
}

test('mapExecutionRecord coerces driver values', () => {
  const mapped = mapExecutionRecord(historyRow());
  assert.equal(mapped.totalElapsedTime, 7_200_000);
  assert.equal(mapped.bytesSpilledToLocalStorage, 0);
  assert.equal(mapped.bytesSpilledToRemoteStorage, 512);
  assert.equal(mapped.startTime?.toISOString(), '2024-06-30T08:00:00.000Z');
});

test('getExpensiveQueries aggregates history rows and binds window and one row past the cap', async () => {
  const client = new FakeWarehouseClient(() => [historyRow()]);
  const service = createService(500);

  const result = await service.getExpensiveQueries('user-1', client, { lookbackDays: 7 });

  assert.equal(result.success, true);
  if (!result.success) return;
  assert.equal(result.cached, false);
  assert.equal(result.generatedAt, now);
  assert.equal(result.options.lookbackDays, 7);
  assert.equal(result.groups.length, 1);
  assert.equal(result.groups[0].costFactor, 16);
  assert.equal(result.groups[0].durationHours, 2);
  assert.deepEqual(client.calls[0].binds, [7, 501]);
  assert.match(client.calls[0].sql, /SNOWFLAKE\.ACCOUNT_USAGE\.QUERY_HISTORY/);
});

test('getExpensiveQueries fails instead of ranking a truncated window', async () => {
  const client = new FakeWarehouseClient(() => [
    historyRow({ query_id: 'q-old', start_time: '2024-06-29T08:00:00.000Z' }),
    historyRow({ query_id: 'q-mid', start_time: '2024-06-30T08:00:00.000Z' }),
    historyRow({ query_id: 'q-new', start_time: '2024-06-30T11:00:00.000Z' })
  ]);
  const service = createService(2);

  const result = await service.getExpensiveQueries('user-1', client, { lookbackDays: 7 });

  assert.deepEqual(result, {
    success: false,
    error: 'Execution history exceeds 2 rows for the 7-day window; narrow the window or raise HISTORY_ROW_LIMIT'
  });
  assert.deepEqual(client.calls[0].binds, [7, 3]);

  await service.getExpensiveQueries('user-1', client, { lookbackDays: 7 });
  assert.equal(client.calls.length, 2);
  assert.equal(service.getCacheStats().cachedLeaderboards, 0);
});

test('getExpensiveQueries closes the window on the warehouse clock', async () => {
  // Server clock reads 12:00, warehouse clock 12:10
  const client = new FakeWarehouseClient(() => [
    historyRow({ start_time: '2024-06-30T12:05:00.000Z', observed_at: '2024-06-30T12:10:00.000Z' })
  ]);
  const service = createService();

  const result = await service.getExpensiveQueries('user-1', client);

  assert.equal(result.success, true);
  if (!result.success) return;
  assert.equal(result.groups.length, 1);
  assert.equal(result.groups[0].sampleQueryId, 'q-1');
  assert.equal(result.generatedAt, now);
});

test('getExpensiveQueries serves repeat calls from cache unless refreshed', async () => {
  const client = new FakeWarehouseClient(() => [historyRow()]);
  const service = createService();

  await service.getExpensiveQueries('user-1', client);
  const second = await service.getExpensiveQueries('user-1', client);
  assert.equal(client.calls.length, 1);
  assert.equal(second.success && second.cached, true);

  await service.getExpensiveQueries('user-1', client, {}, { refresh: true });
  assert.equal(client.calls.length, 2);

  await service.getExpensiveQueries('user-1', client, { metric: 'cost_factor' });
  assert.equal(client.calls.length, 3);

  assert.deepEqual(service.getCacheStats(), { cachedLeaderboards: 2, hits: 1, misses: 3 });
});

test('invalidateUserCache only drops that user', async () => {
  const client = new FakeWarehouseClient(() => [historyRow()]);
  const service = createService();

  await service.getExpensiveQueries('user-1', client);
  await service.getExpensiveQueries('user-2', client);
  service.invalidateUserCache('user-1');

  await service.getExpensiveQueries('user-1', client);
  await service.getExpensiveQueries('user-2', client);
  assert.equal(client.calls.length, 3);
});

test('getExpensiveQueries reports warehouse failures as success: false', async () => {
  const client = new FakeWarehouseClient(() => {
    throw new Error('Warehouse query failed: Insufficient privileges');
  });
  const service = createService();

  const result = await service.getExpensiveQueries('user-1', client);
  assert.deepEqual(result, { success: false, error: 'Warehouse query failed: Insufficient privileges' });
});

test('getQueryDetails maps the detail row or returns null', async () => {
  const client = new FakeWarehouseClient((sql) =>
    sql.includes('QUERY_ID = ?')
      ? [{ query_id: 'q-9', query_text: 'SELECT 1', duration_seconds: '12.5', partitions_scanned: 3, role_name: null }]
      : []
  );
  const service = createService();

  const details = await service.getQueryDetails(client, 'q-9');
  assert.equal(details?.queryId, 'q-9');
  assert.equal(details?.durationSeconds, 12.5);
  assert.equal(details?.partitionsScanned, 3);
  assert.equal(details?.roleName, null);
  assert.deepEqual(client.calls[0].binds, ['q-9']);

  const missing = await service.getQueryDetails(new FakeWarehouseClient(() => []), 'nope');
  assert.equal(missing, null);
});
