import test from 'node:test';
import assert from 'node:assert/strict';
import { useTestEnv } from '../../tests/helpers/test-env.js';
import type { ManagedWarehouseClient } from './connection-manager.js';
import { isSessionLost, WarehouseError, type WarehouseResult } from './warehouse-client.js';

useTestEnv();
const { ConnectionManager } = await import('./connection-manager.js');

class FakeSession implements ManagedWarehouseClient {
  closed = false;

  constructor(
    private readonly label: string,
    private readonly failure?: Error
  ) {}

  async query(): Promise<WarehouseResult> {
    if (this.failure) {
      throw this.failure;
    }
    return { columns: ['session'], rows: [{ session: this.label }] };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const expired = new WarehouseError(
  'Warehouse query failed: Your session has expired. Please login again.',
  'WAREHOUSE_CONNECTION_FAILED'
);

test('isSessionLost matches expired sessions by code or message', () => {
  assert.equal(isSessionLost({ message: 'anything', code: 390112 }), true);
  assert.equal(isSessionLost({ message: 'Authentication token has expired.  The user must authenticate again.' }), true);
  assert.equal(isSessionLost({ message: "SQL compilation error: Object 'ORDERS' does not exist", code: '002003' }), false);
});

test('concurrent requests share one login', async () => {
  let logins = 0;
  const manager = new ConnectionManager(async () => {
    logins += 1;
    return new FakeSession(`session-${logins}`);
  });

  const [first, second] = await Promise.all([manager.getClient('user-1'), manager.getClient('user-1')]);

  assert.equal(logins, 1);
  assert.equal(first, second);
  assert.equal(await manager.getClient('user-1'), first);
});

test('a lost session is evicted and the next request logs in again', async () => {
  const sessions: FakeSession[] = [];
  const manager = new ConnectionManager(async () => {
    const session = new FakeSession(`session-${sessions.length + 1}`, sessions.length === 0 ? expired : undefined);
    sessions.push(session);
    return session;
  });

  const first = await manager.getClient('user-1');
  await assert.rejects(first.query('SELECT 1'), expired);
  assert.equal(sessions[0].closed, true);

  const second = await manager.getClient('user-1');
  const result = await second.query('SELECT 1');
  assert.deepEqual(result.rows, [{ session: 'session-2' }]);
  assert.equal(sessions.length, 2);
});

test('ordinary query failures keep the session', async () => {
  let logins = 0;
  const failure = new WarehouseError('Warehouse query failed: Insufficient privileges', 'WAREHOUSE_QUERY_FAILED');
  const manager = new ConnectionManager(async () => {
    logins += 1;
    return new FakeSession('session-1', failure);
  });

  const client = await manager.getClient('user-1');
  await assert.rejects(client.query('SELECT 1'), failure);

  assert.equal(await manager.getClient('user-1'), client);
  assert.equal(logins, 1);
});

test('a login still in flight when the profile is closed is discarded', async () => {
  const sessions: FakeSession[] = [];
  let releaseFirstLogin: () => void = () => undefined;
  const firstLogin = new Promise<void>((resolve) => {
    releaseFirstLogin = resolve;
  });
  const manager = new ConnectionManager(async () => {
    const session = new FakeSession(`session-${sessions.length + 1}`);
    sessions.push(session);
    if (sessions.length === 1) {
      await firstLogin;
    }
    return session;
  });

  const stale = manager.getClient('user-1');
  await manager.closeClient('user-1');
  releaseFirstLogin();

  const client = await stale;
  const result = await client.query('SELECT 1');

  assert.deepEqual(result.rows, [{ session: 'session-2' }]);
  assert.equal(sessions[0].closed, true);
  assert.equal(sessions[1].closed, false);
  assert.equal(await manager.getClient('user-1'), client);
});

test('closeAll closes every cached session', async () => {
  const sessions: FakeSession[] = [];
  const manager = new ConnectionManager(async () => {
    const session = new FakeSession(`session-${sessions.length + 1}`);
    sessions.push(session);
    return session;
  });

  await manager.getClient('user-1');
  await manager.getClient('user-2');
  await manager.closeAll();

  assert.deepEqual(
    sessions.map((session) => session.closed),
    [true, true]
  );
});
