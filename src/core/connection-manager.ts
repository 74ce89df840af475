import { env } from '../config/env.js';
import { decryptProfile, getActiveConnectionForUser } from '../modules/workspace/workspace.service.js';
import { SnowflakeWarehouseClient, WarehouseError, type WarehouseClient } from './warehouse-client.js';

/**
 * Hands out the warehouse session of an operator's active profile.
 */
export interface WarehouseClientProvider {
  getClient(userId: string): Promise<WarehouseClient>;
  closeClient(userId: string): Promise<void>;
}

export interface ManagedWarehouseClient extends WarehouseClient {
  close(): Promise<void>;
}

export type SessionOpener = (userId: string) => Promise<ManagedWarehouseClient>;

interface CachedSession {
  session: ManagedWarehouseClient;
  handle: WarehouseClient;
}

async function openActiveProfile(userId: string): Promise<ManagedWarehouseClient> {
  const encryptedProfile = await getActiveConnectionForUser(userId);
  const profile = decryptProfile(encryptedProfile);

  return SnowflakeWarehouseClient.connect(
    {
      account: profile.account,
      username: profile.username,
      password: profile.password,
      database: profile.database,
      schema: profile.schema,
      warehouse: profile.warehouse,
      role: profile.role,
      authenticator: profile.authenticator,
      clientSessionKeepAlive: true
    },
    env.WAREHOUSE_STATEMENT_TIMEOUT_SECONDS
  );
}

function isSessionLostError(error: unknown): boolean {
  return error instanceof WarehouseError && error.code === 'WAREHOUSE_CONNECTION_FAILED';
}

export class ConnectionManager implements WarehouseClientProvider {
  private clients: Map<string, CachedSession> = new Map();
  private pending: Map<string, Promise<WarehouseClient>> = new Map();
  // Bumped on every close; a login that started under an older generation is discarded
  private generations: Map<string, number> = new Map();

  constructor(private readonly openSession: SessionOpener = openActiveProfile) {}

  /**
   * Return the operator's warehouse session, opening it from the active profile on first use.
   */
  async getClient(userId: string): Promise<WarehouseClient> {
    const existing = this.clients.get(userId);
    if (existing) {
      return existing.handle;
    }

    // Concurrent requests from one operator share a single login
    const inFlight = this.pending.get(userId);
    if (inFlight) {
      return inFlight;
    }

    const opening: Promise<WarehouseClient> = this.open(userId).finally(() => {
      if (this.pending.get(userId) === opening) {
        this.pending.delete(userId);
      }
    });
    this.pending.set(userId, opening);
    return opening;
  }

  private async open(userId: string): Promise<WarehouseClient> {
    const generation = this.generation(userId);
    const session = await this.openSession(userId);

    if (this.generation(userId) !== generation) {
      this.log(userId, 'WARN', 'Profile changed during login; discarding stale session');
      await this.dispose(userId, session);
      return this.getClient(userId);
    }

    const handle = this.track(userId, session);
    this.clients.set(userId, { session, handle });
    return handle;
  }

  private track(userId: string, session: ManagedWarehouseClient): WarehouseClient {
    return {
      query: async (sql, binds) => {
        try {
          return await session.query(sql, binds);
        } catch (error) {
          if (isSessionLostError(error) && this.clients.get(userId)?.session === session) {
            this.log(userId, 'WARN', 'Session lost; evicting so the next request logs in again');
            await this.closeClient(userId);
          }
          throw error;
        }
      }
    };
  }

  async closeClient(userId: string): Promise<void> {
    this.generations.set(userId, this.generation(userId) + 1);
    this.pending.delete(userId);

    const cached = this.clients.get(userId);
    if (!cached) {
      return;
    }

    this.clients.delete(userId);
    await this.dispose(userId, cached.session);
  }

  async closeAll(): Promise<void> {
    await Promise.all(Array.from(this.clients.keys()).map((userId) => this.closeClient(userId)));
  }

  private generation(userId: string): number {
    return this.generations.get(userId) ?? 0;
  }

  private async dispose(userId: string, session: ManagedWarehouseClient): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log(userId, 'ERROR', `Error closing session: ${message}`);
    }
  }

  private log(userId: string, status: string, details: string): void {
    const line = `[${new Date().toISOString()}] [CONNECTION-MANAGER] [USER-${userId}] [${status}] ${details}`;
    if (status === 'ERROR') {
      console.error(line);
    } else {
      console.warn(line);
    }
  }
}

export const connectionManager = new ConnectionManager();
