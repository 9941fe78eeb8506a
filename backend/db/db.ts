import { Pool, type PoolConfig } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '@shared/db/schema/incidents';
import { loadSettings } from 'backend/config/settings';
import { ConfigurationError, toError } from 'backend/services/error-logging/errors';
import { log } from 'backend/utils/log';

export type Database = NodePgDatabase<typeof schema>;

// Pool configuration with timeouts and connection limits
const PG_POOL_CONFIG: PoolConfig = {
  max: 5,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  maxUses: 100,
};

const STATEMENT_TIMEOUT_MS = 30000;

class ConnectionManager {
  private pool: Pool | null = null;
  private database: Database | null = null;

  connect(databaseUrl: string): Database {
    if (this.database) {
      return this.database;
    }

    const pool = new Pool({ ...PG_POOL_CONFIG, connectionString: databaseUrl });

    pool.on('error', (err) => {
      log(`PostgreSQL Pool error: ${err.message}`, 'db', 'error');
    });

    pool.on('connect', (client) => {
      client.query(`SET statement_timeout = ${STATEMENT_TIMEOUT_MS}`).catch((err: unknown) => {
        log(`Could not set statement timeout: ${toError(err).message}`, 'db', 'warn');
      });
    });

    this.pool = pool;
    this.database = drizzle(pool, { schema });
    log('Database connection initialized', 'db');

    return this.database;
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    this.database = null;

    if (pool) {
      await pool.end();
      log('Database pool closed', 'db');
    }
  }
}

const connectionManager = new ConnectionManager();

/**
 * The shared drizzle instance. The pool is created on first use.
 */
export function getDb(databaseUrl = loadSettings().databaseUrl): Database {
  if (!databaseUrl) {
    throw new ConfigurationError('DATABASE_URL must be set to use database storage');
  }
  return connectionManager.connect(databaseUrl);
}

export function closeDb(): Promise<void> {
  return connectionManager.close();
}

/**
 * Race a query against a timeout. The timer is cleared either way.
 */
export async function executeQuery<T>(queryFn: () => Promise<T>, timeoutMs = 5000): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Database query timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([queryFn(), timeout]);
  } catch (error) {
    log(`Query execution error: ${toError(error).message}`, 'db', 'error');
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
