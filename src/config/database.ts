/**
 * Database Connection Pool Module
 *
 * Provides PostgreSQL connection pooling with connection reuse,
 * parameterized queries, and transaction support for atomic operations.
 *
 * DATE columns are returned as YYYY-MM-DD strings and NUMERIC columns as
 * decimal strings so calendar dates and money never pass through Date
 * timezone shifts or binary floating point.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow, types } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { loadEnvironmentConfig } from './environment';
import { logDatabase } from '../utils/logger';

const DATE_OID = 1082;
const NUMERIC_OID = 1700;

types.setTypeParser(DATE_OID, (value: string) => value);
types.setTypeParser(NUMERIC_OID, (value: string) => value);

// Global pool instance reused across calls
let pool: Pool | null = null;
let cachedCredentials: DatabaseCredentials | null = null;

interface DatabaseCredentials {
  username: string;
  password: string;
}

/**
 * Anything that can run a parameterized statement: the pool itself or a
 * client checked out for a transaction.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

/**
 * Runs a unit of work inside one transaction
 */
export type TransactionRunner = <T>(callback: (client: Queryable) => Promise<T>) => Promise<T>;

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

const DEFAULT_POOL_CONFIG: PoolConfig = {
  min: 1,
  max: 10,
  idleTimeoutMillis: 30000, // 30 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

function isCredentials(value: unknown): value is DatabaseCredentials {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return typeof record.username === 'string' && typeof record.password === 'string';
}

/**
 * Fetch database credentials from AWS Secrets Manager
 */
async function getCredentialsFromSecretsManager(
  secretArn: string,
  region: string
): Promise<DatabaseCredentials> {
  if (cachedCredentials) {
    return cachedCredentials;
  }

  const client = new SecretsManagerClient({ region });

  try {
    const response = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const secret: unknown = JSON.parse(response.SecretString);
    if (!isCredentials(secret)) {
      throw new Error('Secret does not contain username and password');
    }

    cachedCredentials = { username: secret.username, password: secret.password };
    return cachedCredentials;
  } catch (error) {
    throw new Error(
      `Failed to fetch database credentials: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Get or create the database connection pool
 */
export async function getPool(): Promise<Pool> {
  if (!pool) {
    const config = loadEnvironmentConfig();

    const credentials = config.dbSecretArn
      ? await getCredentialsFromSecretsManager(config.dbSecretArn, config.awsRegion)
      : { username: config.dbUser, password: config.dbPassword };

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: credentials.username,
      password: credentials.password,
      min: DEFAULT_POOL_CONFIG.min,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    });

    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Execute a parameterized query
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Array of parameter values
 * @returns Query result
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const activePool = await getPool();
  try {
    return await activePool.query<T>(text, params);
  } catch (error) {
    logDatabase({
      errorMessage: error instanceof Error ? error.message : 'Unknown error',
      query: text,
      operation: text.trim().split(/\s+/)[0].toUpperCase(),
    });
    throw error;
  }
}

/**
 * Default executor backed by the shared pool
 */
export const db: Queryable = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
    return query<T>(text, params);
  },
};

function clientExecutor(client: PoolClient): Queryable {
  return {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
      return client.query<T>(text, params);
    },
  };
}

/**
 * Transaction helper for atomic operations
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 *
 * @param callback - Function to execute within transaction
 * @returns Result from callback
 */
export async function transaction<T>(
  callback: (client: Queryable) => Promise<T>
): Promise<T> {
  const activePool = await getPool();
  const client = await activePool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(clientExecutor(client));
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Reset pool instance (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
  cachedCredentials = null;
}

/**
 * Check if pool is healthy
 */
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const result = await query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows.length === 1 && result.rows[0].health_check === 1;
  } catch {
    return false;
  }
}
