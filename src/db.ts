/**
 * Postgres access over the Neon serverless driver (pg-compatible Pool).
 *
 * Nothing connects at import time; createDatabase() builds the pool. Every
 * economy mutation goes through serializableTransaction.
 *
 * @see migrations/001_household_economy.sql
 */

import { Pool, neonConfig } from '@neondatabase/serverless';
import ws from 'ws';
import { dbLogger } from './logger';

neonConfig.webSocketConstructor = ws;

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T = Record<string, unknown>>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

export interface Database {
  query: QueryFn;
  /** BEGIN ISOLATION LEVEL SERIALIZABLE, run fn, COMMIT; ROLLBACK when fn or COMMIT throws. */
  serializableTransaction: <T>(fn: (query: QueryFn) => Promise<T>) => Promise<T>;
  healthCheck: () => Promise<{ connected: boolean; latencyMs: number }>;
  close: () => Promise<void>;
}

export interface DatabaseOptions {
  maxConnections?: number;
  /** Statements slower than this are logged at warn. */
  slowQueryMs?: number;
}

/** SQLSTATE 40001 (serialization_failure) or 40P01 (deadlock_detected). */
export function isSerializationFailure(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && (error.code === '40001' || error.code === '40P01');
}

interface Runner {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

function queryFnFor(runner: Runner, slowQueryMs: number): QueryFn {
  return async <T = Record<string, unknown>>(sql: string, params?: unknown[]) => {
    const startedAt = performance.now();
    const result = await runner.query(sql, params);
    const elapsedMs = performance.now() - startedAt;
    if (elapsedMs > slowQueryMs) {
      dbLogger.warn({ elapsedMs: Math.round(elapsedMs), sql: sql.slice(0, 120) }, 'Slow query');
    }
    // Row shape is fixed by the SQL; repositories map it to the domain type
    return { rows: result.rows as T[], rowCount: result.rowCount ?? 0 };
  };
}

export function createDatabase(connectionString: string, options: DatabaseOptions = {}): Database {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }
  const slowQueryMs = options.slowQueryMs ?? 500;

  const pool = new Pool({
    connectionString,
    max: options.maxConnections ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  const query = queryFnFor(pool, slowQueryMs);

  async function serializableTransaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN ISOLATION LEVEL SERIALIZABLE');
      const result = await fn(queryFnFor(client, slowQueryMs));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        dbLogger.error({ err: rollbackError, cause: error }, 'ROLLBACK failed');
      });
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    query,
    serializableTransaction,

    async healthCheck() {
      const startedAt = performance.now();
      try {
        await query('SELECT 1');
        return { connected: true, latencyMs: Math.round(performance.now() - startedAt) };
      } catch (error) {
        dbLogger.warn({ err: error }, 'Database health check failed');
        return { connected: false, latencyMs: Math.round(performance.now() - startedAt) };
      }
    },

    async close() {
      await pool.end();
      dbLogger.info('Database pool closed');
    },
  };
}
