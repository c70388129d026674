/**
 * PostgreSQL Client
 *
 * Thin wrapper around a pg pool with error mapping and transactions.
 */

import pg from 'pg';
import type { ErrorCode } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Milliseconds to wait for a pooled connection */
  connectionTimeoutMillis?: number;
  /** Called when an idle pooled connection fails (server restart, admin terminate) */
  onPoolError?: (error: Error) => void;
}

export interface PostgresQueryResult<T> {
  rows: T[];
  rowCount: number;
}

/** Runs one statement on the client owning a transaction */
export type TransactionQuery = (sql: string, params?: unknown[]) => Promise<void>;

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Postgres truncates longer identifiers */
const MAX_IDENTIFIER_LENGTH = 63;

/** Errors meaning the server could not be reached at all */
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
]);

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string): void {
  if (!VALID_IDENTIFIER.test(name) || name.length > MAX_IDENTIFIER_LENGTH) {
    throw new SnapdeltaError({
      code: 'INVALID_OPTIONS',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers of at most ${MAX_IDENTIFIER_LENGTH} characters for ${type} names.`,
    });
  }
}

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map a driver error to a SnapdeltaError; unreachable servers are transient
 */
export function toStoreError(error: unknown, code: ErrorCode, message: string): SnapdeltaError {
  if (error instanceof SnapdeltaError) return error;

  const driverCode = errorCodeOf(error);
  const unavailable =
    (driverCode !== undefined && UNAVAILABLE_CODES.has(driverCode)) ||
    (error instanceof Error && /timeout exceeded when trying to connect/i.test(error.message));

  return new SnapdeltaError({
    code: unavailable ? 'STORE_UNAVAILABLE' : code,
    message: `${message}: ${error instanceof Error ? error.message : String(error)}`,
    suggestion: unavailable ? 'Check that the PostgreSQL server is running and reachable.' : undefined,
    cause: error instanceof Error ? error : undefined,
    context: driverCode ? { driverCode } : undefined,
  });
}

export class PostgresClient {
  private pool: pg.Pool;
  private ended = false;

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10_000,
    });

    // Emitted for broken idle clients; the pool drops them and the next query reconnects
    this.pool.on('error', (error) => {
      config.onPoolError?.(error);
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw toStoreError(error, 'STORE_UNAVAILABLE', 'PostgreSQL connection failed');
    }
  }

  /**
   * Close all connections. Safe to call more than once.
   */
  async disconnect(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    await this.pool.end();
  }

  /**
   * Execute a query
   */
  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    sql: string,
    params?: unknown[],
    errorCode: ErrorCode = 'STORE_READ_FAILED'
  ): Promise<PostgresQueryResult<T>> {
    try {
      const result = await this.pool.query<T>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    } catch (error) {
      throw toStoreError(error, errorCode, 'Query failed');
    }
  }

  /**
   * Run statements inside BEGIN/COMMIT on one pooled connection.
   * Any failure rolls the whole transaction back.
   */
  async withTransaction(work: (query: TransactionQuery) => Promise<void>): Promise<void> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw toStoreError(error, 'STORE_UNAVAILABLE', 'PostgreSQL connection failed');
    }

    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      await work(async (sql, params) => {
        await client.query(sql, params);
      });
      await client.query('COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // Destroy the connection instead of returning it to the pool
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw toStoreError(error, 'STORE_WRITE_FAILED', 'Transaction failed');
    } finally {
      client.release(releaseError);
    }
  }
}
