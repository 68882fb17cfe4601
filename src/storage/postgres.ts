/**
 * QueryGate - PostgreSQL Connection Source
 * Hands out scoped, read-only connections from a pg-promise pool
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';

import logger, { truncateSql } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import type { ConnectionSource, QueryConnection, ResultRow } from '../guard/types.js';
import { ConfigurationError, DatabaseError, QueryTimeoutError, type DatabaseConfig } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

type PooledConnection = Awaited<ReturnType<IDatabase<object>['connect']>>;

// SQLSTATE raised when statement_timeout cancels a query
const QUERY_CANCELED = '57014';

/**
 * True for the PostgreSQL error raised when statement_timeout fires
 */
export function isStatementTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === QUERY_CANCELED
  );
}

// =============================================================================
// Scoped Connection
// =============================================================================

class PostgresConnection implements QueryConnection {
  private readonly pgp: IMain;
  private readonly connection: PooledConnection;
  private readonly readOnly: boolean;

  constructor(pgp: IMain, connection: PooledConnection, readOnly: boolean) {
    this.pgp = pgp;
    this.connection = connection;
    this.readOnly = readOnly;
  }

  /**
   * Run one statement inside its own transaction, read-only when configured,
   * with a server-side statement timeout as a second deadline.
   */
  public async query(sql: string, options: { timeoutMs: number }): Promise<ResultRow[]> {
    // Passed as a ParameterizedQuery so pg-promise never applies its own formatting
    const statement = new this.pgp.ParameterizedQuery({ text: sql });

    try {
      return await this.connection.tx('querygate-execute', async (t) => {
        if (this.readOnly) {
          await t.none('SET TRANSACTION READ ONLY');
        }
        await t.none('SET LOCAL statement_timeout = $1', [options.timeoutMs]);
        return t.any<ResultRow>(statement);
      });
    } catch (error) {
      if (isStatementTimeout(error)) {
        throw new QueryTimeoutError(options.timeoutMs);
      }
      throw new DatabaseError(`Query failed: ${errorMessage(error)}`);
    }
  }

  /**
   * A discarded connection is destroyed instead of going back to the pool
   */
  public release(discard: boolean): Promise<void> {
    this.connection.done(discard);
    return Promise.resolve();
  }
}

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements ConnectionSource {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: DatabaseConfig;
  private connected = false;

  constructor(config: DatabaseConfig) {
    if (config.connectionString === undefined || config.connectionString.length === 0) {
      throw new ConfigurationError('DB_CONNECTION_STRING is required to execute queries');
    }

    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      // Query events for logging
      query(e) {
        logger.debug('PostgreSQL query', {
          query: truncateSql(String(e.query)),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          error: errorMessage(err),
          query: e.query === undefined ? undefined : truncateSql(String(e.query)),
        });
      },

      // Connection events
      connect(e) {
        logger.debug('PostgreSQL connection established', {
          useCount: e.useCount,
        });
      },

      disconnect() {
        logger.debug('PostgreSQL connection closed');
      },
    });

    this.db = this.pgp({
      connectionString: config.connectionString,
      max: config.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      connection.done();
      this.connected = true;
      logger.info('PostgreSQL connection pool initialized', {
        readOnly: this.config.readOnly,
        poolMax: this.config.poolMax,
      });
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Failed to connect to PostgreSQL', { error: message });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  /**
   * Check out a dedicated connection for a single statement
   */
  public async acquire(): Promise<QueryConnection> {
    try {
      const connection = await this.db.connect();
      return new PostgresConnection(this.pgp, connection, this.config.readOnly);
    } catch (error) {
      throw new DatabaseError(`Could not acquire a database connection: ${errorMessage(error)}`);
    }
  }

  /**
   * Round-trip check used by the health endpoint
   */
  public async ping(): Promise<boolean> {
    try {
      await this.db.one('SELECT 1 AS ok');
      return true;
    } catch (error) {
      logger.warn('PostgreSQL ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Close all connections
   */
  public async close(): Promise<void> {
    await this.db.$pool.end();
    this.connected = false;
    logger.info('PostgreSQL connection pool closed');
  }
}

export default PostgresClient;
