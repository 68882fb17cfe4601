/**
 * QueryGate - Execution Gateway
 *
 * Runs a normalized statement on a scoped connection and returns a uniform
 * ExecutionResult. Database failures, deadlines and cancellation are all
 * reported in the result; nothing is thrown to the caller.
 */

import logger, { logExecution } from '../utils/logger.js';
import { errorMessage, withDeadline } from '../utils/helpers.js';
import { QueryCancelledError, QueryTimeoutError } from '../utils/types.js';

import type {
  ConnectionSource,
  ExecuteOptions,
  ExecutionErrorKind,
  ExecutionResult,
  NormalizedStatement,
  QueryConnection,
} from './types.js';

export interface ExecutionGatewayConfig {
  rowLimitCeiling: number;
  defaultTimeoutMs: number;
}

export class ExecutionGateway {
  private readonly connections: ConnectionSource;
  private readonly config: ExecutionGatewayConfig;

  constructor(connections: ConnectionSource, config: ExecutionGatewayConfig) {
    this.connections = connections;
    this.config = config;
  }

  /**
   * Execute one statement on a freshly acquired connection.
   *
   * The connection is returned to its pool only after a clean run; after a
   * failure, timeout or cancellation it is discarded.
   */
  async execute(statement: NormalizedStatement, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;

    if (options.signal?.aborted) {
      return this.failed(statement, new QueryCancelledError(), startedAt, options);
    }

    const acquisition = this.connections.acquire();
    let connection: QueryConnection;
    try {
      connection = await withDeadline(acquisition, timeoutMs, options.signal);
    } catch (error) {
      this.discardLateConnection(acquisition);
      return this.failed(statement, error, startedAt, options);
    }

    let discard = true;
    try {
      const rows = await withDeadline(
        connection.query(statement.sql, { timeoutMs }),
        timeoutMs,
        options.signal
      );
      discard = false;

      const ceiling = this.config.rowLimitCeiling;
      const truncated = rows.length > ceiling;
      if (truncated) {
        logger.warn('Row count exceeded ceiling after normalization; truncating', {
          requestId: options.requestId,
          rowCount: rows.length,
          ceiling,
          limit: statement.limit,
        });
      }

      const kept = truncated ? rows.slice(0, ceiling) : rows;
      const result: ExecutionResult = {
        rows: kept,
        rowCount: kept.length,
        truncated,
        error: null,
        durationMs: Date.now() - startedAt,
      };

      logExecution({
        requestId: options.requestId,
        sql: statement.sql,
        durationMs: result.durationMs,
        rowCount: result.rowCount,
        truncated,
      });

      return result;
    } catch (error) {
      return this.failed(statement, error, startedAt, options);
    } finally {
      await this.release(connection, discard, options.requestId);
    }
  }

  private failed(
    statement: NormalizedStatement,
    error: unknown,
    startedAt: number,
    options: ExecuteOptions
  ): ExecutionResult {
    const kind = classifyError(error);
    const message = errorMessage(error);
    const durationMs = Date.now() - startedAt;

    logExecution({
      requestId: options.requestId,
      sql: statement.sql,
      durationMs,
      rowCount: 0,
      truncated: false,
      errorKind: kind,
      error: message,
    });

    return {
      rows: [],
      rowCount: 0,
      truncated: false,
      error: { kind, message },
      durationMs,
    };
  }

  private async release(connection: QueryConnection, discard: boolean, requestId?: string): Promise<void> {
    try {
      await connection.release(discard);
    } catch (error) {
      logger.error('Failed to release database connection', {
        requestId,
        discard,
        error: errorMessage(error),
      });
    }
  }

  /**
   * A connection that arrives after the caller gave up is destroyed
   */
  private discardLateConnection(acquisition: Promise<QueryConnection>): void {
    void acquisition
      .then((late) => late.release(true))
      .catch((error: unknown) => {
        logger.debug('Abandoned connection acquisition settled with error', {
          error: errorMessage(error),
        });
      });
  }
}

function classifyError(error: unknown): ExecutionErrorKind {
  if (error instanceof QueryTimeoutError) {
    return 'timeout';
  }
  if (error instanceof QueryCancelledError) {
    return 'cancelled';
  }
  return 'execution_error';
}
