/**
 * QueryGate - SQL Guardrail Service
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { loadConfig } from './config/loader.js';
import { QueryGateServer } from './server/server.js';
import { PostgresClient } from './storage/postgres.js';
import { errorMessage } from './utils/helpers.js';
import logger, { logLifecycle } from './utils/logger.js';

// =============================================================================
// Global State
// =============================================================================

let server: QueryGateServer | null = null;
let database: PostgresClient | null = null;
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'QueryGate starting up...');

  try {
    const config = loadConfig();

    if (config.database.connectionString !== undefined) {
      database = new PostgresClient(config.database);
      try {
        await database.connect();
      } catch (error) {
        // The pool reconnects lazily; /health reports the outage meanwhile
        logger.warn('PostgreSQL is not reachable yet, continuing', {
          error: errorMessage(error),
        });
      }
    } else {
      logger.warn('DB_CONNECTION_STRING is not set; statements are validated but not executed');
    }

    const client = database;
    server = new QueryGateServer(config, {
      connections: client ?? undefined,
      probe: client === null ? undefined : () => client.ping(),
    });

    const address = await server.start();

    logLifecycle('ready', 'QueryGate is ready to accept connections', {
      url: `http://${address.address}:${address.port}`,
    });
  } catch (error) {
    logLifecycle('error', 'Failed to start QueryGate', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (server !== null) {
      await server.shutdown();
    }

    if (database !== null) {
      await database.close();
    }

    clearTimeout(shutdownTimeout);
    logLifecycle('shutdown', 'QueryGate shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', {
      error: errorMessage(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: errorMessage(reason),
  });
});

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  logger.error('Fatal error during bootstrap', { error: errorMessage(error) });
  process.exit(1);
});
