/**
 * QueryGate - HTTP Server
 * Express host exposing the guard pipeline
 */

import http from 'http';
import { type AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application } from 'express';
import helmet from 'helmet';

import { ROUTE_PREFIXES } from '../api/index.js';
import { createHealthRouter, type DatabaseProbe } from '../api/routes/health.js';
import { createQueryRouter } from '../api/routes/query.js';
import { SqlGuard } from '../guard/pipeline.js';
import type { ConnectionSource } from '../guard/types.js';
import { logLifecycle } from '../utils/logger.js';
import type { QueryGateConfig } from '../utils/types.js';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';

// =============================================================================
// Types
// =============================================================================

export interface AppOptions {
  probe?: DatabaseProbe;
  /** Largest accepted JSON body */
  bodyLimit?: string;
}

export interface QueryGateServerOptions {
  connections?: ConnectionSource;
  probe?: DatabaseProbe;
}

// =============================================================================
// Application Factory
// =============================================================================

/**
 * Build the Express application around an already configured guard
 */
export function createApp(guard: SqlGuard, options: AppOptions = {}): Application {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: false,
    })
  );
  app.use(cors());
  app.use(compression());
  app.use(requestIdMiddleware());
  app.use(requestLogger({ skipPaths: [ROUTE_PREFIXES.health] }));
  app.use(express.json({ limit: options.bodyLimit ?? '256kb' }));

  app.use(ROUTE_PREFIXES.health, createHealthRouter(options.probe));
  app.use(ROUTE_PREFIXES.query, createQueryRouter(guard));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// =============================================================================
// Server Class
// =============================================================================

export class QueryGateServer {
  private readonly config: QueryGateConfig;
  private readonly guard: SqlGuard;
  private readonly app: Application;
  private server: http.Server | null = null;
  private isShuttingDown = false;

  constructor(config: QueryGateConfig, options: QueryGateServerOptions = {}) {
    this.config = config;
    this.guard = new SqlGuard(config.policy, options.connections);
    this.app = createApp(this.guard, { probe: options.probe });
  }

  /**
   * Start listening; resolves with the bound address
   */
  public start(): Promise<AddressInfo> {
    const { port, host } = this.config.server;
    const server = http.createServer(this.app);
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not bound to a TCP address'));
          return;
        }

        logLifecycle('ready', `QueryGate listening on ${address.address}:${address.port}`, {
          environment: this.config.server.nodeEnv,
          database: this.guard.hasDatabase(),
          rowLimitCeiling: this.config.policy.rowLimitCeiling,
        });
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and wait for in-flight requests
   */
  public async shutdown(): Promise<void> {
    if (this.isShuttingDown || this.server === null) {
      return;
    }
    this.isShuttingDown = true;

    const server = this.server;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    this.server = null;
    logLifecycle('shutdown', 'HTTP server closed');
  }

  public getApp(): Application {
    return this.app;
  }

  public getGuard(): SqlGuard {
    return this.guard;
  }
}

export default QueryGateServer;
