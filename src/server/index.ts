/**
 * QueryGate - Server Module
 */

export { QueryGateServer, createApp } from './server.js';
export type { AppOptions, QueryGateServerOptions } from './server.js';
export * from './middleware/index.js';
