/**
 * QueryGate - API Module
 *
 * HTTP routes exposing the guard pipeline to the agent loop.
 */

export { createQueryRouter } from './routes/query.js';
export { createHealthRouter } from './routes/health.js';
export type { DatabaseProbe } from './routes/health.js';

export const ROUTE_PREFIXES = {
  query: '/api/query',
  health: '/health',
} as const;
