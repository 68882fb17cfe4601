/**
 * QueryGate - HTTP Middleware
 */

export { requestIdMiddleware } from './requestId.js';
export { requestLogger } from './requestLogger.js';
export type { RequestLoggerOptions } from './requestLogger.js';
export {
  errorHandler,
  notFoundHandler,
  asyncHandler,
  badRequest,
  buildErrorResponse,
  toQueryGateError,
} from './errorHandler.js';
export type { ErrorResponse } from './errorHandler.js';
