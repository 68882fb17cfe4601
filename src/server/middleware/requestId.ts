/**
 * QueryGate - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';

import { generateRequestId } from '../../utils/helpers.js';

// =============================================================================
// Constants
// =============================================================================

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';

// Caller-supplied ids end up in log lines, so only short, plain ones are reused
const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

// =============================================================================
// Request ID Middleware
// =============================================================================

/**
 * Middleware that assigns a request ID to each incoming request.
 * A well-formed X-Request-ID header from the caller is reused, otherwise a
 * new UUID is generated. The id is set on req.requestId and echoed back in
 * the response headers; req.startTime is stamped for the request log.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const candidate = Array.isArray(existingId) ? existingId[0] : existingId;
    const requestId =
      candidate !== undefined && ACCEPTED_REQUEST_ID.test(candidate)
        ? candidate
        : generateRequestId();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
