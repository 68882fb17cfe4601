/**
 * QueryGate - Request Logging Middleware
 *
 * One line per request, written when the connection closes. A client that
 * hangs up before the response is sent cancels its query and is logged
 * with 499; query routes add the guard's envelope reason.
 */

import type { RequestHandler } from 'express';

import { logRequest, type RequestLogData } from '../../utils/logger.js';
import { getClientIp } from '../../utils/helpers.js';

const CLIENT_CLOSED_REQUEST = 499;

export interface RequestLoggerOptions {
  /** Path prefixes that are never logged */
  skipPaths?: readonly string[];
  log?: (data: RequestLogData) => void;
}

export function requestLogger(options: RequestLoggerOptions = {}): RequestHandler {
  const { skipPaths = [], log = logRequest } = options;

  return (req, res, next) => {
    if (skipPaths.some((prefix) => req.path.startsWith(prefix))) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();
    const path = req.path;

    res.once('close', () => {
      log({
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path,
        statusCode: res.writableFinished ? res.statusCode : CLIENT_CLOSED_REQUEST,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers),
        reason: req.guardReason,
      });
    });

    next();
  };
}

export default requestLogger;
