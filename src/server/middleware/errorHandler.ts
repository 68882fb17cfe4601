/**
 * QueryGate - Error Handler Middleware
 *
 * Everything that fails inside the HTTP host leaves it as a QueryGateError,
 * so the status and code always come from the error hierarchy in
 * utils/types. Statement rejections never get here: the guard reports them
 * inside a 200 envelope.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';

import logger from '../../utils/logger.js';
import { errorMessage, isProduction } from '../../utils/helpers.js';
import { QueryGateError, ValidationError } from '../../utils/types.js';

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
}

// express.json() failures, keyed by the `type` body-parser attaches
const BODY_PARSER_ERRORS: Readonly<Record<string, { code: string; message: string }>> = {
  'entity.parse.failed': { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
  'entity.too.large': { code: 'PAYLOAD_TOO_LARGE', message: 'Request body exceeds the size limit' },
  'encoding.unsupported': { code: 'UNSUPPORTED_ENCODING', message: 'Unsupported request body encoding' },
  'charset.unsupported': { code: 'UNSUPPORTED_CHARSET', message: 'Unsupported request body charset' },
};

interface HttpErrorInfo {
  status: number;
  type: string | undefined;
  message: string;
}

function httpErrorInfo(err: unknown): HttpErrorInfo | null {
  if (!(err instanceof Error) || !('status' in err) || typeof err.status !== 'number') {
    return null;
  }
  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  return { status: err.status, type, message: err.message };
}

/**
 * Map any thrown value onto the QueryGateError hierarchy
 */
export function toQueryGateError(err: unknown): QueryGateError {
  if (err instanceof QueryGateError) {
    return err;
  }

  const http = httpErrorInfo(err);
  if (http !== null) {
    const known = http.type === undefined ? undefined : BODY_PARSER_ERRORS[http.type];
    return known === undefined
      ? new QueryGateError(http.message, http.status, 'HTTP_ERROR')
      : new QueryGateError(known.message, http.status, known.code);
  }

  // Unexpected faults are not operational; their text stays out of production responses
  return new QueryGateError(
    isProduction() ? 'Internal server error' : errorMessage(err),
    500,
    'INTERNAL_ERROR',
    false
  );
}

export function buildErrorResponse(error: QueryGateError, requestId?: string): ErrorResponse {
  const response: ErrorResponse = {
    error: error.message,
    code: error.code,
    statusCode: error.statusCode,
    requestId,
  };
  if (error instanceof ValidationError && error.validationErrors.length > 0) {
    response.details = error.validationErrors;
  }
  return response;
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const error = toQueryGateError(err);
  const context = {
    requestId: req.requestId,
    method: req.method,
    path: req.originalUrl,
    code: error.code,
    statusCode: error.statusCode,
  };

  if (!error.isOperational || error.statusCode >= 500) {
    logger.error(errorMessage(err), { ...context, stack: err instanceof Error ? err.stack : undefined });
  } else {
    logger.warn(error.message, context);
  }

  res.status(error.statusCode).json(buildErrorResponse(error, req.requestId));
};

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new QueryGateError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND'));
};

/**
 * Forward rejections of an async route handler to errorHandler
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function badRequest(message: string, details?: string[]): ValidationError {
  return new ValidationError(message, details);
}

export default errorHandler;
