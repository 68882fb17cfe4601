/**
 * QueryGate - SQL Guardrail Service
 * Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

// =============================================================================
// Database Configuration Types
// =============================================================================

export interface DatabaseConfig {
  /**
   * PostgreSQL connection string. Opaque to the guardrail core.
   */
  connectionString?: string;
  readOnly: boolean;
  poolMax: number;
  connectionTimeoutMs: number;
}

// =============================================================================
// Guardrail Policy Types
// =============================================================================

export interface PolicyConfig {
  rowLimitCeiling: number;
  schemaWhitelist: readonly string[];
  forbiddenKeywords: readonly string[];
  maxQueryLength: number;
  queryTimeoutMs: number;
}

export interface QueryGateConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  policy: PolicyConfig;
}

// =============================================================================
// HTTP Types
// =============================================================================

// requestId and startTime come from the requestId middleware; the query
// routes record the guard's envelope reason for the request log
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      guardReason?: string;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class QueryGateError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'QueryGateError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends QueryGateError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when quoting, comment or clause structure makes the statement
 * impossible to classify reliably. Always treated as a rejection.
 */
export class ParseAmbiguousError extends QueryGateError {
  constructor(message: string) {
    super(message, 422, 'PARSE_AMBIGUOUS', true);
    this.name = 'ParseAmbiguousError';
  }
}

export class DatabaseError extends QueryGateError {
  constructor(message: string) {
    super(message, 500, 'DATABASE_ERROR', true);
    this.name = 'DatabaseError';
  }
}

export class QueryTimeoutError extends QueryGateError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Query exceeded the ${timeoutMs}ms deadline`, 504, 'QUERY_TIMEOUT', true);
    this.name = 'QueryTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class QueryCancelledError extends QueryGateError {
  constructor(message = 'Query cancelled by caller') {
    super(message, 499, 'QUERY_CANCELLED', true);
    this.name = 'QueryCancelledError';
  }
}

export class ValidationError extends QueryGateError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}
