/**
 * QueryGate - Guardrail Types
 *
 * Type definitions shared by the parser, validator, normalizer and gateway.
 */

// =============================================================================
// Tokens
// =============================================================================

export type TokenKind =
  | 'word'
  | 'number'
  | 'string'
  | 'dollar_string'
  | 'quoted_identifier'
  | 'line_comment'
  | 'block_comment'
  | 'parameter'
  | 'semicolon'
  | 'punctuation'
  | 'operator'
  | 'whitespace';

export interface Token {
  kind: TokenKind;
  text: string;
  /**
   * Offset of the first character in the source text
   */
  start: number;
  /**
   * Offset one past the last character
   */
  end: number;
}

// =============================================================================
// Candidate Statement
// =============================================================================

export type StatementVerb = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'DDL' | 'UNKNOWN';

export interface CandidateStatement {
  readonly text: string;
  readonly verb: StatementVerb;
  readonly statementCount: number;
  readonly tokens: readonly Token[];
  /**
   * Table references found after FROM/JOIN, lower-cased, quotes stripped
   */
  readonly tables: readonly string[];
}

// =============================================================================
// Verdict
// =============================================================================

export type RejectionReason =
  | 'non_select'
  | 'multiple_statements'
  | 'forbidden_keyword'
  | 'table_not_whitelisted';

export type VerdictReason = 'ok' | RejectionReason;

export interface ValidationVerdict {
  readonly accepted: boolean;
  readonly reason: VerdictReason;
  readonly matchedRule: string | null;
  /**
   * Human-readable outcome, suitable for surfacing to the agent
   */
  readonly message: string;
}

// =============================================================================
// Normalized Statement
// =============================================================================

export type LimitAction = 'unchanged' | 'rewritten' | 'appended';

export interface NormalizedStatement {
  readonly candidate: CandidateStatement;
  readonly sql: string;
  readonly limit: number;
  readonly limitAction: LimitAction;
  /**
   * Limit found in the original text; null when absent or LIMIT ALL
   */
  readonly originalLimit: number | null;
}

// =============================================================================
// Execution
// =============================================================================

export type ResultRow = Record<string, unknown>;

export type ExecutionErrorKind = 'execution_error' | 'timeout' | 'cancelled';

export interface ExecutionFailure {
  kind: ExecutionErrorKind;
  message: string;
}

export interface ExecutionResult {
  rows: ResultRow[];
  rowCount: number;
  truncated: boolean;
  error: ExecutionFailure | null;
  durationMs: number;
}

export interface ExecuteOptions {
  /**
   * Deadline for the database call; falls back to the configured timeout
   */
  timeoutMs?: number;
  signal?: AbortSignal;
  requestId?: string;
}

// =============================================================================
// Connections
// =============================================================================

/**
 * A single checked-out database connection, used for exactly one statement.
 */
export interface QueryConnection {
  query(sql: string, options: { timeoutMs: number }): Promise<ResultRow[]>;
  /**
   * Return the connection to its pool, or destroy it when `discard` is set.
   */
  release(discard: boolean): Promise<void>;
}

export interface ConnectionSource {
  acquire(): Promise<QueryConnection>;
}

// =============================================================================
// Output Envelope
// =============================================================================

export type EnvelopeReason = VerdictReason | 'parse_ambiguous';

/**
 * Language-neutral response handed back to the agent loop
 */
export interface GuardEnvelope {
  accepted: boolean;
  reason: EnvelopeReason;
  message: string;
  sql: string | null;
  rows: ResultRow[] | null;
  row_count: number;
  truncated: boolean;
  error: string | null;
  error_kind: ExecutionErrorKind | null;
  duration_ms: number;
}
