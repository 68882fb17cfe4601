/**
 * QueryGate - Guardrail Module
 *
 * Parses, validates, normalizes and executes agent-generated SQL.
 */

export { tokenize, isSignificant, isComment, isKeyword, isPunctuation } from './tokenizer.js';
export { parseStatement, detectVerb, countStatements, extractTables } from './parser.js';
export { SchemaWhitelist, KeywordDenylist, DEFAULT_FORBIDDEN_KEYWORDS } from './policy.js';
export {
  DEFAULT_RULES,
  selectOnlyRule,
  singleStatementRule,
  forbiddenKeywordRule,
  tableWhitelistRule,
} from './rules.js';
export type { PolicyRule, RuleContext } from './rules.js';
export { PolicyValidator, validateStatement } from './validator.js';
export { normalizeStatement, DEFAULT_ROW_LIMIT_CEILING } from './normalizer.js';
export { ExecutionGateway } from './gateway.js';
export type { ExecutionGatewayConfig } from './gateway.js';
export { SqlGuard } from './pipeline.js';
export type {
  Token,
  TokenKind,
  StatementVerb,
  CandidateStatement,
  RejectionReason,
  VerdictReason,
  ValidationVerdict,
  LimitAction,
  NormalizedStatement,
  ResultRow,
  ExecutionErrorKind,
  ExecutionFailure,
  ExecutionResult,
  ExecuteOptions,
  QueryConnection,
  ConnectionSource,
  EnvelopeReason,
  GuardEnvelope,
} from './types.js';
