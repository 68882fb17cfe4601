/**
 * QueryGate - Guard Pipeline
 *
 * Single validate-and-execute entry point:
 * raw SQL → parse → validate (reject short-circuits) → normalize → execute.
 * Every outcome, including parse failures and database errors, comes back as
 * a GuardEnvelope.
 */

import { logVerdict } from '../utils/logger.js';
import { ParseAmbiguousError, type PolicyConfig } from '../utils/types.js';

import { ExecutionGateway } from './gateway.js';
import { normalizeStatement } from './normalizer.js';
import { parseStatement } from './parser.js';
import { KeywordDenylist, SchemaWhitelist } from './policy.js';
import { PolicyValidator } from './validator.js';
import type {
  ConnectionSource,
  EnvelopeReason,
  ExecuteOptions,
  ExecutionResult,
  GuardEnvelope,
  NormalizedStatement,
} from './types.js';

type Preparation =
  | { ok: true; statement: NormalizedStatement }
  | { ok: false; envelope: GuardEnvelope };

export class SqlGuard {
  private readonly policy: PolicyConfig;
  private readonly validator: PolicyValidator;
  private readonly gateway: ExecutionGateway | null;

  constructor(policy: PolicyConfig, connections?: ConnectionSource) {
    this.policy = policy;
    this.validator = new PolicyValidator({
      whitelist: new SchemaWhitelist(policy.schemaWhitelist),
      denylist: new KeywordDenylist(policy.forbiddenKeywords),
    });
    this.gateway =
      connections === undefined
        ? null
        : new ExecutionGateway(connections, {
            rowLimitCeiling: policy.rowLimitCeiling,
            defaultTimeoutMs: policy.queryTimeoutMs,
          });
  }

  /**
   * Dry run: parse, validate and normalize without touching the database
   */
  inspect(sql: string, requestId?: string): GuardEnvelope {
    const startedAt = Date.now();
    const prepared = this.prepare(sql, startedAt, requestId);
    if (!prepared.ok) {
      return prepared.envelope;
    }
    return acceptedEnvelope(prepared.statement, null, startedAt);
  }

  /**
   * Validate and, when accepted, execute the statement
   */
  async run(sql: string, options: ExecuteOptions = {}): Promise<GuardEnvelope> {
    const startedAt = Date.now();
    const prepared = this.prepare(sql, startedAt, options.requestId);
    if (!prepared.ok) {
      return prepared.envelope;
    }

    if (this.gateway === null) {
      return acceptedEnvelope(
        prepared.statement,
        {
          rows: [],
          rowCount: 0,
          truncated: false,
          error: { kind: 'execution_error', message: 'No database connection configured' },
          durationMs: 0,
        },
        startedAt
      );
    }

    const result = await this.gateway.execute(prepared.statement, options);
    return acceptedEnvelope(prepared.statement, result, startedAt);
  }

  getPolicy(): PolicyConfig {
    return this.policy;
  }

  hasDatabase(): boolean {
    return this.gateway !== null;
  }

  private prepare(sql: string, startedAt: number, requestId?: string): Preparation {
    if (sql.length > this.policy.maxQueryLength) {
      return this.ambiguous(
        sql,
        `query exceeds maximum length of ${this.policy.maxQueryLength} characters`,
        startedAt,
        requestId
      );
    }

    try {
      const candidate = parseStatement(sql);
      const verdict = this.validator.validate(candidate);

      logVerdict({
        requestId,
        sql,
        accepted: verdict.accepted,
        reason: verdict.reason,
        matchedRule: verdict.matchedRule,
      });

      if (!verdict.accepted) {
        return {
          ok: false,
          envelope: rejectedEnvelope(verdict.reason, verdict.message, startedAt),
        };
      }

      return { ok: true, statement: normalizeStatement(candidate, this.policy.rowLimitCeiling) };
    } catch (error) {
      if (error instanceof ParseAmbiguousError) {
        return this.ambiguous(sql, error.message, startedAt, requestId);
      }
      throw error;
    }
  }

  private ambiguous(sql: string, detail: string, startedAt: number, requestId?: string): Preparation {
    logVerdict({ requestId, sql, accepted: false, reason: 'parse_ambiguous' });
    return {
      ok: false,
      envelope: rejectedEnvelope('parse_ambiguous', `query rejected: ${detail}`, startedAt),
    };
  }
}

// =============================================================================
// Envelope Builders
// =============================================================================

function rejectedEnvelope(reason: EnvelopeReason, message: string, startedAt: number): GuardEnvelope {
  return {
    accepted: false,
    reason,
    message,
    sql: null,
    rows: null,
    row_count: 0,
    truncated: false,
    error: null,
    error_kind: null,
    duration_ms: Date.now() - startedAt,
  };
}

function acceptedEnvelope(
  statement: NormalizedStatement,
  result: ExecutionResult | null,
  startedAt: number
): GuardEnvelope {
  const failed = result?.error ?? null;

  return {
    accepted: true,
    reason: 'ok',
    message: acceptanceMessage(statement),
    sql: statement.sql,
    rows: result === null || failed !== null ? null : result.rows,
    row_count: result?.rowCount ?? 0,
    truncated: result?.truncated ?? false,
    error: failed?.message ?? null,
    error_kind: failed?.kind ?? null,
    duration_ms: Date.now() - startedAt,
  };
}

function acceptanceMessage(statement: NormalizedStatement): string {
  switch (statement.limitAction) {
    case 'appended':
      return `query accepted; LIMIT ${statement.limit} applied`;
    case 'rewritten':
      return statement.originalLimit === null
        ? `query accepted; LIMIT ALL lowered to ${statement.limit}`
        : `query accepted; LIMIT ${statement.originalLimit} lowered to ${statement.limit}`;
    case 'unchanged':
      return 'query accepted';
  }
}
