/**
 * QueryGate - Policy Rules
 *
 * Each rule is a pure predicate over a CandidateStatement. A rule returns
 * null when the statement passes, or a short description of the violation.
 */

import type { KeywordDenylist, SchemaWhitelist } from './policy.js';
import { isKeyword } from './tokenizer.js';
import type { CandidateStatement, RejectionReason } from './types.js';

export interface RuleContext {
  readonly whitelist: SchemaWhitelist;
  readonly denylist: KeywordDenylist;
}

export interface PolicyRule {
  readonly name: string;
  readonly reason: RejectionReason;
  check(statement: CandidateStatement, context: RuleContext): string | null;
}

export const selectOnlyRule: PolicyRule = {
  name: 'select-only',
  reason: 'non_select',
  check(statement) {
    if (statement.verb !== 'SELECT') {
      return statement.verb === 'UNKNOWN'
        ? 'only SELECT statements are allowed, statement type not recognized'
        : `only SELECT statements are allowed, got ${statement.verb}`;
    }
    // SELECT ... INTO new_table writes a table
    return statement.tokens.some((token) => isKeyword(token, 'INTO'))
      ? 'only SELECT statements are allowed, SELECT INTO creates a table'
      : null;
  },
};

export const singleStatementRule: PolicyRule = {
  name: 'single-statement',
  reason: 'multiple_statements',
  check(statement) {
    return statement.statementCount === 1
      ? null
      : `expected a single statement, found ${statement.statementCount}`;
  },
};

export const forbiddenKeywordRule: PolicyRule = {
  name: 'forbidden-keywords',
  reason: 'forbidden_keyword',
  check(statement, { denylist }) {
    for (const token of statement.tokens) {
      const keyword = denylist.match(token);
      if (keyword !== null) {
        return `contains forbidden keyword ${keyword}`;
      }
    }
    return null;
  },
};

export const tableWhitelistRule: PolicyRule = {
  name: 'table-whitelist',
  reason: 'table_not_whitelisted',
  check(statement, { whitelist }) {
    if (whitelist.isEmpty) {
      return null;
    }
    const denied = statement.tables.find((table) => !whitelist.permits(table));
    return denied === undefined ? null : `table ${denied} is not whitelisted`;
  },
};

/**
 * Evaluation order matters: the first failing rule decides the verdict.
 */
export const DEFAULT_RULES: readonly PolicyRule[] = Object.freeze([
  selectOnlyRule,
  singleStatementRule,
  forbiddenKeywordRule,
  tableWhitelistRule,
]);
