/**
 * QueryGate - Query Normalizer
 *
 * Enforces the row ceiling on an accepted statement by keeping, lowering or
 * appending its trailing LIMIT clause. Only the LIMIT count is ever touched.
 */

import { ConfigurationError, ParseAmbiguousError } from '../utils/types.js';

import { isKeyword, isPunctuation, isSignificant } from './tokenizer.js';
import type { CandidateStatement, NormalizedStatement, Token } from './types.js';

export const DEFAULT_ROW_LIMIT_CEILING = 100;

const INTEGER = /^\d+$/;

interface LimitClause {
  /**
   * Token holding the row count (a number, or the word ALL)
   */
  count: Token;
  value: number | null;
}

/**
 * Normalize an accepted statement against a row ceiling.
 *
 * @throws ParseAmbiguousError when the LIMIT count is not an integer literal
 * or the clause is followed by anything the normalizer cannot reason about.
 */
export function normalizeStatement(
  candidate: CandidateStatement,
  ceiling: number = DEFAULT_ROW_LIMIT_CEILING
): NormalizedStatement {
  if (!Number.isSafeInteger(ceiling) || ceiling < 1) {
    throw new ConfigurationError(`Row limit ceiling must be a positive integer, got ${ceiling}`);
  }

  const body = statementBody(candidate.tokens);
  const last = body[body.length - 1];
  if (last === undefined) {
    throw new ParseAmbiguousError('Statement is empty');
  }

  const clause = findLimitClause(body);
  const sql = candidate.text;

  if (clause === null) {
    return Object.freeze({
      candidate,
      sql: `${sql.slice(0, last.end)} LIMIT ${ceiling}${sql.slice(last.end)}`,
      limit: ceiling,
      limitAction: 'appended',
      originalLimit: null,
    });
  }

  if (clause.value !== null && clause.value <= ceiling) {
    return Object.freeze({
      candidate,
      sql,
      limit: clause.value,
      limitAction: 'unchanged',
      originalLimit: clause.value,
    });
  }

  return Object.freeze({
    candidate,
    sql: `${sql.slice(0, clause.count.start)}${ceiling}${sql.slice(clause.count.end)}`,
    limit: ceiling,
    limitAction: 'rewritten',
    originalLimit: clause.value,
  });
}

/**
 * Significant tokens of the statement without trailing terminators
 */
function statementBody(tokens: readonly Token[]): Token[] {
  const body = tokens.filter(isSignificant);
  while (body.length > 0 && body[body.length - 1]?.kind === 'semicolon') {
    body.pop();
  }
  return body;
}

function findLimitClause(body: readonly Token[]): LimitClause | null {
  let depth = 0;
  let limitIndex = -1;

  body.forEach((token, index) => {
    if (isPunctuation(token, '(')) {
      depth++;
    } else if (isPunctuation(token, ')')) {
      depth--;
    } else if (depth === 0 && isKeyword(token, 'FETCH')) {
      throw new ParseAmbiguousError('FETCH row limiting is not supported; use LIMIT');
    } else if (depth === 0 && isKeyword(token, 'LIMIT')) {
      limitIndex = index;
    }
  });

  if (limitIndex === -1) {
    return null;
  }

  const [first, second, third, ...rest] = body.slice(limitIndex + 1);
  if (first === undefined || rest.length > 0) {
    throw ambiguousLimit();
  }

  // LIMIT n | LIMIT ALL
  if (second === undefined) {
    if (isKeyword(first, 'ALL')) {
      return { count: first, value: null };
    }
    return { count: first, value: integerValue(first) };
  }

  // LIMIT n OFFSET m
  if (isKeyword(second, 'OFFSET') && third !== undefined) {
    integerValue(third);
    return { count: first, value: integerValue(first) };
  }

  // LIMIT offset, count
  if (isPunctuation(second, ',') && third !== undefined) {
    integerValue(first);
    return { count: third, value: integerValue(third) };
  }

  throw ambiguousLimit();
}

function integerValue(token: Token): number {
  if (token.kind !== 'number' || !INTEGER.test(token.text)) {
    throw ambiguousLimit();
  }
  return Number(token.text);
}

function ambiguousLimit(): ParseAmbiguousError {
  return new ParseAmbiguousError(
    'LIMIT clause must be a trailing integer literal (optionally with OFFSET)'
  );
}
