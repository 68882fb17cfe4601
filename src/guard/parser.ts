/**
 * QueryGate - Statement Parser/Classifier
 *
 * Turns raw SQL text into a CandidateStatement: leading verb, statement
 * count and the tables referenced through FROM/JOIN.
 */

import { ParseAmbiguousError } from '../utils/types.js';

import { isKeyword, isPunctuation, isSignificant, tokenize } from './tokenizer.js';
import type { CandidateStatement, StatementVerb, Token } from './types.js';

// =============================================================================
// Keyword Tables
// =============================================================================

const DML_VERBS: Readonly<Record<string, StatementVerb>> = {
  SELECT: 'SELECT',
  INSERT: 'INSERT',
  UPDATE: 'UPDATE',
  DELETE: 'DELETE',
};

const DDL_VERBS = new Set([
  'CREATE',
  'DROP',
  'ALTER',
  'TRUNCATE',
  'RENAME',
  'COMMENT',
  'GRANT',
  'REVOKE',
]);

// Keywords that close a FROM clause at the depth where they appear
const FROM_CLOSERS = new Set([
  'WHERE',
  'GROUP',
  'HAVING',
  'WINDOW',
  'ORDER',
  'LIMIT',
  'OFFSET',
  'FETCH',
  'FOR',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'RETURNING',
]);

const SET_OPERATORS = new Set(['UNION', 'INTERSECT', 'EXCEPT']);

// Keywords that make a parenthesis a nested query
const QUERY_STARTERS = new Set(['SELECT', 'WITH', 'VALUES', 'TABLE']);

// Modifiers that may sit between FROM/JOIN and the table name
const TABLE_MODIFIERS = new Set(['ONLY', 'LATERAL']);

// Unquoted names PostgreSQL would fold to exactly this text
const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse raw SQL into an immutable CandidateStatement.
 *
 * @throws ParseAmbiguousError when quoting, comments or parentheses are
 * unbalanced.
 */
export function parseStatement(sql: string): CandidateStatement {
  const tokens = tokenize(sql).map((token) => Object.freeze(token));
  const significant = tokens.filter(isSignificant);

  assertBalancedParentheses(significant);

  return Object.freeze({
    text: sql,
    verb: detectVerb(significant),
    statementCount: countStatements(tokens),
    tokens: Object.freeze(tokens),
    tables: Object.freeze(extractTables(significant)),
  });
}

/**
 * Leading verb, ignoring whitespace and comments
 */
export function detectVerb(significant: readonly Token[]): StatementVerb {
  const first = significant[0];
  if (first === undefined || first.kind !== 'word') {
    return 'UNKNOWN';
  }

  const word = first.text.toUpperCase();
  const dml = DML_VERBS[word];
  if (dml !== undefined) {
    return dml;
  }
  return DDL_VERBS.has(word) ? 'DDL' : 'UNKNOWN';
}

/**
 * Count statements separated by unquoted terminators. Everything after a
 * terminator other than whitespace opens another statement, including a
 * comment or a second terminator.
 */
export function countStatements(tokens: readonly Token[]): number {
  let count = 0;
  let open = false;

  for (const token of tokens) {
    if (token.kind === 'whitespace') continue;
    if (!open) {
      count++;
      open = true;
    }
    if (token.kind === 'semicolon') {
      open = false;
    }
  }

  return count;
}

function assertBalancedParentheses(significant: readonly Token[]): void {
  let depth = 0;

  for (const token of significant) {
    if (isPunctuation(token, '(')) {
      depth++;
    } else if (isPunctuation(token, ')')) {
      depth--;
      if (depth < 0) {
        throw new ParseAmbiguousError(`Unbalanced ')' at offset ${token.start}`);
      }
    }
  }

  if (depth !== 0) {
    throw new ParseAmbiguousError('Unbalanced parentheses: missing )');
  }
}

// =============================================================================
// Table Reference Scan
// =============================================================================

interface ScanScope {
  // False for function calls, value lists and other expressions
  readonly query: boolean;
  // Inside a FROM clause, where JOIN and top-level commas introduce tables
  fromOpen: boolean;
  // The next name is a table reference
  expectTable: boolean;
  // Start of a query or of a set-operation branch, where TABLE name may appear
  branchStart: boolean;
}

/**
 * Collect the tables a statement reads: FROM items, JOIN targets, every item
 * of a comma-separated FROM list (also after a join condition), and the
 * TABLE name shorthand. Parentheses that hold function arguments or value
 * lists are not scanned, so FROM inside EXTRACT(YEAR FROM ts) is ignored;
 * nested queries are scanned like the outer one.
 */
export function extractTables(significant: readonly Token[]): string[] {
  const tables: string[] = [];
  const scopes: ScanScope[] = [{ query: true, fromOpen: false, expectTable: false, branchStart: true }];

  for (let i = 0; i < significant.length; i++) {
    const token = significant[i];
    const scope = scopes[scopes.length - 1];
    if (token === undefined || scope === undefined) break;

    if (isPunctuation(token, '(')) {
      scopes.push(openScope(scope, significant[i + 1]));
      continue;
    }
    if (isPunctuation(token, ')')) {
      if (scopes.length > 1) scopes.pop();
      continue;
    }
    if (!scope.query) continue;

    const word = token.kind === 'word' ? token.text.toUpperCase() : '';

    if (scope.expectTable) {
      if (TABLE_MODIFIERS.has(word)) continue;
      scope.expectTable = false;
      const reference = readQualifiedName(significant, i);
      if (reference !== null) {
        tables.push(reference.name);
        i = reference.next - 1;
        continue;
      }
    }

    if (word === 'TABLE' && scope.branchStart) {
      scope.branchStart = false;
      scope.expectTable = true;
      continue;
    }
    scope.branchStart =
      SET_OPERATORS.has(word) || (scope.branchStart && (word === 'ALL' || word === 'DISTINCT'));

    if (word === 'FROM' && !isKeyword(significant[i - 1], 'DISTINCT')) {
      scope.fromOpen = true;
      scope.expectTable = true;
    } else if (FROM_CLOSERS.has(word)) {
      scope.fromOpen = false;
    } else if (scope.fromOpen && (word === 'JOIN' || isPunctuation(token, ','))) {
      scope.expectTable = true;
    }
  }

  return [...new Set(tables)];
}

function openScope(parent: ScanScope, next: Token | undefined): ScanScope {
  const fromItem = parent.query && parent.expectTable;
  parent.expectTable = false;

  if (next !== undefined && next.kind === 'word' && QUERY_STARTERS.has(next.text.toUpperCase())) {
    return { query: true, fromOpen: false, expectTable: false, branchStart: true };
  }
  // FROM (a JOIN b ON ...) lists its tables directly
  if (fromItem) {
    return { query: true, fromOpen: true, expectTable: true, branchStart: false };
  }
  return { query: false, fromOpen: false, expectTable: false, branchStart: false };
}

function readQualifiedName(
  significant: readonly Token[],
  start: number
): { name: string; next: number } | null {
  const parts: string[] = [];
  let i = start;

  for (;;) {
    const token = significant[i];
    if (token === undefined || (token.kind !== 'word' && token.kind !== 'quoted_identifier')) {
      break;
    }
    parts.push(identifierText(token));
    i++;
    if (!isPunctuation(significant[i], '.')) break;
    i++;
  }

  return parts.length === 0 ? null : { name: parts.join('.'), next: i };
}

/**
 * Canonical text of one name segment. Unquoted words fold to lower case;
 * quoted ones keep their case and stay quoted unless folding would give
 * the same name.
 */
function identifierText(token: Token): string {
  if (token.kind !== 'quoted_identifier') {
    return token.text.toLowerCase();
  }
  const quote = token.text.charAt(0);
  const name = token.text.slice(1, -1).split(quote + quote).join(quote);
  return PLAIN_IDENTIFIER.test(name) ? name : `"${name.split('"').join('""')}"`;
}

/**
 * Canonical form of a configured table name such as `customers`,
 * `public.orders` or `"Audit"."Log"`, or null when the text is not a single
 * qualified name.
 */
export function parseTableName(text: string): string | null {
  const significant = tokenize(text).filter(isSignificant);
  const reference = readQualifiedName(significant, 0);
  return reference !== null && reference.next === significant.length ? reference.name : null;
}
