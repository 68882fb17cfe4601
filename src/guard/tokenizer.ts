/**
 * QueryGate - SQL Tokenizer
 *
 * Splits SQL text into tokens with source offsets. Quoting and comments are
 * tracked explicitly so that terminators and keywords hidden inside literals
 * or comments are never mistaken for statement structure.
 */

import { ParseAmbiguousError } from '../utils/types.js';

import type { Token, TokenKind } from './types.js';

// =============================================================================
// Character Classes
// =============================================================================

const WHITESPACE = /\s/;
const WORD_START = /[A-Za-z_\u0080-\uFFFF]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-\uFFFF]/;
const DIGIT = /[0-9]/;
const OPERATOR_CHARS = '+-*/<>=~!@#%^&|';
const PUNCTUATION_CHARS = '(),.[]{}';
const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const DOLLAR_TAG_PATTERN = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

// =============================================================================
// Tokenizer
// =============================================================================

/**
 * Tokenize SQL text.
 *
 * @throws ParseAmbiguousError on unterminated strings, quoted identifiers,
 * dollar-quoted bodies or block comments, and on a stray comment terminator.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const push = (kind: TokenKind, end: number): void => {
    tokens.push({ kind, text: sql.slice(pos, end), start: pos, end });
    pos = end;
  };

  while (pos < sql.length) {
    const ch = sql.charAt(pos);

    if (WHITESPACE.test(ch)) {
      let end = pos + 1;
      while (end < sql.length && WHITESPACE.test(sql.charAt(end))) end++;
      push('whitespace', end);
      continue;
    }

    if (sql.startsWith('--', pos)) {
      const newline = sql.indexOf('\n', pos);
      push('line_comment', newline === -1 ? sql.length : newline);
      continue;
    }

    if (sql.startsWith('/*', pos)) {
      push('block_comment', scanBlockComment(sql, pos));
      continue;
    }

    if (sql.startsWith('*/', pos)) {
      throw new ParseAmbiguousError(`Unbalanced comment terminator at offset ${pos}`);
    }

    if (ch === "'") {
      push('string', scanQuoted(sql, pos, "'", allowsBackslashEscapes(tokens, pos)));
      continue;
    }

    if (ch === '"' || ch === '`') {
      push('quoted_identifier', scanQuoted(sql, pos, ch, false));
      continue;
    }

    if (ch === '$') {
      if (DIGIT.test(sql.charAt(pos + 1))) {
        let end = pos + 1;
        while (end < sql.length && DIGIT.test(sql.charAt(end))) end++;
        push('parameter', end);
        continue;
      }
      const tag = DOLLAR_TAG_PATTERN.exec(sql.slice(pos))?.[0];
      if (tag !== undefined) {
        push('dollar_string', scanDollarString(sql, pos, tag));
        continue;
      }
      push('punctuation', pos + 1);
      continue;
    }

    if (ch === ':') {
      if (sql.charAt(pos + 1) === ':') {
        push('operator', pos + 2);
        continue;
      }
      if (WORD_START.test(sql.charAt(pos + 1))) {
        let end = pos + 2;
        while (end < sql.length && WORD_PART.test(sql.charAt(end))) end++;
        push('parameter', end);
        continue;
      }
      push('punctuation', pos + 1);
      continue;
    }

    if (ch === '?') {
      push('parameter', pos + 1);
      continue;
    }

    if (ch === ';') {
      push('semicolon', pos + 1);
      continue;
    }

    const number = NUMBER_PATTERN.exec(sql.slice(pos))?.[0];
    if (number !== undefined) {
      push('number', pos + number.length);
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = pos + 1;
      while (end < sql.length && WORD_PART.test(sql.charAt(end))) end++;
      push('word', end);
      continue;
    }

    if (OPERATOR_CHARS.includes(ch)) {
      push('operator', scanOperator(sql, pos));
      continue;
    }

    if (PUNCTUATION_CHARS.includes(ch)) {
      push('punctuation', pos + 1);
      continue;
    }

    // Anything else is kept as an opaque single-character token
    push('punctuation', pos + 1);
  }

  return tokens;
}

/**
 * Whitespace and comments carry no statement structure
 */
export function isSignificant(token: Token): boolean {
  return (
    token.kind !== 'whitespace' && token.kind !== 'line_comment' && token.kind !== 'block_comment'
  );
}

export function isComment(token: Token): boolean {
  return token.kind === 'line_comment' || token.kind === 'block_comment';
}

/**
 * Case-insensitive keyword test for unquoted words
 */
export function isKeyword(token: Token | undefined, keyword: string): boolean {
  return token !== undefined && token.kind === 'word' && token.text.toUpperCase() === keyword;
}

export function isPunctuation(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'punctuation' && token.text === text;
}

// =============================================================================
// Scanners
// =============================================================================

function scanBlockComment(sql: string, start: number): number {
  let depth = 0;
  let pos = start;

  while (pos < sql.length) {
    if (sql.startsWith('/*', pos)) {
      depth++;
      pos += 2;
    } else if (sql.startsWith('*/', pos)) {
      depth--;
      pos += 2;
      if (depth === 0) {
        return pos;
      }
    } else {
      pos++;
    }
  }

  throw new ParseAmbiguousError(`Unterminated block comment starting at offset ${start}`);
}

function scanQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let pos = start + 1;

  while (pos < sql.length) {
    const ch = sql.charAt(pos);
    if (backslashEscapes && ch === '\\') {
      pos += 2;
      continue;
    }
    if (ch === quote) {
      // A doubled quote is an escaped quote character
      if (sql.charAt(pos + 1) === quote) {
        pos += 2;
        continue;
      }
      return pos + 1;
    }
    pos++;
  }

  const what = quote === "'" ? 'string literal' : 'quoted identifier';
  throw new ParseAmbiguousError(`Unterminated ${what} starting at offset ${start}`);
}

function scanDollarString(sql: string, start: number, tag: string): number {
  const close = sql.indexOf(tag, start + tag.length);
  if (close === -1) {
    throw new ParseAmbiguousError(`Unterminated dollar-quoted string starting at offset ${start}`);
  }
  return close + tag.length;
}

function scanOperator(sql: string, start: number): number {
  let pos = start;

  while (pos < sql.length && OPERATOR_CHARS.includes(sql.charAt(pos))) {
    // Comment openers end an operator run
    if (pos > start && (sql.startsWith('--', pos) || sql.startsWith('/*', pos))) {
      break;
    }
    if (sql.startsWith('*/', pos)) {
      throw new ParseAmbiguousError(`Unbalanced comment terminator at offset ${pos}`);
    }
    pos++;
  }

  return pos;
}

/**
 * E'...' strings (PostgreSQL escape syntax) honour backslash escapes
 */
function allowsBackslashEscapes(tokens: Token[], quoteStart: number): boolean {
  const previous = tokens[tokens.length - 1];
  return (
    previous !== undefined &&
    previous.kind === 'word' &&
    previous.end === quoteStart &&
    previous.text.toUpperCase() === 'E'
  );
}
