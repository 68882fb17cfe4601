/**
 * QueryGate - Tokenizer Tests
 */

import { describe, it, expect } from '@jest/globals';

import { isKeyword, isSignificant, tokenize } from '../../src/guard/tokenizer.js';
import { ParseAmbiguousError } from '../../src/utils/types.js';

const kinds = (sql: string): string[] => tokenize(sql).map((token) => token.kind);
const significantTexts = (sql: string): string[] =>
  tokenize(sql)
    .filter(isSignificant)
    .map((token) => token.text);

describe('tokenize', () => {
  it('splits a simple statement into words, operators and whitespace', () => {
    expect(kinds('SELECT * FROM customers')).toEqual([
      'word',
      'whitespace',
      'operator',
      'whitespace',
      'word',
      'whitespace',
      'word',
    ]);
  });

  it('records source offsets', () => {
    const star = tokenize('SELECT * FROM customers')[2];
    expect(star).toEqual({ kind: 'operator', text: '*', start: 7, end: 8 });
  });

  describe('string literals', () => {
    it('keeps terminators inside strings out of structure', () => {
      const tokens = tokenize("SELECT ';' AS x");
      expect(tokens.some((token) => token.kind === 'semicolon')).toBe(false);
      expect(tokens[2]).toMatchObject({ kind: 'string', text: "';'" });
    });

    it('treats a doubled quote as an escaped quote', () => {
      expect(significantTexts("SELECT 'it''s' AS s")).toEqual(['SELECT', "'it''s'", 'AS', 's']);
    });

    it('honours backslash escapes only in E strings', () => {
      expect(significantTexts("SELECT E'a\\'b'")).toEqual(['SELECT', 'E', "'a\\'b'"]);
      expect(significantTexts("SELECT 'a\\'")).toEqual(['SELECT', "'a\\'"]);
    });

    it('rejects an unterminated string', () => {
      expect(() => tokenize("SELECT 'abc")).toThrow(ParseAmbiguousError);
      expect(() => tokenize("SELECT 'abc")).toThrow(
        'Unterminated string literal starting at offset 7'
      );
    });

    it('reads dollar-quoted bodies as one token', () => {
      expect(significantTexts('SELECT $$a;b$$')).toEqual(['SELECT', '$$a;b$$']);
      expect(significantTexts('SELECT $fn$ DROP $fn$')).toEqual(['SELECT', '$fn$ DROP $fn$']);
    });

    it('rejects an unterminated dollar-quoted body', () => {
      expect(() => tokenize('SELECT $$abc')).toThrow(ParseAmbiguousError);
    });
  });

  describe('quoted identifiers', () => {
    it('reads double-quoted and backtick identifiers', () => {
      const tokens = tokenize('SELECT "drop", `delete` FROM t').filter(isSignificant);
      expect(tokens[1]).toMatchObject({ kind: 'quoted_identifier', text: '"drop"' });
      expect(tokens[3]).toMatchObject({ kind: 'quoted_identifier', text: '`delete`' });
    });

    it('rejects an unterminated quoted identifier', () => {
      expect(() => tokenize('SELECT "name FROM t')).toThrow(
        'Unterminated quoted identifier starting at offset 7'
      );
    });
  });

  describe('comments', () => {
    it('reads a line comment up to the newline', () => {
      const tokens = tokenize('SELECT 1 -- note\nFROM t');
      expect(tokens[4]).toMatchObject({ kind: 'line_comment', text: '-- note' });
      expect(tokens[5]).toMatchObject({ kind: 'whitespace', text: '\n' });
    });

    it('reads nested block comments', () => {
      const [first] = tokenize('/* a /* b */ c */ SELECT 1');
      expect(first).toMatchObject({ kind: 'block_comment', text: '/* a /* b */ c */' });
    });

    it('rejects an unterminated block comment', () => {
      expect(() => tokenize('SELECT 1 /* open')).toThrow(
        'Unterminated block comment starting at offset 9'
      );
    });

    it('rejects a stray comment terminator', () => {
      expect(() => tokenize('SELECT 1 */')).toThrow('Unbalanced comment terminator at offset 9');
    });

    it('ends an operator run at a comment opener', () => {
      expect(kinds('1<--x')).toEqual(['number', 'operator', 'line_comment']);
    });
  });

  describe('parameters and operators', () => {
    it('recognizes positional, anonymous and named parameters', () => {
      const tokens = tokenize('SELECT $1, ?, :name').filter(isSignificant);
      expect(tokens.map((token) => token.kind)).toEqual([
        'word',
        'parameter',
        'punctuation',
        'parameter',
        'punctuation',
        'parameter',
      ]);
    });

    it('reads a cast operator', () => {
      expect(significantTexts('x::int')).toEqual(['x', '::', 'int']);
    });

    it('reads numbers with fractions and exponents', () => {
      expect(significantTexts('SELECT 1.5e3, .5')).toEqual(['SELECT', '1.5e3', ',', '.5']);
    });
  });

  it('keeps identifiers that contain keywords whole', () => {
    const tokens = tokenize('SELECT dropdown_id FROM t');
    expect(tokens[2]).toMatchObject({ kind: 'word', text: 'dropdown_id' });
  });
});

describe('isKeyword', () => {
  it('matches unquoted words case-insensitively', () => {
    const [word] = tokenize('select');
    expect(isKeyword(word, 'SELECT')).toBe(true);
  });

  it('does not match quoted identifiers or missing tokens', () => {
    const [quoted] = tokenize('"select"');
    expect(isKeyword(quoted, 'SELECT')).toBe(false);
    expect(isKeyword(undefined, 'SELECT')).toBe(false);
  });
});
