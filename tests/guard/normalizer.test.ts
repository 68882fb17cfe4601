/**
 * QueryGate - Query Normalizer Tests
 */

import { describe, it, expect } from '@jest/globals';

import { normalizeStatement } from '../../src/guard/normalizer.js';
import { parseStatement } from '../../src/guard/parser.js';
import { ConfigurationError, ParseAmbiguousError } from '../../src/utils/types.js';

const normalize = (sql: string, ceiling = 100) => normalizeStatement(parseStatement(sql), ceiling);

describe('normalizeStatement', () => {
  describe('missing LIMIT', () => {
    it('appends the ceiling', () => {
      const normalized = normalize('SELECT * FROM customers');
      expect(normalized.sql).toBe('SELECT * FROM customers LIMIT 100');
      expect(normalized.limit).toBe(100);
      expect(normalized.limitAction).toBe('appended');
      expect(normalized.originalLimit).toBeNull();
    });

    it('places the clause before a trailing terminator', () => {
      expect(normalize('SELECT * FROM customers;').sql).toBe('SELECT * FROM customers LIMIT 100;');
    });

    it('places the clause before trailing whitespace and comments', () => {
      expect(normalize('SELECT * FROM customers  -- latest\n').sql).toBe(
        'SELECT * FROM customers LIMIT 100  -- latest\n'
      );
    });

    it('ignores LIMIT inside sub-selects and string literals', () => {
      expect(normalize('SELECT * FROM (SELECT * FROM t LIMIT 5) s').sql).toBe(
        'SELECT * FROM (SELECT * FROM t LIMIT 5) s LIMIT 100'
      );
      expect(normalize("SELECT 'LIMIT 999' AS note FROM t").sql).toBe(
        "SELECT 'LIMIT 999' AS note FROM t LIMIT 100"
      );
    });
  });

  describe('existing LIMIT', () => {
    it('keeps a limit within the ceiling', () => {
      const normalized = normalize('SELECT name FROM customers LIMIT 50');
      expect(normalized.sql).toBe('SELECT name FROM customers LIMIT 50');
      expect(normalized.limit).toBe(50);
      expect(normalized.limitAction).toBe('unchanged');
      expect(normalized.originalLimit).toBe(50);
    });

    it('keeps a limit equal to the ceiling', () => {
      expect(normalize('SELECT name FROM customers LIMIT 100').limitAction).toBe('unchanged');
    });

    it('lowers a limit above the ceiling', () => {
      const normalized = normalize('SELECT name FROM customers LIMIT 500');
      expect(normalized.sql).toBe('SELECT name FROM customers LIMIT 100');
      expect(normalized.limit).toBe(100);
      expect(normalized.limitAction).toBe('rewritten');
      expect(normalized.originalLimit).toBe(500);
    });

    it('lowers LIMIT ALL', () => {
      const normalized = normalize('select * from t limit all;');
      expect(normalized.sql).toBe('select * from t limit 100;');
      expect(normalized.originalLimit).toBeNull();
    });

    it('only touches the count when OFFSET follows', () => {
      expect(normalize('SELECT * FROM t LIMIT 500 OFFSET 20').sql).toBe(
        'SELECT * FROM t LIMIT 100 OFFSET 20'
      );
    });

    it('reads the count from the offset, count form', () => {
      const normalized = normalize('SELECT * FROM t LIMIT 20, 500');
      expect(normalized.sql).toBe('SELECT * FROM t LIMIT 20, 100');
      expect(normalized.originalLimit).toBe(500);
    });

    it('keeps the WHERE and ORDER BY text intact', () => {
      expect(normalize('SELECT id FROM t WHERE a > 1 ORDER BY id DESC LIMIT 1000').sql).toBe(
        'SELECT id FROM t WHERE a > 1 ORDER BY id DESC LIMIT 100'
      );
    });
  });

  describe('ambiguous limits', () => {
    it.each([
      'SELECT * FROM t LIMIT $1',
      'SELECT * FROM t LIMIT ?',
      'SELECT * FROM t LIMIT 10 + 1',
      'SELECT * FROM t LIMIT 1.5',
      'SELECT * FROM t LIMIT',
      'SELECT * FROM t LIMIT (SELECT 5)',
    ])('rejects %j', (sql) => {
      expect(() => normalize(sql)).toThrow(
        'LIMIT clause must be a trailing integer literal (optionally with OFFSET)'
      );
    });

    it('rejects FETCH row limiting', () => {
      expect(() => normalize('SELECT * FROM t FETCH FIRST 5 ROWS ONLY')).toThrow(ParseAmbiguousError);
    });

    it('rejects an empty statement', () => {
      expect(() => normalize('  ;')).toThrow('Statement is empty');
    });
  });

  it('is idempotent and never exceeds the ceiling', () => {
    const inputs = [
      'SELECT * FROM customers',
      'SELECT * FROM customers;',
      'SELECT name FROM customers LIMIT 50',
      'SELECT name FROM customers LIMIT 500',
      'SELECT * FROM t LIMIT ALL',
      'SELECT * FROM t LIMIT 10, 999 ',
    ];

    for (const sql of inputs) {
      const once = normalize(sql, 25);
      const twice = normalize(once.sql, 25);
      expect(once.limit).toBeLessThanOrEqual(25);
      expect(twice.sql).toBe(once.sql);
      expect(twice.limitAction).toBe('unchanged');
    }
  });

  it('refuses a non-positive ceiling', () => {
    expect(() => normalize('SELECT 1', 0)).toThrow(ConfigurationError);
  });

  it('returns a frozen result', () => {
    expect(Object.isFrozen(normalize('SELECT 1'))).toBe(true);
  });
});
