/**
 * QueryGate - Execution Gateway Tests
 * Runs against an in-process connection source
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { ExecutionGateway } from '../../src/guard/gateway.js';
import { normalizeStatement } from '../../src/guard/normalizer.js';
import { parseStatement } from '../../src/guard/parser.js';
import type { NormalizedStatement } from '../../src/guard/types.js';
import { QueryTimeoutError } from '../../src/utils/types.js';
import { FakeConnectionSource, hangingQuery, makeRows } from '../helpers/fake-connections.js';

describe('ExecutionGateway', () => {
  let source: FakeConnectionSource;
  let gateway: ExecutionGateway;
  let statement: NormalizedStatement;

  beforeEach(() => {
    source = FakeConnectionSource.returning(makeRows(3));
    gateway = new ExecutionGateway(source, { rowLimitCeiling: 100, defaultTimeoutMs: 5000 });
    statement = normalizeStatement(parseStatement('SELECT * FROM customers'), 100);
  });

  describe('successful execution', () => {
    it('returns rows and the row count', async () => {
      const result = await gateway.execute(statement);

      expect(result.error).toBeNull();
      expect(result.rowCount).toBe(3);
      expect(result.truncated).toBe(false);
      expect(result.rows[0]).toEqual({ id: 1, name: 'customer-1' });
    });

    it('runs the normalized SQL with the default deadline', async () => {
      await gateway.execute(statement);

      expect(source.lastConnection?.queries).toEqual([
        { sql: 'SELECT * FROM customers LIMIT 100', timeoutMs: 5000 },
      ]);
    });

    it('passes a caller deadline through to the connection', async () => {
      await gateway.execute(statement, { timeoutMs: 250 });
      expect(source.lastConnection?.queries[0]?.timeoutMs).toBe(250);
    });

    it('returns a clean connection to the pool', async () => {
      await gateway.execute(statement);
      expect(source.lastConnection?.released).toBe(false);
    });

    it('uses one connection per statement', async () => {
      await Promise.all([gateway.execute(statement), gateway.execute(statement)]);
      expect(source.connections).toHaveLength(2);
    });
  });

  describe('row ceiling', () => {
    it('truncates rows above the ceiling instead of failing', async () => {
      source.setBehaviour(() => Promise.resolve(makeRows(5)));
      const strict = new ExecutionGateway(source, { rowLimitCeiling: 2, defaultTimeoutMs: 5000 });

      const result = await strict.execute(statement);

      expect(result.truncated).toBe(true);
      expect(result.rowCount).toBe(2);
      expect(result.rows.map((row) => row['id'])).toEqual([1, 2]);
      expect(result.error).toBeNull();
    });
  });

  describe('failures', () => {
    it('maps a database error to execution_error and discards the connection', async () => {
      source.setBehaviour(() => Promise.reject(new Error('relation "nope" does not exist')));

      const result = await gateway.execute(statement);

      expect(result.error).toEqual({
        kind: 'execution_error',
        message: 'relation "nope" does not exist',
      });
      expect(result.rows).toEqual([]);
      expect(result.rowCount).toBe(0);
      expect(source.lastConnection?.released).toBe(true);
    });

    it('reports a missed deadline as timeout and discards the connection', async () => {
      source.setBehaviour(hangingQuery);

      const result = await gateway.execute(statement, { timeoutMs: 20 });

      expect(result.error).toEqual({ kind: 'timeout', message: 'Query exceeded the 20ms deadline' });
      expect(source.lastConnection?.released).toBe(true);
    });

    it('reports a server-side statement timeout as timeout', async () => {
      source.setBehaviour(() => Promise.reject(new QueryTimeoutError(5000)));

      const result = await gateway.execute(statement);

      expect(result.error?.kind).toBe('timeout');
    });

    it('reports caller cancellation distinctly', async () => {
      source.setBehaviour(hangingQuery);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const result = await gateway.execute(statement, { timeoutMs: 5000, signal: controller.signal });

      expect(result.error).toEqual({ kind: 'cancelled', message: 'Query cancelled by caller' });
      expect(source.lastConnection?.released).toBe(true);
    });

    it('does not acquire a connection for an already cancelled request', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await gateway.execute(statement, { signal: controller.signal });

      expect(result.error?.kind).toBe('cancelled');
      expect(source.connections).toHaveLength(0);
    });

    it('reports a failed acquisition', async () => {
      source.acquireError = new Error('too many clients already');

      const result = await gateway.execute(statement);

      expect(result.error).toEqual({ kind: 'execution_error', message: 'too many clients already' });
    });

    it('still returns the result when releasing the connection fails', async () => {
      source.releaseError = new Error('socket closed');

      const result = await gateway.execute(statement);

      expect(result.error).toBeNull();
      expect(result.rowCount).toBe(3);
    });
  });
});
