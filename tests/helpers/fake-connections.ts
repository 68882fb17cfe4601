/**
 * QueryGate - In-process connection source for tests
 */

import type { ConnectionSource, QueryConnection, ResultRow } from '../../src/guard/types.js';

export type QueryBehaviour = (sql: string, options: { timeoutMs: number }) => Promise<ResultRow[]>;

export class FakeConnection implements QueryConnection {
  public readonly queries: Array<{ sql: string; timeoutMs: number }> = [];
  /** Discard flag passed on release; null until released */
  public released: boolean | null = null;
  public releaseError: Error | null = null;

  constructor(private readonly behaviour: QueryBehaviour) {}

  query(sql: string, options: { timeoutMs: number }): Promise<ResultRow[]> {
    this.queries.push({ sql, timeoutMs: options.timeoutMs });
    return this.behaviour(sql, options);
  }

  release(discard: boolean): Promise<void> {
    this.released = discard;
    return this.releaseError === null ? Promise.resolve() : Promise.reject(this.releaseError);
  }
}

export class FakeConnectionSource implements ConnectionSource {
  public readonly connections: FakeConnection[] = [];
  public acquireError: Error | null = null;
  public releaseError: Error | null = null;

  constructor(private behaviour: QueryBehaviour = () => Promise.resolve([])) {}

  static returning(rows: ResultRow[]): FakeConnectionSource {
    return new FakeConnectionSource(() => Promise.resolve(rows));
  }

  setBehaviour(behaviour: QueryBehaviour): void {
    this.behaviour = behaviour;
  }

  acquire(): Promise<QueryConnection> {
    if (this.acquireError !== null) {
      return Promise.reject(this.acquireError);
    }
    const connection = new FakeConnection(this.behaviour);
    connection.releaseError = this.releaseError;
    this.connections.push(connection);
    return Promise.resolve(connection);
  }

  get lastConnection(): FakeConnection | undefined {
    return this.connections[this.connections.length - 1];
  }
}

/**
 * A query that never settles on its own
 */
export const hangingQuery: QueryBehaviour = () => new Promise<ResultRow[]>(() => undefined);

export function makeRows(count: number): ResultRow[] {
  return Array.from({ length: count }, (_, index) => ({ id: index + 1, name: `customer-${index + 1}` }));
}
