/**
 * Fake store connections for ConnectionManager and PgFeedStore tests.
 */

import type { ConnectionFactory, QueryParam, QueryRows, StoreConnection } from '../../database.service.js';

export interface RecordedStatement {
  sql: string;
  params: QueryParam[];
}

export type Responder = (sql: string, params: QueryParam[]) => object[];

export class FakeConnection implements StoreConnection {
  alive = true;
  ended = false;
  readonly statements: RecordedStatement[] = [];

  constructor(
    readonly id: number,
    private readonly respond: Responder
  ) {}

  async query<R extends object>(sql: string, params: QueryParam[] = []): Promise<QueryRows<R>> {
    if (!this.alive || this.ended) {
      throw new Error('Connection terminated unexpectedly');
    }
    this.statements.push({ sql, params });
    // Test responders return rows shaped for the statement they answer
    return { rows: this.respond(sql, params) as R[] };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

export class FakeConnectionFactory {
  attempts = 0;
  /** Connect attempts to reject before succeeding */
  failuresRemaining = 0;
  /** Leave connect attempts pending forever */
  hang = false;
  readonly connections: FakeConnection[] = [];
  responder: Responder = () => [];

  readonly create: ConnectionFactory = () => {
    this.attempts++;
    if (this.hang) {
      return new Promise<StoreConnection>(() => undefined);
    }
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      return Promise.reject(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' }));
    }
    const connection = new FakeConnection(this.connections.length + 1, (sql, params) => this.responder(sql, params));
    this.connections.push(connection);
    return Promise.resolve(connection);
  };

  get allStatements(): RecordedStatement[] {
    return this.connections.flatMap((connection) => connection.statements);
  }
}
