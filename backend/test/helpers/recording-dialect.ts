import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import type { CompiledQuery, DatabaseConnection, Driver, QueryResult } from 'kysely';
import type { DB } from '../../src/shared/db/schema';

/**
 * WHY:
 * - DAL tests without a Postgres server.
 * - Real Kysely + Postgres query compiler; the driver records each compiled
 *   query and answers with the next queued result (or throws a queued error).
 *
 * HOW TO USE:
 * - const { db, recorder } = createRecordingDb();
 * - recorder.enqueue({ rows: [...] }); await someQuery(db); recorder.queries[0].sql
 */

export type RecordedQuery = { sql: string; parameters: readonly unknown[] };

type QueuedResult = { rows: Record<string, unknown>[] } | Error;

export class QueryRecorder {
  readonly queries: RecordedQuery[] = [];
  private readonly queued: QueuedResult[] = [];

  enqueue(result: QueuedResult): this {
    this.queued.push(result);
    return this;
  }

  next(query: CompiledQuery): QueryResult<unknown> {
    this.queries.push({ sql: query.sql, parameters: query.parameters });

    const result = this.queued.shift() ?? { rows: [] };
    if (result instanceof Error) throw result;
    return { rows: result.rows };
  }
}

class RecordingConnection implements DatabaseConnection {
  constructor(private readonly recorder: QueryRecorder) {}

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    return this.recorder.next(compiledQuery) as QueryResult<R>;
  }

  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('streamQuery is not supported by the recording driver');
  }
}

class RecordingDriver implements Driver {
  private readonly connection: RecordingConnection;

  constructor(recorder: QueryRecorder) {
    this.connection = new RecordingConnection(recorder);
  }

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(): Promise<void> {}

  async commitTransaction(): Promise<void> {}

  async rollbackTransaction(): Promise<void> {}

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

export function createRecordingDb<T = DB>() {
  const recorder = new QueryRecorder();

  const db = new Kysely<T>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new RecordingDriver(recorder),
      createIntrospector: (k) => new PostgresIntrospector(k),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, recorder };
}
