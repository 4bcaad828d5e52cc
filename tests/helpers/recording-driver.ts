import {
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type QueryResult,
  type TransactionSettings,
} from "kysely";
import type { DB } from "src/store/kysely/schema.ts";

export type Recorded =
  | { kind: "begin"; isolationLevel: string | null }
  | { kind: "commit" }
  | { kind: "rollback" }
  | { kind: "query"; sql: string; parameters: readonly unknown[] };

class RecordingConnection implements DatabaseConnection {
  constructor(private readonly log: Recorded[]) {}

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    this.log.push({
      kind: "query",
      sql: compiledQuery.sql,
      parameters: compiledQuery.parameters,
    });
    return { rows: [] };
  }

  async *streamQuery<R>(
    compiledQuery: CompiledQuery,
  ): AsyncIterableIterator<QueryResult<R>> {
    this.log.push({
      kind: "query",
      sql: compiledQuery.sql,
      parameters: compiledQuery.parameters,
    });
  }
}

/**
 * Driver that answers every query with no rows and records what it was
 * sent.
 */
class RecordingDriver implements Driver {
  readonly log: Recorded[] = [];
  private readonly connection = new RecordingConnection(this.log);

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(
    _connection: DatabaseConnection,
    settings: TransactionSettings,
  ): Promise<void> {
    this.log.push({
      kind: "begin",
      isolationLevel: settings.isolationLevel ?? null,
    });
  }

  async commitTransaction(): Promise<void> {
    this.log.push({ kind: "commit" });
  }

  async rollbackTransaction(): Promise<void> {
    this.log.push({ kind: "rollback" });
  }

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

export function createRecordingDb(): { db: Kysely<DB>; log: Recorded[] } {
  const driver = new RecordingDriver();
  const db = new Kysely<DB>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (db) => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });
  return { db, log: driver.log };
}

export function queries(
  log: Recorded[],
): Array<{ sql: string; parameters: readonly unknown[] }> {
  return log.flatMap((entry) => (entry.kind === "query" ? [entry] : []));
}
