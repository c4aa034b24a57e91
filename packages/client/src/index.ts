import BetterSqlite3 from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import env from "./env";

export { env };

export type TransactionCallback<TSchema extends Record<string, unknown>, T> = (
  db: BetterSQLite3Database<TSchema>
) => Promise<T>;

export interface DatabaseOptions<TSchema extends Record<string, unknown>> {
  schema: TSchema;
  /** File path or ":memory:". Defaults to DB_PATH. */
  path?: string;
  busyTimeoutMs?: number;
}

export class Database<TSchema extends Record<string, unknown>> {
  readonly path: string;
  private readonly sqlite: BetterSqlite3.Database;
  private readonly db: BetterSQLite3Database<TSchema>;
  // Tail of the write queue; every transaction waits for the previous one.
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: DatabaseOptions<TSchema>) {
    this.path = options.path ?? env.DB_PATH;
    this.sqlite = new BetterSqlite3(this.path);
    this.sqlite.pragma("foreign_keys = ON");
    this.sqlite.pragma(
      `busy_timeout = ${options.busyTimeoutMs ?? env.DB_BUSY_TIMEOUT_MS}`
    );
    if (this.path !== ":memory:") {
      this.sqlite.pragma("journal_mode = WAL");
    }
    this.db = drizzle(this.sqlite, { schema: options.schema });
  }

  /**
   * Drizzle handle for reads. Writes should go through withTransaction so
   * they are serialized with other writers.
   */
  getDB(): BetterSQLite3Database<TSchema> {
    return this.db;
  }

  /**
   * Runs raw SQL, possibly several statements. Used to apply DDL files.
   */
  exec(sqlText: string): void {
    this.sqlite.exec(sqlText);
  }

  get inTransaction(): boolean {
    return this.sqlite.inTransaction;
  }

  /**
   * Executes a callback within a database transaction.
   *
   * Callers are queued so only one transaction is open on this connection at a
   * time, and the transaction starts with BEGIN IMMEDIATE so a second process
   * writing to the same file waits for the lock instead of interleaving.
   * The callback's result is returned after COMMIT; any error rolls back and is
   * rethrown.
   */
  withTransaction<T>(fn: TransactionCallback<TSchema, T>): Promise<T> {
    const run = this.writeQueue.then(() => this.runInTransaction(fn));
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runInTransaction<T>(
    fn: TransactionCallback<TSchema, T>
  ): Promise<T> {
    this.sqlite.exec("BEGIN IMMEDIATE");
    try {
      const result = await fn(this.db);
      this.sqlite.exec("COMMIT");
      return result;
    } catch (e) {
      console.error("Error during transaction, rolling back:", e);
      if (this.sqlite.inTransaction) {
        this.sqlite.exec("ROLLBACK");
      }
      throw e;
    }
  }

  /**
   * Closes the connection once pending transactions have settled.
   */
  async shutdown(): Promise<void> {
    await this.writeQueue;
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}
