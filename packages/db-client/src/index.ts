import BetterSqlite3 from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import env from "./env";

export type DatabaseSchema = Record<string, unknown>;

/**
 * Anything a query can run against: the database itself or an open
 * transaction. Queries take this so the caller decides the transaction
 * boundary.
 */
export type SQLiteExecutor<TSchema extends DatabaseSchema> = BaseSQLiteDatabase<
  "sync",
  RunResult,
  TSchema
>;

export interface DatabaseOptions<TSchema extends DatabaseSchema> {
  schema: TSchema;
  /** File path or `:memory:`. Falls back to `DATABASE_PATH`. */
  path?: string;
  logger?: Pick<Console, "log" | "error">;
}

export class Database<TSchema extends DatabaseSchema> {
  readonly path: string;
  private sqlite: BetterSqlite3.Database;
  private db: BetterSQLite3Database<TSchema>;
  private logger: Pick<Console, "log" | "error">;

  constructor(options: DatabaseOptions<TSchema>) {
    this.path = options.path ?? env.DATABASE_PATH;
    this.logger = options.logger ?? console;

    // better-sqlite3 creates the file when it does not exist yet
    this.sqlite = new BetterSqlite3(this.path, {
      timeout: env.DATABASE_BUSY_TIMEOUT_MS,
    });
    this.sqlite.pragma("foreign_keys = ON");
    if (this.path !== ":memory:") {
      this.sqlite.pragma("journal_mode = WAL");
    }

    this.db = drizzle(this.sqlite, { schema: options.schema });
  }

  get isOpen(): boolean {
    return this.sqlite.open;
  }

  /**
   * Provides direct access to the drizzle instance for queries that do not
   * need a transaction of their own.
   */
  getDB(): SQLiteExecutor<TSchema> {
    return this.db;
  }

  /**
   * Runs raw SQL, possibly several statements separated by semicolons.
   * Used for DDL.
   */
  exec(sqlText: string): void {
    this.sqlite.exec(sqlText);
  }

  /**
   * Executes a callback within a single transaction. better-sqlite3 is
   * synchronous, so the callback must be too: do the network work first and
   * pass its results in.
   * @param fn - receives the transaction to run queries against
   */
  withTransaction<T>(fn: (tx: SQLiteExecutor<TSchema>) => T): T {
    try {
      return this.db.transaction((tx) => fn(tx));
    } catch (e) {
      this.logger.error("Error during transaction, rolled back:", e);
      throw e;
    }
  }

  /**
   * Closes the underlying connection. Safe to call twice.
   */
  shutdown(): void {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}

/**
 * Opens a database for the duration of `fn` and closes it on every exit path.
 */
export async function withDatabase<TSchema extends DatabaseSchema, T>(
  options: DatabaseOptions<TSchema>,
  fn: (database: Database<TSchema>) => Promise<T> | T
): Promise<T> {
  const database = new Database(options);
  try {
    return await fn(database);
  } finally {
    database.shutdown();
  }
}
