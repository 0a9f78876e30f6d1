import * as fs from "fs";
import * as path from "path";
import { Database, withDatabase } from "@repo-pulse/db-client";
import type { SQLiteExecutor } from "@repo-pulse/db-client";
import * as schema from "./schema";
import type { Logger } from "./types";

export type StatsSchema = typeof schema;
export type StatsDatabase = Database<StatsSchema>;
export type StatsExecutor = SQLiteExecutor<StatsSchema>;

export const CREATE_TABLES_PATH = path.resolve(
  __dirname,
  "../sql/create-tables.sql"
);

export function openStatsDatabase(
  databasePath?: string,
  logger?: Logger
): StatsDatabase {
  return new Database({ schema, path: databasePath, logger });
}

/**
 * Runs `fn` with a freshly opened stats database and closes it afterwards,
 * whether `fn` settles or throws.
 */
export function withStatsDatabase<T>(
  databasePath: string | undefined,
  logger: Logger | undefined,
  fn: (database: StatsDatabase) => Promise<T> | T
): Promise<T> {
  return withDatabase({ schema, path: databasePath, logger }, fn);
}

/**
 * Applies sql/create-tables.sql. Every statement is `IF NOT EXISTS`, so this
 * is safe to run against an existing database.
 */
export function createTables(database: StatsDatabase): void {
  database.exec(fs.readFileSync(CREATE_TABLES_PATH, "utf8"));
}
