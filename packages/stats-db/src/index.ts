export * from "./schema";
export * from "./github-client";
export {
  createTables,
  openStatsDatabase,
  withStatsDatabase,
  CREATE_TABLES_PATH,
} from "./db";
export type { StatsDatabase, StatsExecutor, StatsSchema } from "./db";
export { ConfigError, loadSettings } from "./env";
export type { SyncSettings } from "./env";
export { handler } from "./handler";
export type { HandlerResponse } from "./handler";
export * from "./tasks/github/github.queries";
export { snapshotRanks } from "./tasks/github/rank-snapshot";
export {
  countWrites,
  synchronizeRepositories,
} from "./tasks/github/sync-repos";
export type {
  DiscoveryStop,
  SyncConfig,
  SyncFailure,
  SyncOptions,
  SyncPhase,
  SyncReport,
} from "./tasks/github/sync-repos";
export { runCommand, runSync } from "./tasks/github/github.tasks";
export type { Logger } from "./types";
