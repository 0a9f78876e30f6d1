import type { StatsDatabase } from "../../db";
import { EPOCH_DATE } from "../../github-client";
import type {
  DailyActivity,
  RepositorySnapshot,
  RepositorySource,
} from "../../github-client";
import type { Logger } from "../../types";
import { chunk, formatDuration, repositoryKey } from "../../utils";
import {
  findRepositoryId,
  getHighWaterMark,
  insertRepositoryIfAbsent,
  listRepositoryKeys,
  listStoredRepositories,
  updateRepositoryIfChanged,
  upsertActivity,
} from "./github.queries";
import type { StoredRepository } from "./github.queries";
import { snapshotRanks } from "./rank-snapshot";

export interface SyncConfig {
  skipRankUpdate: boolean;
  skipRepoUpdate: boolean;
  updateFromId: number | null;
  updateToId: number | null;
  newRepoLimit: number | null;
  newRepoSince: number;
  batchSize: number;
}

export type SyncPhase = "update" | "activity" | "discover" | "ingest";

export interface SyncFailure {
  phase: SyncPhase;
  /** `owner/name`, or the failed request when no repository applies. */
  key: string;
  message: string;
}

export type DiscoveryStop = "limit" | "exhausted" | "failure";

export interface SyncReport {
  rankSnapshot: number | "skipped";
  updatedRepositories: number;
  unchangedRepositories: number;
  insertedRepositories: number;
  /** Discovered repositories that turned out to be stored already. */
  conflictedRepositories: number;
  activityWrites: number;
  failures: SyncFailure[];
  discoveryStoppedBy: DiscoveryStop;
}

export interface SyncOptions {
  database: StatsDatabase;
  client: RepositorySource;
  config: SyncConfig;
  logger?: Logger;
}

/**
 * Rows written by a run. Zero when nothing upstream changed since the last
 * run.
 */
export function countWrites(report: SyncReport): number {
  return (
    (report.rankSnapshot === "skipped" ? 0 : report.rankSnapshot) +
    report.updatedRepositories +
    report.insertedRepositories +
    report.activityWrites
  );
}

function createReport(): SyncReport {
  return {
    rankSnapshot: "skipped",
    updatedRepositories: 0,
    unchangedRepositories: 0,
    insertedRepositories: 0,
    conflictedRepositories: 0,
    activityWrites: 0,
    failures: [],
    discoveryStoppedBy: "exhausted",
  };
}

class RunContext {
  constructor(
    readonly database: StatsDatabase,
    readonly client: RepositorySource,
    readonly config: SyncConfig,
    readonly logger: Logger,
    readonly report: SyncReport
  ) {}

  recordFailure(phase: SyncPhase, key: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.report.failures.push({ phase, key, message });
    this.logger.warn(`      ⚠️  ${key}: ${message}`);
  }

  /**
   * Drains the activity sequence. Days received before a failure are kept
   * and returned; the failure itself is recorded.
   */
  async collectActivity(
    owner: string,
    name: string,
    since: string
  ): Promise<DailyActivity[]> {
    const key = repositoryKey(owner, name);
    const days: DailyActivity[] = [];
    for await (const item of this.client.fetchCommitActivity(
      owner,
      name,
      since
    )) {
      if (item.type === "item") {
        days.push(item.value);
      } else if (item.type === "skipped") {
        this.recordFailure("activity", item.key, item.error);
      } else {
        this.recordFailure("activity", key, item.error);
        break;
      }
    }
    return days;
  }
}

async function updateRepository(
  context: RunContext,
  stored: StoredRepository
): Promise<void> {
  const { client, database, logger, report } = context;
  const key = repositoryKey(stored.owner, stored.name);

  const result = await client.fetchRepository(stored.owner, stored.name);
  if (!result.ok) {
    context.recordFailure("update", key, result.error);
    return;
  }

  // Re-reads the newest stored day: it may have gained commits since
  const days = await context.collectActivity(
    stored.owner,
    stored.name,
    stored.lastActivityDate ?? EPOCH_DATE
  );

  const outcome = database.withTransaction((tx) => {
    const changed = updateRepositoryIfChanged(tx, stored.id, result.value);
    let writes = 0;
    for (const day of days) {
      if (upsertActivity(tx, stored.id, day)) writes++;
    }
    return { changed, writes };
  });

  if (outcome.changed) {
    report.updatedRepositories++;
  } else {
    report.unchangedRepositories++;
  }
  report.activityWrites += outcome.writes;
  logger.log(
    `    📂 Updated repository ${stored.id} https://github.com/${key} (${outcome.writes} activity rows written)`
  );
}

async function updateKnownRepositories(context: RunContext): Promise<void> {
  const { database, config, logger } = context;
  const stored = listStoredRepositories(database.getDB(), {
    fromId: config.updateFromId,
    toId: config.updateToId,
  });
  logger.log(
    `🔄 Step 2: update ${stored.length} existing repositories (batches of ${config.batchSize})...`
  );

  for (const batch of chunk(stored, config.batchSize)) {
    const results = await Promise.allSettled(
      batch.map((repo) => updateRepository(context, repo))
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const repo = batch[index];
        context.recordFailure(
          "update",
          repositoryKey(repo.owner, repo.name),
          result.reason
        );
      }
    });
  }

  logger.log("✅ Step 2 complete");
}

async function ingestRepository(
  context: RunContext,
  snapshot: RepositorySnapshot
): Promise<void> {
  const { database, logger, report } = context;
  const key = repositoryKey(snapshot.owner, snapshot.name);

  // Saves the full history download when another run got here first
  if (findRepositoryId(database.getDB(), snapshot.owner, snapshot.name) !== null) {
    report.conflictedRepositories++;
    logger.log(`    ↩️  ${key} is already stored, skipping`);
    return;
  }

  const days = await context.collectActivity(
    snapshot.owner,
    snapshot.name,
    EPOCH_DATE
  );

  const outcome = database.withTransaction((tx) => {
    const inserted = insertRepositoryIfAbsent(tx, snapshot);
    if (inserted.status === "existed") return null;

    let writes = 0;
    for (const day of days) {
      if (upsertActivity(tx, inserted.id, day)) writes++;
    }
    return { id: inserted.id, writes };
  });

  if (outcome === null) {
    report.conflictedRepositories++;
    logger.log(`    ↩️  ${key} was inserted concurrently, skipping`);
    return;
  }

  report.insertedRepositories++;
  report.activityWrites += outcome.writes;
  logger.log(
    `    ➕ Added repository ${outcome.id} https://github.com/${key} (${outcome.writes} activity rows written)`
  );
}

async function ingestNewRepositories(
  context: RunContext,
  handled: Set<string>
): Promise<void> {
  const { client, config, database, logger, report } = context;
  const { newRepoLimit } = config;

  if (newRepoLimit === 0) {
    report.discoveryStoppedBy = "limit";
    logger.log("⏭️  Step 3 skipped: new repository limit is 0");
    return;
  }

  const highWaterMark = getHighWaterMark(database.getDB());
  const afterId = Math.max(config.newRepoSince, highWaterMark ?? 0);
  logger.log(
    `🔍 Step 3: fetch new repositories after id ${afterId} (up to ${newRepoLimit ?? "unlimited"})...`
  );

  let discovered = 0;
  for await (const item of client.fetchNewRepositories(
    afterId,
    newRepoLimit,
    handled
  )) {
    if (item.type === "failed") {
      // Discovery stops quietly; the run itself still succeeds
      report.discoveryStoppedBy = "failure";
      context.recordFailure("discover", item.error.label, item.error);
      break;
    }
    if (item.type === "skipped") {
      context.recordFailure("discover", item.key, item.error);
      continue;
    }

    discovered++;
    const key = repositoryKey(item.value.owner, item.value.name);
    handled.add(key);
    try {
      await ingestRepository(context, item.value);
    } catch (error) {
      context.recordFailure("ingest", key, error);
    }
  }

  if (
    report.discoveryStoppedBy !== "failure" &&
    newRepoLimit !== null &&
    discovered >= newRepoLimit
  ) {
    report.discoveryStoppedBy = "limit";
  }

  logger.log(
    `✅ Step 3 complete: ${discovered} discovered, ${report.insertedRepositories} added (stopped by ${report.discoveryStoppedBy})`
  );
}

/**
 * One run: snapshot ranks, refresh stored repositories, then ingest new
 * ones. Per-repository failures end up in the report; only failures outside
 * a repository unit (an unusable database, say) reject.
 */
export async function synchronizeRepositories(
  options: SyncOptions
): Promise<SyncReport> {
  const { database, client, config } = options;
  const logger = options.logger ?? console;
  const report = createReport();
  const context = new RunContext(database, client, config, logger, report);
  const startedAt = Date.now();

  logger.log("\n🚀 Starting repository sync...");

  report.rankSnapshot = snapshotRanks(
    database,
    config.skipRankUpdate ? "skip" : "run",
    logger
  );

  // Built from every stored repository before Step 2 touches anything, so
  // Step 3 never re-inserts one, whether or not Step 2 fetched it
  const handled = listRepositoryKeys(database.getDB());

  if (config.skipRepoUpdate) {
    logger.log("⏭️  Step 2 skipped: update existing repositories");
  } else {
    await updateKnownRepositories(context);
  }

  await ingestNewRepositories(context, handled);

  logger.log(
    `\n✨ Repository sync completed in ${formatDuration(startedAt)}: ` +
      `${report.updatedRepositories} updated, ${report.insertedRepositories} added, ` +
      `${report.activityWrites} activity rows written, ${report.failures.length} failures`
  );
  return report;
}
