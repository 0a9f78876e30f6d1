import type { StatsDatabase } from "../../db";
import type { Logger } from "../../types";
import { mergeRankSnapshot } from "./github.queries";

export type RankSnapshotMode = "run" | "skip";

/**
 * Records every repository's current place as its previous place. Must
 * finish before any repository attribute is overwritten: the snapshot is a
 * picture of the ranking as it was before this run's updates.
 *
 * Runs as one transaction of its own.
 *
 * @returns rows written, or "skipped"
 */
export function snapshotRanks(
  database: StatsDatabase,
  mode: RankSnapshotMode,
  logger: Logger = console
): number | "skipped" {
  if (mode === "skip") {
    logger.log("⏭️  Step 1 skipped: rank snapshot");
    return "skipped";
  }

  logger.log("📸 Step 1: snapshot current ranks...");
  const written = database.withTransaction((tx) => mergeRankSnapshot(tx));
  logger.log(`✅ Step 1 complete: ${written} rank rows written`);
  return written;
}
