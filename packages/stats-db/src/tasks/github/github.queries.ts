import { and, asc, eq, gte, lte, max, ne, or, sql } from "drizzle-orm";
import type { StatsExecutor } from "../../db";
import type {
  DailyActivity,
  RepositoryAttributes,
  RepositorySnapshot,
} from "../../github-client";
import { activity, rankSnapshot, repository } from "../../schema/github";
import { repositoryKey } from "../../utils";

export interface StoredRepository {
  id: number;
  owner: string;
  name: string;
  /** Newest activity date on record, or null when there is none. */
  lastActivityDate: string | null;
}

export interface RepositoryIdBounds {
  fromId: number | null;
  toId: number | null;
}

export type InsertResult =
  | { status: "inserted"; id: number }
  | { status: "existed" };

// Reads

export function listStoredRepositories(
  executor: StatsExecutor,
  bounds: RepositoryIdBounds = { fromId: null, toId: null }
): StoredRepository[] {
  const lastActivity = executor
    .select({
      repoId: activity.repoId,
      lastDate: max(activity.date).as("last_date"),
    })
    .from(activity)
    .groupBy(activity.repoId)
    .as("last_activity");

  return executor
    .select({
      id: repository.id,
      owner: repository.owner,
      name: repository.name,
      lastActivityDate: lastActivity.lastDate,
    })
    .from(repository)
    .leftJoin(lastActivity, eq(repository.id, lastActivity.repoId))
    .where(
      and(
        bounds.fromId === null ? undefined : gte(repository.id, bounds.fromId),
        bounds.toId === null ? undefined : lte(repository.id, bounds.toId)
      )
    )
    .orderBy(asc(repository.id))
    .all();
}

/**
 * Every stored `owner/name`, regardless of any update bounds.
 */
export function listRepositoryKeys(executor: StatsExecutor): Set<string> {
  const rows = executor
    .select({ owner: repository.owner, name: repository.name })
    .from(repository)
    .all();
  return new Set(rows.map((row) => repositoryKey(row.owner, row.name)));
}

/**
 * The largest GitHub id already ingested, or null for an empty store.
 */
export function getHighWaterMark(executor: StatsExecutor): number | null {
  const [row] = executor
    .select({ value: max(repository.githubId) })
    .from(repository)
    .all();
  return row?.value ?? null;
}

export function findRepositoryId(
  executor: StatsExecutor,
  owner: string,
  name: string
): number | null {
  const row = executor
    .select({ id: repository.id })
    .from(repository)
    .where(and(eq(repository.owner, owner), eq(repository.name, name)))
    .get();
  return row?.id ?? null;
}

export function getActivity(
  executor: StatsExecutor,
  repoId: number
): Array<{ date: string; commits: number; authors: string[] }> {
  return executor
    .select({
      date: activity.date,
      commits: activity.commits,
      authors: activity.authors,
    })
    .from(activity)
    .where(eq(activity.repoId, repoId))
    .orderBy(asc(activity.date))
    .all();
}

export function getRankSnapshot(executor: StatsExecutor): Map<number, number> {
  const rows = executor.select().from(rankSnapshot).all();
  return new Map(rows.map((row) => [row.repoId, row.previousPlace]));
}

// Writes. Each returns whether (or how many) rows actually changed, and each
// is a no-op when repeated with the same input.

/**
 * Overwrites the tracked attributes only when at least one differs.
 * Language compares with IS NOT so null is handled like any other value.
 */
export function updateRepositoryIfChanged(
  executor: StatsExecutor,
  id: number,
  attributes: RepositoryAttributes
): boolean {
  const result = executor
    .update(repository)
    .set({
      stars: attributes.stars,
      watchers: attributes.watchers,
      forks: attributes.forks,
      openIssues: attributes.openIssues,
      language: attributes.language,
    })
    .where(
      and(
        eq(repository.id, id),
        or(
          ne(repository.stars, attributes.stars),
          ne(repository.watchers, attributes.watchers),
          ne(repository.forks, attributes.forks),
          ne(repository.openIssues, attributes.openIssues),
          sql`${repository.language} IS NOT ${attributes.language}`
        )
      )
    )
    .run();
  return result.changes > 0;
}

/**
 * Inserts a repository and returns its new id. A uniqueness conflict, on
 * `owner/name` or on the GitHub id, is reported as "existed".
 */
export function insertRepositoryIfAbsent(
  executor: StatsExecutor,
  snapshot: RepositorySnapshot
): InsertResult {
  const rows = executor
    .insert(repository)
    .values({
      githubId: snapshot.githubId,
      owner: snapshot.owner,
      name: snapshot.name,
      stars: snapshot.stars,
      watchers: snapshot.watchers,
      forks: snapshot.forks,
      openIssues: snapshot.openIssues,
      language: snapshot.language,
    })
    .onConflictDoNothing()
    .returning({ id: repository.id })
    .all();

  if (rows.length === 0) {
    return { status: "existed" };
  }
  return { status: "inserted", id: rows[0].id };
}

/**
 * Inserts the day, or rewrites it when the commit count or the author set
 * differs from what is stored.
 */
export function upsertActivity(
  executor: StatsExecutor,
  repoId: number,
  day: DailyActivity
): boolean {
  const authors = [...day.authors].sort();
  const result = executor
    .insert(activity)
    .values({ repoId, date: day.date, commits: day.commits, authors })
    .onConflictDoUpdate({
      target: [activity.repoId, activity.date],
      set: {
        commits: sql`excluded.commits`,
        authors: sql`excluded.authors`,
      },
      setWhere: sql`${activity.commits} <> excluded.commits OR ${activity.authors} <> excluded.authors`,
    })
    .run();
  return result.changes > 0;
}

/**
 * Stores every repository's current place (1-based, by stars descending,
 * ties sharing a place) as its previous place. Rows are only rewritten when
 * the place moved; rows are never deleted.
 *
 * @returns the number of rows inserted or updated
 */
export function mergeRankSnapshot(executor: StatsExecutor): number {
  // The WHERE true keeps SQLite from reading ON CONFLICT as a join clause
  const result = executor.run(sql`
    INSERT INTO ${rankSnapshot} (repo_id, previous_place)
    SELECT ${repository.id}, rank() OVER (ORDER BY ${repository.stars} DESC)
    FROM ${repository}
    WHERE true
    ON CONFLICT (repo_id) DO UPDATE
      SET previous_place = excluded.previous_place
      WHERE ${rankSnapshot.previousPlace} <> excluded.previous_place
  `);
  return result.changes;
}
