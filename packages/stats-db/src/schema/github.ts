import {
  sqliteTable,
  text,
  integer,
  primaryKey,
  unique,
} from "drizzle-orm/sqlite-core";
import { relations } from "drizzle-orm";

// Mirrors sql/create-tables.sql; keep the two in step.

export const repository = sqliteTable(
  "repository",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    githubId: integer("github_id").unique().notNull(),
    owner: text("owner").notNull(),
    name: text("name").notNull(),
    stars: integer("stars").notNull(),
    watchers: integer("watchers").notNull(),
    forks: integer("forks").notNull(),
    openIssues: integer("open_issues").notNull(),
    language: text("language"),
  },
  (table) => {
    return {
      ownerName: unique("repository_owner_name_unique").on(
        table.owner,
        table.name
      ),
    };
  }
);

export const activity = sqliteTable(
  "activity",
  {
    repoId: integer("repo_id")
      .notNull()
      .references(() => repository.id),
    // YYYY-MM-DD, so text order is date order
    date: text("date").notNull(),
    commits: integer("commits").notNull(),
    // Sorted ascending before writing, so equal sets serialize equally
    authors: text("authors", { mode: "json" }).$type<string[]>().notNull(),
  },
  (table) => {
    return {
      pk: primaryKey({ columns: [table.repoId, table.date] }),
    };
  }
);

export const rankSnapshot = sqliteTable("rank_snapshot", {
  repoId: integer("repo_id")
    .primaryKey()
    .references(() => repository.id),
  previousPlace: integer("previous_place").notNull(),
});

export const repositoryRelations = relations(repository, ({ one, many }) => ({
  activity: many(activity),
  rankSnapshot: one(rankSnapshot, {
    fields: [repository.id],
    references: [rankSnapshot.repoId],
  }),
}));

export const activityRelations = relations(activity, ({ one }) => ({
  repository: one(repository, {
    fields: [activity.repoId],
    references: [repository.id],
  }),
}));

export type RepositoryRow = typeof repository.$inferSelect;
export type ActivityRow = typeof activity.$inferSelect;
