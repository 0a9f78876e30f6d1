import { z } from "zod";
import { ValidationFailure } from "./errors";
import type { CommitEntry, RepositorySnapshot } from "./types";

// Length limits follow GitHub's own: logins up to 39, names up to 100.
export const ownerSchema = z.string().min(1).max(39);
export const repositoryNameSchema = z.string().min(1).max(100);

const countSchema = z.number().int().nonnegative();

export const repositoryPayloadSchema = z.object({
  id: z.number().int().nonnegative(),
  stargazers_count: countSchema,
  watchers_count: countSchema,
  forks_count: countSchema,
  open_issues_count: countSchema,
  language: z.string().min(1).max(100).nullable(),
});

export const listedRepositorySchema = z.object({
  id: z.number().int().nonnegative(),
  name: repositoryNameSchema,
  owner: z.object({ login: ownerSchema }),
});

export const listingSchema = z.array(listedRepositorySchema);

// Commits are validated one by one: a malformed entry is dropped, only a
// payload that is not a list at all fails the page.
export const commitPageSchema = z.array(z.unknown());

export const commitPayloadSchema = z.object({
  commit: z.object({
    committer: z
      .object({
        date: z.string().optional(),
        name: z.string().nullable().optional(),
      })
      .nullable(),
  }),
});

export type ListedRepository = z.infer<typeof listedRepositorySchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );
}

export function parseRepository(
  label: string,
  owner: string,
  name: string,
  data: unknown
): RepositorySnapshot {
  const ownerResult = ownerSchema.safeParse(owner);
  const nameResult = repositoryNameSchema.safeParse(name);
  const result = repositoryPayloadSchema.safeParse(data);

  const issues = [
    ...(ownerResult.success ? [] : issuesOf(ownerResult.error)),
    ...(nameResult.success ? [] : issuesOf(nameResult.error)),
    ...(result.success ? [] : issuesOf(result.error)),
  ];
  if (!result.success || issues.length > 0) {
    throw new ValidationFailure(label, issues);
  }

  return {
    githubId: result.data.id,
    owner,
    name,
    stars: result.data.stargazers_count,
    watchers: result.data.watchers_count,
    forks: result.data.forks_count,
    openIssues: result.data.open_issues_count,
    language: result.data.language,
  };
}

export function parseListing(label: string, data: unknown): ListedRepository[] {
  const result = listingSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationFailure(label, issuesOf(result.error));
  }
  return result.data;
}

/**
 * Calendar date of an ISO timestamp in UTC, or null when it does not parse.
 */
export function toCalendarDate(timestamp: string): string | null {
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return parsed.toISOString().split("T")[0];
}

/**
 * Reads the committer block of each commit. Committer rather than author:
 * GitHub orders the listing by committer date, and the date runs the
 * aggregator relies on follow that order.
 */
export function parseCommits(label: string, data: unknown): CommitEntry[] {
  const page = commitPageSchema.safeParse(data);
  if (!page.success) {
    throw new ValidationFailure(label, issuesOf(page.error));
  }

  const entries: CommitEntry[] = [];
  for (const raw of page.data) {
    const result = commitPayloadSchema.safeParse(raw);
    if (!result.success) continue;

    const committer = result.data.commit.committer;
    if (!committer?.date) continue;

    const date = toCalendarDate(committer.date);
    if (date === null) continue;

    entries.push({ date, author: committer.name ?? null });
  }
  return entries;
}

/**
 * Total number of pages announced by a `Link` header, read from the
 * `page` parameter of its `rel="last"` link. Null when there is no header or
 * no usable last link.
 */
export function readLastPage(link: string | undefined): number | null {
  if (!link) return null;

  for (const part of link.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="last"/.exec(part);
    if (!match) continue;

    let page: string | null;
    try {
      page = new URL(match[1]).searchParams.get("page");
    } catch {
      return null;
    }
    const count = Number(page);
    return page !== null && Number.isInteger(count) && count > 0 ? count : null;
  }
  return null;
}
