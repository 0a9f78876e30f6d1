import type { Octokit } from "@octokit/rest";
import type { Logger } from "../../types";
import { repositoryKey } from "../../utils";
import { asRemoteFailure } from "../errors";
import { createOctokitClient, makeApiCall } from "../octokit-client";
import {
  type ListedRepository,
  parseCommits,
  parseListing,
  parseRepository,
  readLastPage,
} from "../payloads";
import type {
  CommitEntry,
  DailyActivity,
  FetchResult,
  RepositorySnapshot,
  RepositorySource,
  SequenceItem,
} from "../types";
import { aggregateDailyActivity } from "../utils/daily-activity";
import type { AggregateOptions } from "../utils/daily-activity";

const COMMITS_PER_PAGE = 100; // GitHub's max per_page for commits

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface GitHubClientOptions {
  token?: string | null;
  /** Use this Octokit instead of building one from `token` and `fetch`. */
  octokit?: Octokit;
  fetch?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
  aggregate?: AggregateOptions;
}

/**
 * `since` for the commits endpoint: UTC midnight of the given date.
 */
export function toSinceTimestamp(date: string): string {
  return `${date}T00:00:00Z`;
}

export class GitHubClient implements RepositorySource {
  private octokit: Octokit;
  private timeoutMs: number;
  private aggregateOptions: AggregateOptions;

  constructor(options: GitHubClientOptions = {}) {
    this.octokit =
      options.octokit ??
      createOctokitClient({
        token: options.token,
        fetch: options.fetch,
        logger: options.logger,
      });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.aggregateOptions = options.aggregate ?? {};
  }

  private requestOptions(): { signal: AbortSignal } {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }

  async fetchRepository(
    owner: string,
    name: string
  ): Promise<FetchResult<RepositorySnapshot>> {
    const label = `GET /repos/${owner}/${name}`;
    try {
      const { data } = await makeApiCall(label, () =>
        this.octokit.rest.repos.get({
          owner,
          repo: name,
          request: this.requestOptions(),
        })
      );
      return { ok: true, value: parseRepository(label, owner, name, data) };
    } catch (error) {
      return { ok: false, error: asRemoteFailure(label, error) };
    }
  }

  /**
   * Walks the public repository listing upwards from `afterId` and yields
   * the full metadata of each repository not in `exclude`.
   *
   * Excluded entries and entries whose metadata request fails do not count
   * against `limit` (null for no limit). A failed listing request ends the
   * sequence with a `failed` item.
   */
  async *fetchNewRepositories(
    afterId: number,
    limit: number | null,
    exclude: ReadonlySet<string>
  ): AsyncGenerator<SequenceItem<RepositorySnapshot>> {
    let lastId = afterId;
    let yielded = 0;
    const hasRoom = () => limit === null || yielded < limit;

    while (hasRoom()) {
      const label = `GET /repositories?since=${lastId}`;
      let page: ListedRepository[];
      try {
        const since = lastId;
        const { data } = await makeApiCall(label, () =>
          this.octokit.rest.repos.listPublic({
            since,
            request: this.requestOptions(),
          })
        );
        page = parseListing(label, data);
      } catch (error) {
        yield { type: "failed", error: asRemoteFailure(label, error) };
        return;
      }

      let advanced = false;
      for (const entry of page) {
        if (!hasRoom()) return;
        // The listing is ascending by id; anything else would loop forever
        if (entry.id <= lastId) continue;

        lastId = entry.id;
        advanced = true;

        const key = repositoryKey(entry.owner.login, entry.name);
        if (exclude.has(key)) continue;

        const result = await this.fetchRepository(
          entry.owner.login,
          entry.name
        );
        if (!result.ok) {
          yield { type: "skipped", key, error: result.error };
          continue;
        }

        yielded += 1;
        yield { type: "item", value: result.value };
      }

      if (!advanced) return;
    }
  }

  /**
   * Commits since `since` (YYYY-MM-DD, inclusive), newest first.
   *
   * A one-commit probe learns the total from the `Link` header; without the
   * header the sequence is empty. Pages are then read in order and a failed
   * page ends the sequence.
   */
  async *fetchCommits(
    owner: string,
    name: string,
    since: string
  ): AsyncGenerator<SequenceItem<CommitEntry>> {
    const sinceTimestamp = toSinceTimestamp(since);
    const probeLabel = `GET /repos/${owner}/${name}/commits?since=${since}&per_page=1`;

    let total: number | null;
    try {
      const response = await makeApiCall(probeLabel, () =>
        this.octokit.rest.repos.listCommits({
          owner,
          repo: name,
          since: sinceTimestamp,
          per_page: 1,
          request: this.requestOptions(),
        })
      );
      total = readLastPage(response.headers.link);
    } catch (error) {
      yield { type: "failed", error: asRemoteFailure(probeLabel, error) };
      return;
    }

    if (total === null) return;

    const pageCount = Math.ceil(total / COMMITS_PER_PAGE);
    for (let page = 1; page <= pageCount; page++) {
      const label = `GET /repos/${owner}/${name}/commits?since=${since}&per_page=${COMMITS_PER_PAGE}&page=${page}`;
      let entries: CommitEntry[];
      try {
        const { data } = await makeApiCall(label, () =>
          this.octokit.rest.repos.listCommits({
            owner,
            repo: name,
            since: sinceTimestamp,
            per_page: COMMITS_PER_PAGE,
            page,
            request: this.requestOptions(),
          })
        );
        entries = parseCommits(label, data);
      } catch (error) {
        yield { type: "failed", error: asRemoteFailure(label, error) };
        return;
      }

      for (const entry of entries) {
        yield { type: "item", value: entry };
      }
    }
  }

  fetchCommitActivity(
    owner: string,
    name: string,
    since: string
  ): AsyncGenerator<SequenceItem<DailyActivity>> {
    return aggregateDailyActivity(
      this.fetchCommits(owner, name, since),
      this.aggregateOptions
    );
  }
}
