export interface RepositoryAttributes {
  stars: number;
  watchers: number;
  forks: number;
  openIssues: number;
  language: string | null;
}

export interface RepositorySnapshot extends RepositoryAttributes {
  githubId: number;
  owner: string;
  name: string;
}

/**
 * One commit as the activity aggregator sees it: the committer's calendar
 * date (YYYY-MM-DD) and name, if any.
 */
export interface CommitEntry {
  date: string;
  author: string | null;
}

export interface DailyActivity {
  date: string;
  commits: number;
  authors: ReadonlySet<string>;
}

export type FailureKind = "transport" | "validation";

export interface RemoteFailure extends Error {
  readonly kind: FailureKind;
  /** The request the failure belongs to, e.g. `GET /repos/a/b`. */
  readonly label: string;
}

/**
 * What the lazy sequences produce. `skipped` reports a per-item failure and
 * the sequence goes on; `failed` is terminal and always the last item. Items
 * received before a `failed` stay valid.
 */
export type SequenceItem<T> =
  | { type: "item"; value: T }
  | { type: "skipped"; key: string; error: RemoteFailure }
  | { type: "failed"; error: RemoteFailure };

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteFailure };

/**
 * The remote operations the synchronizer depends on.
 */
export interface RepositorySource {
  fetchRepository(
    owner: string,
    name: string
  ): Promise<FetchResult<RepositorySnapshot>>;
  fetchNewRepositories(
    afterId: number,
    limit: number | null,
    exclude: ReadonlySet<string>
  ): AsyncIterable<SequenceItem<RepositorySnapshot>>;
  fetchCommitActivity(
    owner: string,
    name: string,
    since: string
  ): AsyncIterable<SequenceItem<DailyActivity>>;
}
