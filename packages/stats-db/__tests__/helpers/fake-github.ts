export interface FakeCommit {
  /** ISO timestamp of the committer date. */
  date: string;
  name: string | null;
}

export interface FakeRepository {
  id: number;
  owner: string;
  name: string;
  stars?: number;
  watchers?: number;
  forks?: number;
  openIssues?: number;
  language?: string | null;
  /** Any order; served newest first. */
  commits?: FakeCommit[];
}

export interface FakeGitHubOptions {
  repositories?: FakeRepository[];
  /** Entries per `/repositories` page. */
  listingPageSize?: number;
  /** Answer with this status instead when it returns one. */
  failWith?: (url: URL) => number | undefined;
}

export interface FakeGitHub {
  fetch: typeof fetch;
  repositories: Map<string, FakeRepository>;
  /** Path and query of every request, in order. */
  requests: string[];
  headers: Headers[];
  add(repository: FakeRepository): void;
}

const API_ROOT = "https://api.github.com";

function json(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers },
  });
}

function repositoryPayload(repository: FakeRepository) {
  return {
    id: repository.id,
    name: repository.name,
    full_name: `${repository.owner}/${repository.name}`,
    owner: { login: repository.owner },
    stargazers_count: repository.stars ?? 0,
    watchers_count: repository.watchers ?? 0,
    forks_count: repository.forks ?? 0,
    open_issues_count: repository.openIssues ?? 0,
    language: repository.language === undefined ? null : repository.language,
  };
}

function commitsSince(repository: FakeRepository, since: string | null) {
  const floor = since === null ? 0 : Date.parse(since);
  return (repository.commits ?? [])
    .filter((commit) => Date.parse(commit.date) >= floor)
    .sort((a, b) => Date.parse(b.date) - Date.parse(a.date));
}

function pageLink(url: URL, lastPage: number): Record<string, string> {
  if (lastPage <= 1) return {};
  const last = new URL(url.href);
  last.searchParams.set("page", String(lastPage));
  const next = new URL(url.href);
  next.searchParams.set("page", "2");
  return { link: `<${next.href}>; rel="next", <${last.href}>; rel="last"` };
}

export function createFakeGitHub(options: FakeGitHubOptions = {}): FakeGitHub {
  const repositories = new Map<string, FakeRepository>();
  const requests: string[] = [];
  const headers: Headers[] = [];
  const listingPageSize = options.listingPageSize ?? 100;

  const add = (repository: FakeRepository) => {
    repositories.set(`${repository.owner}/${repository.name}`, repository);
  };
  (options.repositories ?? []).forEach(add);

  const route = (url: URL): Response => {
    const failure = options.failWith?.(url);
    if (failure !== undefined) {
      return json(failure, { message: "Server Error" });
    }

    if (url.pathname === "/repositories") {
      const since = Number(url.searchParams.get("since") ?? "0");
      const page = [...repositories.values()]
        .filter((repository) => repository.id > since)
        .sort((a, b) => a.id - b.id)
        .slice(0, listingPageSize)
        .map(repositoryPayload);
      return json(200, page);
    }

    const commits = /^\/repos\/([^/]+)\/([^/]+)\/commits$/.exec(url.pathname);
    if (commits) {
      const repository = repositories.get(`${commits[1]}/${commits[2]}`);
      if (!repository) return json(404, { message: "Not Found" });

      const perPage = Number(url.searchParams.get("per_page") ?? "30");
      const page = Number(url.searchParams.get("page") ?? "1");
      const matching = commitsSince(repository, url.searchParams.get("since"));
      const body = matching
        .slice((page - 1) * perPage, page * perPage)
        .map((commit) => ({
          sha: `sha-${commit.date}`,
          commit: { committer: { name: commit.name, date: commit.date } },
        }));
      return json(200, body, pageLink(url, Math.ceil(matching.length / perPage)));
    }

    const repo = /^\/repos\/([^/]+)\/([^/]+)$/.exec(url.pathname);
    if (repo) {
      const repository = repositories.get(`${repo[1]}/${repo[2]}`);
      if (!repository) return json(404, { message: "Not Found" });
      return json(200, repositoryPayload(repository));
    }

    return json(404, { message: "Not Found" });
  };

  const fakeFetch: typeof fetch = async (input, init) => {
    const href =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    const url = new URL(href, API_ROOT);
    requests.push(`${url.pathname}${url.search}`);
    headers.push(new Headers(init?.headers));
    return route(url);
  };

  return { fetch: fakeFetch, repositories, requests, headers, add };
}

/**
 * `count` commits on one UTC day, one second apart.
 */
export function commitsOn(
  date: string,
  count: number,
  name: string | null = "dev"
): FakeCommit[] {
  return Array.from({ length: count }, (_, i) => ({
    date: new Date(Date.parse(`${date}T12:00:00Z`) + i * 1000).toISOString(),
    name,
  }));
}
