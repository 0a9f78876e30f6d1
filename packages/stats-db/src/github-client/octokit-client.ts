import { Octokit } from "@octokit/rest";
import type { Logger } from "../types";
import { asRemoteFailure } from "./errors";

export const GITHUB_API_VERSION = "2022-11-28";

export interface OctokitClientOptions {
  /** Optional bearer token; unauthenticated requests get lower rate limits. */
  token?: string | null;
  /** Replaces the global fetch, e.g. with an in-process fake. */
  fetch?: typeof fetch;
  logger?: Logger;
}

export function createOctokitClient(options: OctokitClientOptions = {}): Octokit {
  const logger = options.logger ?? console;
  const octokit = new Octokit({
    auth: options.token || undefined,
    userAgent: "repo-pulse-sync v1.0",
    log: {
      debug: () => {},
      info: () => {},
      warn: (message: string) => logger.warn(message),
      error: (message: string) => logger.error(message),
    },
    request: options.fetch ? { fetch: options.fetch } : undefined,
  });

  octokit.hook.before("request", (request) => {
    request.headers.accept = "application/vnd.github+json";
    request.headers["x-github-api-version"] = GITHUB_API_VERSION;
  });

  return octokit;
}

/**
 * Awaits one API call, rethrowing whatever goes wrong as a classified
 * failure labelled with the request. No retries: callers decide whether the
 * failure ends their sequence.
 */
export async function makeApiCall<T>(
  label: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw asRemoteFailure(label, error);
  }
}
