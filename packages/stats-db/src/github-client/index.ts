export * from "./types";
export * from "./errors";
export { GitHubClient, toSinceTimestamp } from "./client/api";
export type { GitHubClientOptions } from "./client/api";
export { createOctokitClient, GITHUB_API_VERSION } from "./octokit-client";
export {
  aggregateDailyActivity,
  ActivityOrderError,
  EPOCH_DATE,
  MAX_AUTHOR_NAME_LENGTH,
} from "./utils/daily-activity";
export type {
  AggregateOptions,
  DateDescendingCommits,
} from "./utils/daily-activity";
