import { bool, cleanEnv, EnvError, makeValidator, str } from "envalid";

export const DEFAULT_DATABASE_PATH = "sqlite.db";

// Just before the id of the first repository this project tracked
export const DEFAULT_NEW_REPO_SINCE = 815_368_990;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const nonNegativeInt = makeValidator<number>((input: string) => {
  const value = Number(input.trim());
  if (input.trim() === "" || !Number.isInteger(value) || value < 0) {
    throw new EnvError(`Expected a non-negative integer, got "${input}"`);
  }
  return value;
});

const positiveInt = makeValidator<number>((input: string) => {
  const value = Number(input.trim());
  if (input.trim() === "" || !Number.isInteger(value) || value < 1) {
    throw new EnvError(`Expected a positive integer, got "${input}"`);
  }
  return value;
});

export interface SyncSettings {
  databasePath: string;
  githubToken: string | null;
  skipRankUpdate: boolean;
  skipRepoUpdate: boolean;
  /** Inclusive bounds on the stored ids Step 2 updates; null is unbounded. */
  updateFromId: number | null;
  updateToId: number | null;
  /** Cap on new repositories per run; null is unbounded. */
  newRepoLimit: number | null;
  /** GitHub id after which discovery starts, unless the store is past it. */
  newRepoSince: number;
  batchSize: number;
  requestTimeoutMs: number;
}

/**
 * Reads settings from the environment. Empty variables count as unset.
 * Invalid values throw ConfigError rather than exiting the process.
 */
export function loadSettings(
  environment: NodeJS.ProcessEnv = process.env
): SyncSettings {
  const present = Object.fromEntries(
    Object.entries(environment).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1] !== ""
    )
  );

  const env = cleanEnv(
    present,
    {
      DATABASE_PATH: str({ default: DEFAULT_DATABASE_PATH }),
      GITHUB_TOKEN: str({ default: undefined }),
      SKIP_RANK_UPDATE: bool({ default: false }),
      SKIP_REPO_UPDATE: bool({ default: false }),
      UPDATE_FROM_ID: nonNegativeInt({ default: undefined }),
      UPDATE_TO_ID: nonNegativeInt({ default: undefined }),
      NEW_REPO_LIMIT: nonNegativeInt({ default: undefined }),
      NEW_REPO_SINCE: nonNegativeInt({ default: DEFAULT_NEW_REPO_SINCE }),
      SYNC_BATCH_SIZE: positiveInt({ default: 10 }),
      REQUEST_TIMEOUT_MS: positiveInt({ default: 30_000 }),
    },
    {
      reporter: ({ errors }) => {
        const messages = Object.entries(errors).map(
          ([key, error]) =>
            `${key}: ${error instanceof Error ? error.message : String(error)}`
        );
        if (messages.length > 0) {
          throw new ConfigError(`Invalid configuration: ${messages.join("; ")}`);
        }
      },
    }
  );

  const settings: SyncSettings = {
    databasePath: env.DATABASE_PATH,
    githubToken: env.GITHUB_TOKEN ?? null,
    skipRankUpdate: env.SKIP_RANK_UPDATE,
    skipRepoUpdate: env.SKIP_REPO_UPDATE,
    updateFromId: env.UPDATE_FROM_ID ?? null,
    updateToId: env.UPDATE_TO_ID ?? null,
    newRepoLimit: env.NEW_REPO_LIMIT ?? null,
    newRepoSince: env.NEW_REPO_SINCE,
    batchSize: env.SYNC_BATCH_SIZE,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  };

  if (
    settings.updateFromId !== null &&
    settings.updateToId !== null &&
    settings.updateFromId > settings.updateToId
  ) {
    throw new ConfigError(
      `Invalid configuration: UPDATE_FROM_ID (${settings.updateFromId}) is greater than UPDATE_TO_ID (${settings.updateToId})`
    );
  }

  return settings;
}
