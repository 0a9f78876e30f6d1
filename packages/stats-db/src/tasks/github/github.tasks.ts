import "../../setup-env";
import { createTables, withStatsDatabase } from "../../db";
import { loadSettings } from "../../env";
import type { SyncSettings } from "../../env";
import { GitHubClient } from "../../github-client";
import type { Logger } from "../../types";
import { synchronizeRepositories } from "./sync-repos";
import type { SyncReport } from "./sync-repos";

export const COMMANDS = ["create-tables", "sync"] as const;

export type Command = (typeof COMMANDS)[number];

export interface TaskOptions {
  logger?: Logger;
  /** Passed to Octokit; tests serve GitHub from here. */
  fetch?: typeof fetch;
}

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function runSync(
  settings: SyncSettings,
  options: TaskOptions = {}
): Promise<SyncReport> {
  const logger = options.logger ?? console;
  return withStatsDatabase(settings.databasePath, logger, (database) => {
    createTables(database);
    const client = new GitHubClient({
      token: settings.githubToken,
      fetch: options.fetch,
      timeoutMs: settings.requestTimeoutMs,
      logger,
    });
    return synchronizeRepositories({
      database,
      client,
      config: settings,
      logger,
    });
  });
}

async function runCommand(
  command: string,
  options: TaskOptions = {}
): Promise<void> {
  const logger = options.logger ?? console;
  if (!isCommand(command)) {
    throw new Error(
      `Unknown command: ${command} (expected one of ${COMMANDS.join(", ")})`
    );
  }

  logger.log(`Executing GitHub task: ${command}`);
  const settings = loadSettings();

  switch (command) {
    case "create-tables": {
      await withStatsDatabase(settings.databasePath, logger, createTables);
      logger.log(`🗄️  Tables ready in ${settings.databasePath}`);
      break;
    }

    case "sync":
      await runSync(settings, options);
      break;
  }
}

if (require.main === module) {
  const command = process.argv[2];
  if (!command) {
    console.error(`Please provide a command: ${COMMANDS.join(" or ")}`);
    process.exit(1);
  }

  runCommand(command)
    .then(() => {
      console.log("Command completed successfully!");
      process.exit(0);
    })
    .catch((error) => {
      console.error("Command failed:", error);
      process.exit(1);
    });
}

export { runCommand };
