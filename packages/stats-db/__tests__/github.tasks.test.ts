import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTables, openStatsDatabase } from "../src/db";
import { loadSettings } from "../src/env";
import {
  findRepositoryId,
  listRepositoryKeys,
} from "../src/tasks/github/github.queries";
import { runCommand, runSync } from "../src/tasks/github/github.tasks";
import { createTestLogger } from "./helpers/database";
import { commitsOn, createFakeGitHub } from "./helpers/fake-github";

let workDir: string;
let databasePath: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "repo-pulse-"));
  databasePath = path.join(workDir, "stats.db");
  vi.stubEnv("DATABASE_PATH", databasePath);
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe("runCommand", () => {
  it("creates the tables in the configured database", async () => {
    await runCommand("create-tables", { logger: createTestLogger() });

    const database = openStatsDatabase(databasePath, createTestLogger());
    try {
      expect(listRepositoryKeys(database.getDB())).toEqual(new Set());
    } finally {
      database.shutdown();
    }
  });

  it("creating the tables twice leaves stored rows alone", async () => {
    await runCommand("create-tables", { logger: createTestLogger() });
    const database = openStatsDatabase(databasePath, createTestLogger());
    try {
      database.exec(
        "INSERT INTO repository (github_id, owner, name, stars, watchers, forks, open_issues) VALUES (1, 'o', 'r', 0, 0, 0, 0)"
      );
      createTables(database);
      expect(findRepositoryId(database.getDB(), "o", "r")).toBe(1);
    } finally {
      database.shutdown();
    }
  });

  it("runs a sync against the configured database", async () => {
    vi.stubEnv("NEW_REPO_SINCE", "1000");
    const github = createFakeGitHub({
      repositories: [
        {
          id: 1001,
          owner: "o",
          name: "r",
          commits: commitsOn("2024-03-01", 2),
        },
      ],
    });

    await runCommand("sync", { logger: createTestLogger(), fetch: github.fetch });

    const database = openStatsDatabase(databasePath, createTestLogger());
    try {
      expect(findRepositoryId(database.getDB(), "o", "r")).toBe(1);
    } finally {
      database.shutdown();
    }
  });

  it("rejects an unknown command", async () => {
    await expect(
      runCommand("fetch:everything", { logger: createTestLogger() })
    ).rejects.toThrow(
      "Unknown command: fetch:everything (expected one of create-tables, sync)"
    );
  });
});

describe("runSync", () => {
  it("creates the tables itself and returns the report", async () => {
    const github = createFakeGitHub({
      repositories: [{ id: 2001, owner: "o", name: "r" }],
    });
    const settings = {
      ...loadSettings({}),
      databasePath: ":memory:",
      newRepoSince: 2000,
      newRepoLimit: 1,
    };

    const report = await runSync(settings, {
      logger: createTestLogger(),
      fetch: github.fetch,
    });

    expect(report).toMatchObject({
      insertedRepositories: 1,
      discoveryStoppedBy: "limit",
      failures: [],
    });
  });
});
