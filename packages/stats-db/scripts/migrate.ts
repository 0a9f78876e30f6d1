import "../src/setup-env";
import { createTables, CREATE_TABLES_PATH, openStatsDatabase } from "../src/db";
import { loadSettings } from "../src/env";

const { databasePath } = loadSettings();
const database = openStatsDatabase(databasePath);

try {
  console.log(`Applying ${CREATE_TABLES_PATH} to ${databasePath}...`);
  createTables(database);
  console.log("Tables created successfully!");
} catch (error) {
  console.error("Error creating tables:", error);
  process.exitCode = 1;
} finally {
  database.shutdown();
}
