import dotenv from "dotenv";
import { loadConfig } from "../config/config.js";
import { PostgresPersistence } from "../persistence/postgres_persistence.js";

dotenv.config();

async function main() {
  const { databaseUrl } = loadConfig().journal;
  if (!databaseUrl) {
    console.error("DB_INIT_FAIL: DATABASE_URL is not set");
    process.exitCode = 1;
    return;
  }

  const journal = new PostgresPersistence(databaseUrl);
  try {
    await journal.init();
    console.log("DB_INIT_OK: orders, trades, daily_snapshots, system_state and alert_events are ready");
  } catch (err) {
    console.error("DB_INIT_FAIL: Unable to initialize journal schema");
    console.error(err);
    process.exitCode = 1;
  } finally {
    await journal.close();
  }
}

await main();
