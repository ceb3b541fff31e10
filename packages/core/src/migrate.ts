// Command-line entry point: migrates the database named by DATABASE_URL.
import { migrateToLatest } from "./database/migrate";
import { createLogger } from "./libs/Logger";

const log = createLogger("migrate");

migrateToLatest({ log }).catch((err: Error) => {
  log.fatal({ err }, "Migration run failed");
  process.exit(1);
});
