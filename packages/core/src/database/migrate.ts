import * as path from "path";
import { promises as fs } from "fs";
import { FileMigrationProvider, MigrationResultSet, Migrator } from "kysely";
import bunyan from "bunyan";
import { DatabaseSettings, openDatabase, readDatabaseSettings } from "./database";
import { createLogger } from "../libs/Logger";

export interface MigrateOptions {
  /** Defaults to the environment (see readDatabaseSettings) */
  settings?: DatabaseSettings;
  log?: bunyan;
}

export interface MigrationReport {
  applied: string[];
  failed: string[];
}

/** Sort kysely's per-migration results into applied and failed names. */
export function summarizeMigrations(results: MigrationResultSet["results"]): MigrationReport {
  const report: MigrationReport = { applied: [], failed: [] };
  for (const it of results ?? []) {
    if (it.status === "Success") report.applied.push(it.migrationName);
    else if (it.status === "Error") report.failed.push(it.migrationName);
  }
  return report;
}

/**
 * Bring the ledger schema up to date on its own short-lived pool. Throws the
 * migrator's error after logging which migration failed.
 */
export async function migrateToLatest(options: MigrateOptions = {}): Promise<MigrationReport> {
  const log = options.log ?? createLogger("migrate");
  const database = openDatabase(options.settings ?? readDatabaseSettings());

  try {
    const migrator = new Migrator({
      db: database,
      provider: new FileMigrationProvider({
        fs,
        path,
        migrationFolder: path.join(__dirname, "migrations"),
      }),
    });

    const { error, results } = await migrator.migrateToLatest();
    const report = summarizeMigrations(results);
    for (const name of report.applied) log.info({ migration: name }, "Migration applied");
    for (const name of report.failed) log.error({ migration: name }, "Migration failed");
    if (error) throw error;

    log.info({ applied: report.applied.length }, "Ledger schema up to date");
    return report;
  } finally {
    await database.destroy();
  }
}
