import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { type AppError, databaseError } from "../../core/errors/app-error.js";
import type { HealthCheck } from "../../core/ports/health-check.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Open (creating if needed) a SQLite database with WAL and foreign keys on.
 * `:memory:` is passed through untouched.
 */
export const openSqlite = (path: string): Database.Database => {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
};

export const createSqliteHealthCheck = (db: Database.Database): HealthCheck => ({
  async ping(): Promise<Result<void, AppError>> {
    try {
      db.prepare("SELECT 1").get();
      return ok(undefined);
    } catch (e: unknown) {
      return err(databaseError("SQLite ping failed", e));
    }
  },
});
