import type { Pool, QueryResult, QueryResultRow } from "pg";
import { type AppError, databaseError } from "../../../core/errors/app-error.js";
import type { HealthCheck } from "../../../core/ports/health-check.js";
import { type Result, err, ok } from "../../../core/types/result.js";

/** The slice of `pg.Pool` the repositories use. */
export interface PgExecutor {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export const createPgExecutor = (pool: Pool): PgExecutor => ({
  query: <R extends QueryResultRow>(text: string, values?: unknown[]) =>
    pool.query<R>(text, values),
});

/** SQLSTATE 23505 */
export const isUniqueViolation = (e: unknown): boolean =>
  e instanceof Error && "code" in e && e.code === "23505";

/** BIGINT / BIGSERIAL columns arrive as strings. */
export const toNumber = (value: string | number): number => Number(value);

export const createPgHealthCheck = (db: PgExecutor): HealthCheck => ({
  async ping(): Promise<Result<void, AppError>> {
    try {
      await db.query("SELECT 1");
      return ok(undefined);
    } catch (e: unknown) {
      return err(databaseError("Postgres ping failed", e));
    }
  },
});
