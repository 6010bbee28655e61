import pg from "pg";
import type { HealthCheck } from "../../core/ports/health-check.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PostRepository } from "../../core/ports/post.repository.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { ok } from "../../core/types/result.js";
import { type AppConfig, resolveDriver } from "../config/config.js";
import { createInMemoryPostRepository } from "./in-memory-post.repository.js";
import { createInMemoryUserRepository } from "./in-memory-user.repository.js";
import { migrateUp } from "./migrations/runner.js";
import {
  createPgExecutor,
  createPgHealthCheck,
  createPgPostRepository,
  createPgUserRepository,
  pgMigrateUp,
} from "./postgres/index.js";
import { createSqlitePostRepository } from "./sqlite-post.repository.js";
import { createSqliteUserRepository } from "./sqlite-user.repository.js";
import { createSqliteHealthCheck, openSqlite } from "./sqlite.js";

/** Everything the services need from persistence, plus a way to let go of it. */
export interface Store {
  readonly driver: string;
  readonly users: UserRepository;
  readonly posts: PostRepository;
  readonly health: HealthCheck;
  close(): Promise<void>;
}

export const createInMemoryStore = (): Store => {
  const users = createInMemoryUserRepository();
  return {
    driver: "memory",
    users,
    posts: createInMemoryPostRepository(users),
    health: { ping: async () => ok(undefined) },
    close: async () => {},
  };
};

/**
 * Open the configured store and bring its schema up to date.
 */
export const openStore = async (
  database: AppConfig["database"],
  logger: Logger,
): Promise<Store> => {
  const driver = resolveDriver(database);

  if (driver === "postgres") {
    const pool = new pg.Pool({ connectionString: database.url });
    pool.on("error", (e) => logger.error("Idle Postgres client error", { error: e.message }));
    await pgMigrateUp(pool, logger);
    const db = createPgExecutor(pool);
    return {
      driver,
      users: createPgUserRepository(db),
      posts: createPgPostRepository(db),
      health: createPgHealthCheck(db),
      close: () => pool.end(),
    };
  }

  if (driver === "sqlite") {
    const db = openSqlite(database.path);
    migrateUp(db, logger);
    return {
      driver,
      users: createSqliteUserRepository(db),
      posts: createSqlitePostRepository(db),
      health: createSqliteHealthCheck(db),
      close: async () => {
        db.close();
      },
    };
  }

  return createInMemoryStore();
};
