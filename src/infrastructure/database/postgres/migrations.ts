/**
 * Postgres migration runner on node-postgres.
 *
 * Mirrors the SQLite migration runner pattern but uses PostgreSQL DDL.
 * Each migration runs in its own transaction on a dedicated client.
 */

import type { Pool, PoolClient } from "pg";
import type { Logger } from "../../../core/ports/logger.js";

interface PgMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string; // raw SQL
  readonly down: string;
}

/**
 * All Postgres migrations: inlined SQL strings.
 * Timestamps are BIGINT milliseconds since the epoch, as in SQLite.
 */
const migrations: readonly PgMigration[] = [
  {
    version: "001",
    name: "create_users",
    up: `
      CREATE TABLE IF NOT EXISTS users (
        id            BIGSERIAL PRIMARY KEY,
        username      TEXT NOT NULL UNIQUE,
        email         TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        created_at    BIGINT NOT NULL
      );
    `,
    down: "DROP TABLE IF EXISTS users;",
  },
  {
    version: "002",
    name: "create_posts",
    up: `
      CREATE TABLE IF NOT EXISTS posts (
        id          BIGSERIAL PRIMARY KEY,
        title       TEXT NOT NULL,
        content     TEXT NOT NULL,
        author_id   BIGINT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at  BIGINT NOT NULL,
        updated_at  BIGINT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_posts_author_id ON posts(author_id);
      CREATE INDEX IF NOT EXISTS idx_posts_newest ON posts(created_at DESC, id DESC);
    `,
    down: `
      DROP INDEX IF EXISTS idx_posts_newest;
      DROP INDEX IF EXISTS idx_posts_author_id;
      DROP TABLE IF EXISTS posts;
    `,
  },
];

const ensureMigrationsTable = async (pool: Pool): Promise<void> => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  BIGINT NOT NULL
    )
  `);
};

const getAppliedVersions = async (pool: Pool): Promise<Set<string>> => {
  const { rows } = await pool.query<{ version: string }>(
    "SELECT version FROM _migrations ORDER BY version",
  );
  return new Set(rows.map((r) => r.version));
};

const inTransaction = async (pool: Pool, fn: (tx: PoolClient) => Promise<void>): Promise<void> => {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await fn(client);
    await client.query("COMMIT");
  } catch (e: unknown) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
};

export const pgMigrateUp = async (pool: Pool, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    await inTransaction(pool, async (tx) => {
      await tx.query(migration.up);
      await tx.query("INSERT INTO _migrations (version, name, applied_at) VALUES ($1, $2, $3)", [
        migration.version,
        migration.name,
        Date.now(),
      ]);
    });

    logger.info("Migration applied", {
      version: migration.version,
      name: migration.name,
    });
    count++;
  }

  if (count > 0) {
    logger.info("Postgres migrations complete", { applied: count });
  }

  return count;
};

export const pgMigrateDown = async (pool: Pool, logger: Logger): Promise<string | null> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);

  // Find the highest applied migration
  const reversed = [...migrations].reverse();
  for (const migration of reversed) {
    if (!applied.has(migration.version)) continue;

    await inTransaction(pool, async (tx) => {
      await tx.query(migration.down);
      await tx.query("DELETE FROM _migrations WHERE version = $1", [migration.version]);
    });

    logger.info("Migration rolled back", {
      version: migration.version,
      name: migration.name,
    });
    return migration.version;
  }

  return null;
};
