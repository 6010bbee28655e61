import type { Database } from "better-sqlite3";
import type { Logger } from "../../../core/ports/logger.js";

/**
 * SQLite schema migrations, tracked in `_migrations`. Each step runs in
 * its own transaction together with its bookkeeping row. Timestamps are
 * INTEGER milliseconds since the epoch.
 */
interface SqliteMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string;
  readonly down: string;
}

const MIGRATIONS: readonly SqliteMigration[] = [
  {
    version: "001",
    name: "create_users",
    up: `
      CREATE TABLE IF NOT EXISTS users (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        username      TEXT NOT NULL UNIQUE,
        email         TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        created_at    INTEGER NOT NULL
      );
    `,
    down: "DROP TABLE IF EXISTS users;",
  },
  {
    version: "002",
    name: "create_posts",
    up: `
      CREATE TABLE IF NOT EXISTS posts (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        title       TEXT NOT NULL,
        content     TEXT NOT NULL,
        author_id   INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at  INTEGER NOT NULL,
        updated_at  INTEGER NOT NULL
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

const appliedVersions = (db: Database): string[] => {
  db.exec(
    "CREATE TABLE IF NOT EXISTS _migrations (version TEXT PRIMARY KEY, name TEXT NOT NULL, applied_at INTEGER NOT NULL)",
  );
  return db
    .prepare<[], { version: string }>("SELECT version FROM _migrations ORDER BY version")
    .all()
    .map((row) => row.version);
};

/** Apply every pending migration in order. Resolves to how many ran. */
export const migrateUp = (db: Database, logger: Logger): number => {
  const applied = new Set(appliedVersions(db));
  const pending = MIGRATIONS.filter((m) => !applied.has(m.version));
  const record = db.prepare("INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)");

  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.up);
      record.run(migration.version, migration.name, Date.now());
    })();
    logger.info("Migration applied", { version: migration.version, name: migration.name });
  }

  if (pending.length === 0) logger.debug("Schema up to date");
  return pending.length;
};

/** Roll back the newest applied migration; its version, or null when none is applied. */
export const migrateDown = (db: Database, logger: Logger): string | null => {
  const latest = appliedVersions(db).at(-1);
  if (latest === undefined) return null;

  const migration = MIGRATIONS.find((m) => m.version === latest);
  if (!migration) {
    logger.error("Applied migration has no definition", { version: latest });
    return null;
  }

  db.transaction(() => {
    db.exec(migration.down);
    db.prepare("DELETE FROM _migrations WHERE version = ?").run(migration.version);
  })();
  logger.info("Migration rolled back", { version: migration.version, name: migration.name });
  return migration.version;
};
