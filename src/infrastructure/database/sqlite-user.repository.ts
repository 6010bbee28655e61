import type { Database } from "better-sqlite3";
import { Password } from "../../core/entities/password.js";
import type { User } from "../../core/entities/user.entity.js";
import { type AppError, databaseError, userAlreadyExists } from "../../core/errors/app-error.js";
import type { CreateUserData, UserRepository } from "../../core/ports/user.repository.js";
import { type UserId, timestamp, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * SQLite user repository on better-sqlite3.
 * Calls are synchronous underneath; the port stays async so the Postgres
 * adapter can share it.
 */

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: number;
}

const rowToUser = (row: UserRow): User => ({
  id: userId(row.id),
  username: row.username,
  email: row.email,
  passwordHash: Password.fromHash(row.password_hash),
  createdAt: timestamp(row.created_at),
});

/** Detect SQLite UNIQUE constraint violations */
export const isUniqueViolation = (e: unknown): boolean =>
  e instanceof Error &&
  (("code" in e && e.code === "SQLITE_CONSTRAINT_UNIQUE") ||
    e.message.includes("UNIQUE constraint failed"));

const COLUMNS = "id, username, email, password_hash, created_at";

export const createSqliteUserRepository = (db: Database): UserRepository => {
  // Pre-compile queries for performance
  const insertStmt = db.prepare<[string, string, string, number], UserRow>(
    `INSERT INTO users (username, email, password_hash, created_at) VALUES (?, ?, ?, ?) RETURNING ${COLUMNS}`,
  );
  const findByIdStmt = db.prepare<[number], UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = ?`);
  const findByEmailStmt = db.prepare<[string], UserRow>(
    `SELECT ${COLUMNS} FROM users WHERE email = ?`,
  );
  const findByUsernameStmt = db.prepare<[string], UserRow>(
    `SELECT ${COLUMNS} FROM users WHERE username = ?`,
  );

  const findOne = (lookup: () => UserRow | undefined): Result<User | null, AppError> => {
    try {
      const row = lookup();
      return ok(row ? rowToUser(row) : null);
    } catch (e: unknown) {
      return err(databaseError("Failed to query users", e));
    }
  };

  return {
    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      try {
        const row = insertStmt.get(data.username, data.email, data.passwordHash, Date.now());
        if (!row) return err(databaseError("Insert returned no row"));
        return ok(rowToUser(row));
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(userAlreadyExists());
        return err(databaseError("Failed to insert user", e));
      }
    },

    async findByEmail(email: string) {
      return findOne(() => findByEmailStmt.get(email));
    },

    async findById(id: UserId) {
      return findOne(() => findByIdStmt.get(id));
    },

    async findByUsername(username: string) {
      return findOne(() => findByUsernameStmt.get(username));
    },
  };
};
