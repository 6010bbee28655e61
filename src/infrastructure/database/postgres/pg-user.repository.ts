/**
 * PostgreSQL user repository on node-postgres.
 *
 * Drop-in replacement for SQLite adapter, implements the same UserRepository port.
 * Uses parameterized queries to prevent SQL injection.
 */

import { Password } from "../../../core/entities/password.js";
import type { User } from "../../../core/entities/user.entity.js";
import { type AppError, databaseError, userAlreadyExists } from "../../../core/errors/app-error.js";
import type { CreateUserData, UserRepository } from "../../../core/ports/user.repository.js";
import { type UserId, timestamp, userId } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { type PgExecutor, isUniqueViolation, toNumber } from "./executor.js";

interface UserRow {
  id: string | number;
  username: string;
  email: string;
  password_hash: string;
  created_at: string | number;
}

const rowToUser = (row: UserRow): User => ({
  id: userId(toNumber(row.id)),
  username: row.username,
  email: row.email,
  passwordHash: Password.fromHash(row.password_hash),
  createdAt: timestamp(toNumber(row.created_at)),
});

const COLUMNS = "id, username, email, password_hash, created_at";

export const createPgUserRepository = (db: PgExecutor): UserRepository => {
  const findOne = async (
    where: string,
    value: string | number,
  ): Promise<Result<User | null, AppError>> => {
    try {
      const { rows } = await db.query<UserRow>(
        `SELECT ${COLUMNS} FROM users WHERE ${where} = $1`,
        [value],
      );
      const row = rows[0];
      return ok(row ? rowToUser(row) : null);
    } catch (e: unknown) {
      return err(databaseError("Failed to query users", e));
    }
  };

  return {
    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      try {
        const { rows } = await db.query<UserRow>(
          `INSERT INTO users (username, email, password_hash, created_at)
           VALUES ($1, $2, $3, $4)
           RETURNING ${COLUMNS}`,
          [data.username, data.email, data.passwordHash, Date.now()],
        );
        const row = rows[0];
        if (!row) return err(databaseError("Insert returned no row"));
        return ok(rowToUser(row));
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(userAlreadyExists());
        return err(databaseError("Failed to insert user", e));
      }
    },

    findByEmail: (email: string) => findOne("email", email),
    findById: (id: UserId) => findOne("id", id),
    findByUsername: (username: string) => findOne("username", username),
  };
};
