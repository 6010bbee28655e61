import { Password } from "../../core/entities/password.js";
import type { User } from "../../core/entities/user.entity.js";
import { type AppError, userAlreadyExists } from "../../core/errors/app-error.js";
import type { CreateUserData, UserRepository } from "../../core/ports/user.repository.js";
import { type UserId, timestamp, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * In-memory user repository: used by tests and `DATABASE_DRIVER=memory`.
 * Mirrors the UNIQUE constraints of the SQL schema.
 */
export const createInMemoryUserRepository = (): UserRepository => {
  const store = new Map<UserId, User>();
  let nextId = 1;

  const find = (predicate: (u: User) => boolean): User | null => {
    for (const user of store.values()) {
      if (predicate(user)) return user;
    }
    return null;
  };

  return {
    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      if (find((u) => u.username === data.username || u.email === data.email)) {
        return err(userAlreadyExists());
      }

      const user: User = {
        id: userId(nextId++),
        username: data.username,
        email: data.email,
        passwordHash: Password.fromHash(data.passwordHash),
        createdAt: timestamp(Date.now()),
      };

      store.set(user.id, user);
      return ok(user);
    },

    async findByEmail(email: string) {
      return ok(find((u) => u.email === email));
    },

    async findById(id: UserId) {
      return ok(store.get(id) ?? null);
    },

    async findByUsername(username: string) {
      return ok(find((u) => u.username === username));
    },
  };
};
