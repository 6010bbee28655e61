import type { User } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: User Repository
 * Defines the contract the domain expects; infrastructure implements it.
 *
 * Lookups resolve to `null` when nothing matches; `Err` is reserved for
 * store failures. `create` reports a uniqueness violation on username or
 * email as `USER_ALREADY_EXISTS` without saying which one collided.
 */
export interface UserRepository {
  create(data: CreateUserData): Promise<Result<User, AppError>>;
  findByEmail(email: string): Promise<Result<User | null, AppError>>;
  findById(id: UserId): Promise<Result<User | null, AppError>>;
  findByUsername(username: string): Promise<Result<User | null, AppError>>;
}

export interface CreateUserData {
  readonly username: string;
  readonly email: string;
  /** Encoded hash, never plaintext. */
  readonly passwordHash: string;
}
