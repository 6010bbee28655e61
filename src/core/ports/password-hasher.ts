import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Password Hasher
 */
export interface PasswordHasher {
  hash(plain: string): Promise<Result<string, AppError>>;
  /** Resolves `false` for a mismatch or an undecodable hash; never rejects. */
  verify(plain: string, hash: string): Promise<boolean>;
}
