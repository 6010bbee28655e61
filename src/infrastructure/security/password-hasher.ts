import * as argon2 from "argon2";
import { type AppError, passwordHashError } from "../../core/errors/app-error.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import { type Result, err, ok } from "../../core/types/result.js";

export interface Argon2Params {
  /** KiB */
  readonly memoryCost: number;
  readonly timeCost: number;
  readonly parallelism: number;
}

export const DEFAULT_ARGON2_PARAMS: Argon2Params = {
  memoryCost: 65_536, // 64 MiB
  timeCost: 3,
  parallelism: 4,
};

/**
 * Argon2id password hasher backed by the `argon2` native binding.
 * Every hash gets a fresh random salt; the output is the PHC-encoded string.
 */
export const createPasswordHasher = (params: Argon2Params = DEFAULT_ARGON2_PARAMS): PasswordHasher => ({
  async hash(plain: string): Promise<Result<string, AppError>> {
    try {
      const hashed = await argon2.hash(plain, {
        type: argon2.argon2id,
        memoryCost: params.memoryCost,
        timeCost: params.timeCost,
        parallelism: params.parallelism,
        hashLength: 32,
      });
      return ok(hashed);
    } catch (e: unknown) {
      return err(passwordHashError(e));
    }
  },

  async verify(plain: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, plain);
    } catch {
      // undecodable hash
      return false;
    }
  },
});
