import type { AppError } from "../errors/app-error.js";
import type { PasswordHasher } from "../ports/password-hasher.js";
import type { Result } from "../types/result.js";
import { ok } from "../types/result.js";

const MASK = "********";
const inspectSymbol = Symbol.for("nodejs.util.inspect.custom");

/**
 * Hashed credential. Holds only the encoded hash, never the plaintext,
 * and masks itself in every textual form so it cannot leak into logs.
 */
export class Password {
  readonly #encoded: string;

  private constructor(encoded: string) {
    this.#encoded = encoded;
  }

  /** Hash a plaintext with a fresh salt. */
  static async hash(plain: string, hasher: PasswordHasher): Promise<Result<Password, AppError>> {
    const hashed = await hasher.hash(plain);
    if (!hashed.ok) return hashed;
    return ok(new Password(hashed.value));
  }

  /** Wrap a hash loaded from the store. */
  static fromHash(stored: string): Password {
    return new Password(stored);
  }

  /** False on mismatch and on a malformed stored hash. */
  verify(plain: string, hasher: PasswordHasher): Promise<boolean> {
    return hasher.verify(plain, this.#encoded);
  }

  /** The encoded hash, for persistence only. */
  expose(): string {
    return this.#encoded;
  }

  toString(): string {
    return `Password(${MASK})`;
  }

  toJSON(): string {
    return MASK;
  }

  [inspectSymbol](): string {
    return this.toString();
  }
}
