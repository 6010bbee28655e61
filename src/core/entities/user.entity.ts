import type { Timestamp, UserId } from "../types/index.js";
import type { Password } from "./password.js";

/**
 * User entity: pure data, no behaviour, no framework deps.
 * `username` and `email` are unique; the store enforces it.
 */
export interface User {
  readonly id: UserId;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: Password;
  readonly createdAt: Timestamp;
}
