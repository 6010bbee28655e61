import type { UserId } from "../types/index.js";
import type { User } from "./user.entity.js";

/** Decoded token payload. Times are seconds since the epoch. */
export interface Claims {
  readonly userId: UserId;
  readonly username: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

/** Result of register/login. Never persisted. */
export interface AuthResult {
  readonly token: string;
  readonly user: User;
}

export interface RegisterCommand {
  readonly username: string;
  readonly email: string;
  readonly password: string;
}

export interface LoginCommand {
  readonly email: string;
  readonly password: string;
}

export interface CreatePostCommand {
  readonly title: string;
  readonly content: string;
}

export interface UpdatePostCommand {
  readonly title: string;
  readonly content: string;
}
