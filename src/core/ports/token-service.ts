import type { Claims } from "../entities/auth.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Token Service (JWT or similar)
 * Stateless: a token stays valid until it expires.
 */
export interface TokenService {
  generateToken(userId: UserId, username: string): Result<string, AppError>;
  verifyToken(token: string): Result<Claims, AppError>;
}
