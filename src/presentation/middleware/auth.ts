import type { Claims } from "../../core/entities/auth.js";
import type { AppError } from "../../core/errors/app-error.js";
import { unauthenticated } from "../../core/errors/app-error.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Pull the token out of a `Bearer <token>` value. Shared by the HTTP
 * Authorization header and the RPC `authorization` metadata entry.
 */
export const parseBearer = (value: string | null | undefined): Result<string, AppError> => {
  if (!value) return err(unauthenticated("Missing Authorization header"));

  const parts = value.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer") {
    return err(unauthenticated("Invalid Authorization header format"));
  }

  const token = parts[1];
  if (!token) return err(unauthenticated("Missing token"));

  return ok(token);
};

/**
 * Verify a bearer value. Every token failure, expiry included, is reported
 * as UNAUTHENTICATED.
 */
export const authenticateBearer = (
  value: string | null | undefined,
  tokenService: TokenService,
): Result<Claims, AppError> => {
  const token = parseBearer(value);
  if (!token.ok) return token;

  const claims = tokenService.verifyToken(token.value);
  if (!claims.ok) return err(unauthenticated("Invalid or expired token"));
  return claims;
};

/**
 * Extracts and verifies the Bearer token from the Authorization header.
 */
export const authenticate = (req: Request, tokenService: TokenService): Result<Claims, AppError> =>
  authenticateBearer(req.headers.get("authorization"), tokenService);
