import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { Claims } from "../../core/entities/auth.js";
import { type AppError, jwtError } from "../../core/errors/app-error.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type UserId, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * JWT token service using node:crypto.
 * Signs with HMAC-SHA256; no revocation, a token lives until `exp`.
 */

export interface JwtConfig {
  readonly secret: string;
  /** `<n>[smhd]`, e.g. "24h" */
  readonly expiresIn: string;
  /** Seconds since the epoch. */
  readonly now?: () => number;
}

const MULTIPLIERS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

export const parseDuration = (duration: string): number => {
  const match = /^(\d+)([smhd])$/.exec(duration);
  const unit = match?.[2];
  if (!match || unit === undefined) throw new Error(`Invalid duration format: ${duration}`);
  return Number(match[1]) * (MULTIPLIERS[unit] ?? 0);
};

const headerSchema = z.object({ alg: z.literal("HS256"), typ: z.literal("JWT").optional() });

const payloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  username: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

const HEADER = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

const sign = (data: string, secret: string): Buffer =>
  createHmac("sha256", secret).update(data).digest();

const decodeSegment = (segment: string): unknown => {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch {
    return undefined;
  }
};

const systemClock = (): number => Math.floor(Date.now() / 1000);

export const createJwtService = (config: JwtConfig): TokenService => {
  const ttl = parseDuration(config.expiresIn);
  const now = config.now ?? systemClock;

  return {
    generateToken(id: UserId, username: string): Result<string, AppError> {
      try {
        const iat = now();
        const body = Buffer.from(
          JSON.stringify({ sub: String(id), username, iat, exp: iat + ttl }),
        ).toString("base64url");
        const data = `${HEADER}.${body}`;
        return ok(`${data}.${sign(data, config.secret).toString("base64url")}`);
      } catch (e: unknown) {
        return err(jwtError("Failed to sign token", e));
      }
    },

    verifyToken(token: string): Result<Claims, AppError> {
      const parts = token.split(".");
      const [header, body, signature] = parts;
      if (parts.length !== 3 || header === undefined || body === undefined || signature === undefined) {
        return err(jwtError("Malformed token"));
      }

      if (!headerSchema.safeParse(decodeSegment(header)).success) {
        return err(jwtError("Unsupported token header"));
      }

      const expected = sign(`${header}.${body}`, config.secret);
      const given = Buffer.from(signature, "base64url");
      if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
        return err(jwtError("Invalid token signature"));
      }

      const payload = payloadSchema.safeParse(decodeSegment(body));
      if (!payload.success) return err(jwtError("Invalid token claims"));

      const { sub, username, iat, exp } = payload.data;
      if (now() > exp) return err(jwtError("Token expired"));

      return ok({ userId: userId(Number(sub)), username, issuedAt: iat, expiresAt: exp });
    },
  };
};
