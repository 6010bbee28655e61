import type { AppError, ErrorCode } from "../../core/errors/app-error.js";
import { isServerError, publicMessage } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";

/** The HTTP side of the error taxonomy. One entry per code. */
const STATUS_MAP: Record<ErrorCode, number> = {
  USER_NOT_FOUND: 404,
  USER_ALREADY_EXISTS: 409,
  INVALID_CREDENTIALS: 401,
  UNAUTHENTICATED: 401,
  POST_NOT_FOUND: 404,
  FORBIDDEN: 403,
  VALIDATION: 400,
  RATE_LIMITED: 429,
  DATABASE: 500,
  PASSWORD_HASH: 500,
  JWT: 500,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/**
 * Serialise an AppError into a JSON response. Never leaks internals:
 * server-side errors are logged with their cause and sent out generic.
 */
export const errorResponse = (error: AppError, requestId: string, logger?: Logger): Response => {
  if (isServerError(error)) {
    logger?.error(error.message, { code: error.code, cause: error.cause });
  }

  const body: Record<string, unknown> = {
    error: {
      code: error.code,
      message: publicMessage(error),
      ...(error.details && !isServerError(error) ? { details: error.details } : {}),
    },
    requestId,
  };

  return Response.json(body, { status: httpStatus(error.code) });
};

/** Success response helper */
export const jsonResponse = <T>(data: T, status = 200): Response => Response.json(data, { status });

/** 201 Created */
export const createdResponse = <T>(data: T): Response => Response.json(data, { status: 201 });

/** 204 No Content */
export const noContentResponse = (): Response => new Response(null, { status: 204 });
