/**
 * Canonical application error: every failure in the system is expressed
 * as an AppError so both transports and the logger share a single shape.
 *
 * The code set is closed: each transport maps it with an exhaustive
 * `Record<ErrorCode, …>`, so a new code fails to compile until both
 * tables decide what it means on the wire.
 */

export const ErrorCode = {
  // Client errors
  USER_NOT_FOUND: "USER_NOT_FOUND",
  USER_ALREADY_EXISTS: "USER_ALREADY_EXISTS",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  UNAUTHENTICATED: "UNAUTHENTICATED",
  POST_NOT_FOUND: "POST_NOT_FOUND",
  FORBIDDEN: "FORBIDDEN",
  VALIDATION: "VALIDATION",
  RATE_LIMITED: "RATE_LIMITED",
  // Server errors
  DATABASE: "DATABASE",
  PASSWORD_HASH: "PASSWORD_HASH",
  JWT: "JWT",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const SERVER_SIDE: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.DATABASE,
  ErrorCode.PASSWORD_HASH,
  ErrorCode.JWT,
]);

/** Server-side failures go out with a generic message; details stay in the log. */
export const isServerError = (error: AppError): boolean => SERVER_SIDE.has(error.code);

export const GENERIC_SERVER_MESSAGE = "Internal server error";

/** Message safe to put on the wire for this error. */
export const publicMessage = (error: AppError): string =>
  isServerError(error) ? GENERIC_SERVER_MESSAGE : error.message;

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const userNotFound = (): AppError => appError(ErrorCode.USER_NOT_FOUND, "User not found");

export const userAlreadyExists = (): AppError =>
  appError(ErrorCode.USER_ALREADY_EXISTS, "User already exists");

export const invalidCredentials = (): AppError =>
  appError(ErrorCode.INVALID_CREDENTIALS, "Invalid credentials");

export const unauthenticated = (msg = "Authentication required"): AppError =>
  appError(ErrorCode.UNAUTHENTICATED, msg);

export const postNotFound = (): AppError => appError(ErrorCode.POST_NOT_FOUND, "Post not found");

export const forbidden = (msg = "Forbidden"): AppError => appError(ErrorCode.FORBIDDEN, msg);

export const validation = (details: Record<string, unknown>, msg = "Validation failed"): AppError =>
  appError(ErrorCode.VALIDATION, msg, details);

export const rateLimited = (): AppError => appError(ErrorCode.RATE_LIMITED, "Too many requests");

export const databaseError = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.DATABASE, msg, undefined, cause);

export const passwordHashError = (cause?: unknown): AppError =>
  appError(ErrorCode.PASSWORD_HASH, "Password hashing failed", undefined, cause);

export const jwtError = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.JWT, msg, undefined, cause);
