import { status } from "@grpc/grpc-js";
import type { AppError, ErrorCode } from "../../core/errors/app-error.js";
import { publicMessage } from "../../core/errors/app-error.js";

/** The RPC side of the error taxonomy. One entry per code. */
const RPC_STATUS: Record<ErrorCode, status> = {
  USER_NOT_FOUND: status.NOT_FOUND,
  USER_ALREADY_EXISTS: status.ALREADY_EXISTS,
  INVALID_CREDENTIALS: status.UNAUTHENTICATED,
  UNAUTHENTICATED: status.UNAUTHENTICATED,
  POST_NOT_FOUND: status.NOT_FOUND,
  FORBIDDEN: status.PERMISSION_DENIED,
  VALIDATION: status.INVALID_ARGUMENT,
  RATE_LIMITED: status.RESOURCE_EXHAUSTED,
  DATABASE: status.INTERNAL,
  PASSWORD_HASH: status.INTERNAL,
  JWT: status.INTERNAL,
};

export const rpcStatus = (code: ErrorCode): status => RPC_STATUS[code];

export interface RpcFailure {
  readonly code: status;
  readonly details: string;
}

export const toRpcFailure = (error: AppError): RpcFailure => ({
  code: rpcStatus(error.code),
  details: publicMessage(error),
});
