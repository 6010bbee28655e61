import type { BlogPost, ClientError, ClientErrorKind } from "../../client/types.js";
import { type Output, printKeyValue } from "../ui.js";

const LABELS: Record<ClientErrorKind, string> = {
  NOT_FOUND: "Not found",
  UNAUTHORIZED: "Unauthorized",
  FORBIDDEN: "Forbidden",
  CONFLICT: "Conflict",
  INVALID_REQUEST: "Invalid request",
  RATE_LIMITED: "Rate limited",
  SERVER: "Server error",
  TRANSPORT: "Connection failed",
  NO_TOKEN: "Not logged in",
};

export const describeError = (error: ClientError): string => `${LABELS[error.kind]}: ${error.message}`;

/** `2024-01-02T03:04:05.000Z` → `2024-01-02 03:04:05` */
export const formatTime = (iso: string): string => {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : date.toISOString().slice(0, 19).replace("T", " ");
};

export const printPost = (out: Output, post: BlogPost): void => {
  printKeyValue(out, [
    ["ID", String(post.id)],
    ["Title", post.title],
    ["Content", post.content],
    ["Author", `${post.authorUsername ?? "unknown"} (ID: ${post.authorId})`],
    ["Created", formatTime(post.createdAt)],
    ["Updated", formatTime(post.updatedAt)],
  ]);
};
