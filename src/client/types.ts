import type { Result } from "../core/types/result.js";

/** Failure kinds a caller can branch on, whichever transport is in use. */
export const ClientErrorKind = {
  NOT_FOUND: "NOT_FOUND",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  CONFLICT: "CONFLICT",
  INVALID_REQUEST: "INVALID_REQUEST",
  RATE_LIMITED: "RATE_LIMITED",
  SERVER: "SERVER",
  TRANSPORT: "TRANSPORT",
  NO_TOKEN: "NO_TOKEN",
} as const;

export type ClientErrorKind = (typeof ClientErrorKind)[keyof typeof ClientErrorKind];

export interface ClientError {
  readonly kind: ClientErrorKind;
  readonly message: string;
}

export const clientError = (kind: ClientErrorKind, message: string): ClientError => ({ kind, message });

export const noToken = (): ClientError => clientError(ClientErrorKind.NO_TOKEN, "No token set; log in first");

export type ClientResult<T> = Promise<Result<T, ClientError>>;

export interface BlogUser {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  /** RFC 3339 */
  readonly createdAt: string;
}

export interface BlogPost {
  readonly id: number;
  readonly title: string;
  readonly content: string;
  readonly authorId: number;
  readonly authorUsername: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface AuthSession {
  readonly token: string;
  readonly user: BlogUser;
}

export interface PostList {
  readonly posts: readonly BlogPost[];
  readonly total: number;
  readonly limit: number;
  /** The offset the server used, which over gRPC is aligned to a page boundary. */
  readonly offset: number;
}

export interface RegisterInput {
  readonly username: string;
  readonly email: string;
  readonly password: string;
}

export interface LoginInput {
  readonly email: string;
  readonly password: string;
}

export interface PostInput {
  readonly title: string;
  readonly content: string;
}

export interface ListOptions {
  readonly limit?: number | undefined;
  readonly offset?: number | undefined;
}

/**
 * One wire protocol. Tokens are passed per call; the facade in
 * `index.ts` owns them.
 */
export interface Transport {
  register(input: RegisterInput): ClientResult<AuthSession>;
  login(input: LoginInput): ClientResult<AuthSession>;
  createPost(token: string, input: PostInput): ClientResult<BlogPost>;
  getPost(id: number): ClientResult<BlogPost>;
  updatePost(token: string, id: number, input: PostInput): ClientResult<BlogPost>;
  deletePost(token: string, id: number): ClientResult<void>;
  listPosts(limit: number, offset: number): ClientResult<PostList>;
  close(): void;
}
