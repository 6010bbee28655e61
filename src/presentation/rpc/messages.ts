import type { AuthResult } from "../../core/entities/auth.js";
import type { Post } from "../../core/entities/post.entity.js";
import type { User } from "../../core/entities/user.entity.js";

/** Response messages as proto-loader expects them (camelCase keys). */

export interface UserMessage {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly createdAt: string;
}

export interface PostMessage {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly authorId: string;
  readonly authorUsername: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface AuthResponseMessage {
  readonly token: string;
  readonly user: UserMessage;
}

export interface DeleteResponseMessage {
  readonly success: boolean;
  readonly message: string;
}

export interface ListPostsResponseMessage {
  readonly posts: readonly PostMessage[];
  readonly totalCount: number;
  readonly page: number;
  readonly pageSize: number;
}

const iso = (ms: number): string => new Date(ms).toISOString();

export const userMessage = (user: User): UserMessage => ({
  id: String(user.id),
  username: user.username,
  email: user.email,
  createdAt: iso(user.createdAt),
});

export const postMessage = (post: Post): PostMessage => ({
  id: String(post.id),
  title: post.title,
  content: post.content,
  authorId: String(post.authorId),
  authorUsername: post.authorUsername ?? "",
  createdAt: iso(post.createdAt),
  updatedAt: iso(post.updatedAt),
});

export const authResponseMessage = (result: AuthResult): AuthResponseMessage => ({
  token: result.token,
  user: userMessage(result.user),
});
