import type { AuthResult } from "../../core/entities/auth.js";
import type { Post } from "../../core/entities/post.entity.js";
import type { User } from "../../core/entities/user.entity.js";
import type { Page } from "../../core/types/pagination.js";

/** JSON shapes of the HTTP API. Timestamps are RFC 3339. */

export interface UserJson {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly createdAt: string;
}

export interface PostJson {
  readonly id: number;
  readonly title: string;
  readonly content: string;
  readonly authorId: number;
  readonly authorUsername: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface AuthJson {
  readonly token: string;
  readonly user: UserJson;
}

export interface PostListJson {
  readonly posts: readonly PostJson[];
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
}

const iso = (ms: number): string => new Date(ms).toISOString();

export const userJson = (user: User): UserJson => ({
  id: user.id,
  username: user.username,
  email: user.email,
  createdAt: iso(user.createdAt),
});

export const postJson = (post: Post): PostJson => ({
  id: post.id,
  title: post.title,
  content: post.content,
  authorId: post.authorId,
  authorUsername: post.authorUsername,
  createdAt: iso(post.createdAt),
  updatedAt: iso(post.updatedAt),
});

export const authJson = (result: AuthResult): AuthJson => ({
  token: result.token,
  user: userJson(result.user),
});

export const postListJson = (page: Page<Post>): PostListJson => ({
  posts: page.items.map(postJson),
  total: page.total,
  limit: page.limit,
  offset: page.offset,
});
