import type { Post } from "../entities/post.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { PostId, UserId } from "../types/brand.js";
import type { PageRequest } from "../types/pagination.js";
import type { Result } from "../types/result.js";

/**
 * Port: Post Repository
 *
 * `updateByAuthor` and `deleteByAuthor` are single conditional statements
 * scoped by both id and author; a miss is not an error here, the caller
 * decides what it means.
 */
export interface PostRepository {
  create(data: CreatePostData): Promise<Result<Post, AppError>>;
  /** Joined with the author's username. */
  findById(id: PostId): Promise<Result<Post | null, AppError>>;
  updateByAuthor(
    id: PostId,
    authorId: UserId,
    data: UpdatePostData,
  ): Promise<Result<Post | null, AppError>>;
  deleteByAuthor(id: PostId, authorId: UserId): Promise<Result<boolean, AppError>>;
  /** Newest first, joined with author usernames. */
  list(page: PageRequest): Promise<Result<readonly Post[], AppError>>;
  count(): Promise<Result<number, AppError>>;
}

export interface CreatePostData {
  readonly title: string;
  readonly content: string;
  readonly authorId: UserId;
}

export interface UpdatePostData {
  readonly title: string;
  readonly content: string;
}
