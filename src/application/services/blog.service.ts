import type { CreatePostCommand, UpdatePostCommand } from "../../core/entities/auth.js";
import type { Post } from "../../core/entities/post.entity.js";
import { type AppError, forbidden, postNotFound } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PostRepository } from "../../core/ports/post.repository.js";
import type { PostId, UserId } from "../../core/types/brand.js";
import type { Page, PageRequest } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";

export interface BlogService {
  /** `authorId` must come from verified claims. */
  createPost(authorId: UserId, cmd: CreatePostCommand): Promise<Result<Post, AppError>>;
  getPost(id: PostId): Promise<Result<Post, AppError>>;
  updatePost(id: PostId, authorId: UserId, cmd: UpdatePostCommand): Promise<Result<Post, AppError>>;
  deletePost(id: PostId, authorId: UserId): Promise<Result<void, AppError>>;
  listPosts(page: PageRequest): Promise<Result<Page<Post>, AppError>>;
}

interface Deps {
  readonly postRepo: PostRepository;
  readonly logger: Logger;
}

export const createBlogService = (deps: Deps): BlogService => {
  const { postRepo, logger } = deps;

  /**
   * Runs only after a conditional update/delete matched nothing. The post
   * may have changed since; whatever is read now is what gets reported.
   */
  const classifyMiss = async (id: PostId, authorId: UserId): Promise<AppError> => {
    const found = await postRepo.findById(id);
    if (!found.ok) return found.error;
    if (found.value === null) return postNotFound();
    logger.warn("Ownership check failed", { postId: id, userId: authorId });
    return forbidden("You can only modify your own posts");
  };

  return {
    async createPost(authorId, cmd) {
      const created = await postRepo.create({ ...cmd, authorId });
      if (created.ok) logger.info("Post created", { postId: created.value.id, userId: authorId });
      return created;
    },

    async getPost(id) {
      const found = await postRepo.findById(id);
      if (!found.ok) return found;
      return found.value ? ok(found.value) : err(postNotFound());
    },

    async updatePost(id, authorId, cmd) {
      const updated = await postRepo.updateByAuthor(id, authorId, cmd);
      if (!updated.ok) return updated;
      if (updated.value) return ok(updated.value);
      return err(await classifyMiss(id, authorId));
    },

    async deletePost(id, authorId) {
      const deleted = await postRepo.deleteByAuthor(id, authorId);
      if (!deleted.ok) return deleted;
      if (deleted.value) {
        logger.info("Post deleted", { postId: id, userId: authorId });
        return ok(undefined);
      }
      return err(await classifyMiss(id, authorId));
    },

    async listPosts(page) {
      const [items, total] = await Promise.all([postRepo.list(page), postRepo.count()]);
      if (!items.ok) return items;
      if (!total.ok) return total;
      return ok({ items: items.value, total: total.value, limit: page.limit, offset: page.offset });
    },
  };
};
