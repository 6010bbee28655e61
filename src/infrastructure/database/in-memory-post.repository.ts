import type { Post } from "../../core/entities/post.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type {
  CreatePostData,
  PostRepository,
  UpdatePostData,
} from "../../core/ports/post.repository.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type PostId, type UserId, postId, timestamp } from "../../core/types/brand.js";
import type { PageRequest } from "../../core/types/pagination.js";
import { type Result, ok } from "../../core/types/result.js";

type StoredPost = Omit<Post, "authorUsername">;

/**
 * In-memory post repository. Author usernames are resolved through the
 * user repository, the way the SQL adapters join on `users`.
 */
export const createInMemoryPostRepository = (
  users: UserRepository,
  now: () => number = Date.now,
): PostRepository => {
  const store = new Map<PostId, StoredPost>();
  let nextId = 1;

  const withAuthor = async (post: StoredPost): Promise<Result<Post, AppError>> => {
    const author = await users.findById(post.authorId);
    if (!author.ok) return author;
    return ok({ ...post, authorUsername: author.value?.username ?? null });
  };

  const newestFirst = (a: StoredPost, b: StoredPost): number =>
    b.createdAt - a.createdAt || b.id - a.id;

  return {
    async create(data: CreatePostData): Promise<Result<Post, AppError>> {
      const at = timestamp(now());
      const post: StoredPost = {
        id: postId(nextId++),
        title: data.title,
        content: data.content,
        authorId: data.authorId,
        createdAt: at,
        updatedAt: at,
      };
      store.set(post.id, post);
      return ok({ ...post, authorUsername: null });
    },

    async findById(id: PostId) {
      const post = store.get(id);
      if (!post) return ok(null);
      return withAuthor(post);
    },

    async updateByAuthor(id: PostId, authorId: UserId, data: UpdatePostData) {
      const existing = store.get(id);
      if (!existing || existing.authorId !== authorId) return ok(null);

      const updated: StoredPost = {
        ...existing,
        title: data.title,
        content: data.content,
        updatedAt: timestamp(now()),
      };
      store.set(id, updated);
      return withAuthor(updated);
    },

    async deleteByAuthor(id: PostId, authorId: UserId) {
      const existing = store.get(id);
      if (!existing || existing.authorId !== authorId) return ok(false);
      store.delete(id);
      return ok(true);
    },

    async list(page: PageRequest): Promise<Result<readonly Post[], AppError>> {
      const slice = [...store.values()]
        .sort(newestFirst)
        .slice(page.offset, page.offset + page.limit);

      const posts: Post[] = [];
      for (const post of slice) {
        const joined = await withAuthor(post);
        if (!joined.ok) return joined;
        posts.push(joined.value);
      }
      return ok(posts);
    },

    async count() {
      return ok(store.size);
    },
  };
};
