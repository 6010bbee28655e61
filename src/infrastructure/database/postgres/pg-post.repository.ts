import type { Post } from "../../../core/entities/post.entity.js";
import { type AppError, databaseError } from "../../../core/errors/app-error.js";
import type {
  CreatePostData,
  PostRepository,
  UpdatePostData,
} from "../../../core/ports/post.repository.js";
import { type PostId, type UserId, postId, timestamp, userId } from "../../../core/types/brand.js";
import type { PageRequest } from "../../../core/types/pagination.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { type PgExecutor, toNumber } from "./executor.js";

interface PostRow {
  id: string | number;
  title: string;
  content: string;
  author_id: string | number;
  author_username: string | null;
  created_at: string | number;
  updated_at: string | number;
}

const rowToPost = (row: PostRow): Post => ({
  id: postId(toNumber(row.id)),
  title: row.title,
  content: row.content,
  authorId: userId(toNumber(row.author_id)),
  authorUsername: row.author_username,
  createdAt: timestamp(toNumber(row.created_at)),
  updatedAt: timestamp(toNumber(row.updated_at)),
});

const JOINED = `
  SELECT p.id, p.title, p.content, p.author_id, u.username AS author_username,
         p.created_at, p.updated_at
  FROM posts p
  LEFT JOIN users u ON u.id = p.author_id`;

/**
 * PostgreSQL post repository. Update and delete are single statements
 * scoped by `id AND author_id`.
 */
export const createPgPostRepository = (
  db: PgExecutor,
  now: () => number = Date.now,
): PostRepository => {
  const run = async <T>(what: string, fn: () => Promise<T>): Promise<Result<T, AppError>> => {
    try {
      return ok(await fn());
    } catch (e: unknown) {
      return err(databaseError(`Failed to ${what}`, e));
    }
  };

  return {
    async create(data: CreatePostData): Promise<Result<Post, AppError>> {
      const inserted = await run("insert post", async () => {
        const at = now();
        const { rows } = await db.query<PostRow>(
          `INSERT INTO posts (title, content, author_id, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $4)
           RETURNING id, title, content, author_id, NULL AS author_username, created_at, updated_at`,
          [data.title, data.content, data.authorId, at],
        );
        return rows[0];
      });
      if (!inserted.ok) return inserted;
      if (!inserted.value) return err(databaseError("Insert returned no row"));
      return ok(rowToPost(inserted.value));
    },

    findById: (id: PostId) =>
      run("query post", async () => {
        const { rows } = await db.query<PostRow>(`${JOINED} WHERE p.id = $1`, [id]);
        const row = rows[0];
        return row ? rowToPost(row) : null;
      }),

    updateByAuthor: (id: PostId, authorId: UserId, data: UpdatePostData) =>
      run("update post", async () => {
        const { rows } = await db.query<PostRow>(
          `UPDATE posts SET title = $1, content = $2, updated_at = $3
           WHERE id = $4 AND author_id = $5
           RETURNING id, title, content, author_id,
             (SELECT username FROM users WHERE users.id = posts.author_id) AS author_username,
             created_at, updated_at`,
          [data.title, data.content, now(), id, authorId],
        );
        const row = rows[0];
        return row ? rowToPost(row) : null;
      }),

    deleteByAuthor: (id: PostId, authorId: UserId) =>
      run("delete post", async () => {
        const result = await db.query("DELETE FROM posts WHERE id = $1 AND author_id = $2", [
          id,
          authorId,
        ]);
        return (result.rowCount ?? 0) > 0;
      }),

    list: (page: PageRequest) =>
      run("list posts", async () => {
        const { rows } = await db.query<PostRow>(
          `${JOINED} ORDER BY p.created_at DESC, p.id DESC LIMIT $1 OFFSET $2`,
          [page.limit, page.offset],
        );
        return rows.map(rowToPost);
      }),

    count: () =>
      run("count posts", async () => {
        const { rows } = await db.query<{ count: string | number }>(
          "SELECT COUNT(*) AS count FROM posts",
        );
        return toNumber(rows[0]?.count ?? 0);
      }),
  };
};
