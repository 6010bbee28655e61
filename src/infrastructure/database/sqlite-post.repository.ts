import type { Database } from "better-sqlite3";
import type { Post } from "../../core/entities/post.entity.js";
import { type AppError, databaseError } from "../../core/errors/app-error.js";
import type {
  CreatePostData,
  PostRepository,
  UpdatePostData,
} from "../../core/ports/post.repository.js";
import { type PostId, type UserId, postId, timestamp, userId } from "../../core/types/brand.js";
import type { PageRequest } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";

interface PostRow {
  id: number;
  title: string;
  content: string;
  author_id: number;
  author_username: string | null;
  created_at: number;
  updated_at: number;
}

const rowToPost = (row: PostRow): Post => ({
  id: postId(row.id),
  title: row.title,
  content: row.content,
  authorId: userId(row.author_id),
  authorUsername: row.author_username,
  createdAt: timestamp(row.created_at),
  updatedAt: timestamp(row.updated_at),
});

const JOINED = `
  SELECT p.id, p.title, p.content, p.author_id, u.username AS author_username,
         p.created_at, p.updated_at
  FROM posts p
  LEFT JOIN users u ON u.id = p.author_id`;

const RETURNING = `RETURNING id, title, content, author_id,
  (SELECT username FROM users WHERE users.id = posts.author_id) AS author_username,
  created_at, updated_at`;

/**
 * SQLite post repository. Update and delete are single statements
 * scoped by `id AND author_id`.
 */
export const createSqlitePostRepository = (
  db: Database,
  now: () => number = Date.now,
): PostRepository => {
  const insertStmt = db.prepare<[string, string, number, number, number], PostRow>(
    `INSERT INTO posts (title, content, author_id, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?)
     RETURNING id, title, content, author_id, NULL AS author_username, created_at, updated_at`,
  );
  const findByIdStmt = db.prepare<[number], PostRow>(`${JOINED} WHERE p.id = ?`);
  const updateStmt = db.prepare<[string, string, number, number, number], PostRow>(
    `UPDATE posts SET title = ?, content = ?, updated_at = ?
     WHERE id = ? AND author_id = ?
     ${RETURNING}`,
  );
  const deleteStmt = db.prepare<[number, number]>(
    "DELETE FROM posts WHERE id = ? AND author_id = ?",
  );
  const listStmt = db.prepare<[number, number], PostRow>(
    `${JOINED} ORDER BY p.created_at DESC, p.id DESC LIMIT ? OFFSET ?`,
  );
  const countStmt = db.prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM posts");

  const run = <T>(what: string, fn: () => T): Result<T, AppError> => {
    try {
      return ok(fn());
    } catch (e: unknown) {
      return err(databaseError(`Failed to ${what}`, e));
    }
  };

  return {
    async create(data: CreatePostData): Promise<Result<Post, AppError>> {
      const at = now();
      const inserted = run("insert post", () =>
        insertStmt.get(data.title, data.content, data.authorId, at, at),
      );
      if (!inserted.ok) return inserted;
      if (!inserted.value) return err(databaseError("Insert returned no row"));
      return ok(rowToPost(inserted.value));
    },

    async findById(id: PostId) {
      return run("query post", () => {
        const row = findByIdStmt.get(id);
        return row ? rowToPost(row) : null;
      });
    },

    async updateByAuthor(id: PostId, authorId: UserId, data: UpdatePostData) {
      return run("update post", () => {
        const row = updateStmt.get(data.title, data.content, now(), id, authorId);
        return row ? rowToPost(row) : null;
      });
    },

    async deleteByAuthor(id: PostId, authorId: UserId) {
      return run("delete post", () => deleteStmt.run(id, authorId).changes > 0);
    },

    async list(page: PageRequest) {
      return run("list posts", () => listStmt.all(page.limit, page.offset).map(rowToPost));
    },

    async count() {
      return run("count posts", () => countStmt.get()?.cnt ?? 0);
    },
  };
};
