import type { QueryResult, QueryResultRow } from "pg";
import { describe, expect, it, vi } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { postId, userId } from "../../src/core/types/brand.js";
import { type PgExecutor, createPgHealthCheck } from "../../src/infrastructure/database/postgres/executor.js";
import { createPgPostRepository } from "../../src/infrastructure/database/postgres/pg-post.repository.js";
import { createPgUserRepository } from "../../src/infrastructure/database/postgres/pg-user.repository.js";

const result = <R extends QueryResultRow>(rows: R[], rowCount = rows.length): QueryResult<R> => ({
  command: "",
  rowCount,
  oid: 0,
  fields: [],
  rows,
});

/** Executor whose replies are queued per test. */
const scripted = () => {
  const query = vi.fn();
  const db: PgExecutor = { query };
  return { db, query };
};

const userRow = {
  id: "1",
  username: "alice",
  email: "alice@example.com",
  password_hash: "$argon2id$stub",
  created_at: "1700000000000",
};

const postRow = {
  id: "7",
  title: "Hello",
  content: "World",
  author_id: "1",
  author_username: "alice",
  created_at: "1700000000000",
  updated_at: "1700000005000",
};

describe("Postgres user repository", () => {
  it("inserts with positional parameters and converts BIGINT strings", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([userRow]));
    const users = createPgUserRepository(db);

    const created = await users.create({ username: "alice", email: "alice@example.com", passwordHash: "$argon2id$stub" });
    expect(created.ok).toBe(true);
    if (!created.ok) return;
    expect(created.value.id).toBe(1);
    expect(created.value.createdAt).toBe(1_700_000_000_000);

    const [text, values] = query.mock.calls[0] ?? [];
    expect(text).toContain("INSERT INTO users");
    expect(values).toEqual(["alice", "alice@example.com", "$argon2id$stub", expect.any(Number)]);
  });

  it("maps SQLSTATE 23505 to USER_ALREADY_EXISTS", async () => {
    const { db, query } = scripted();
    query.mockRejectedValueOnce(Object.assign(new Error("duplicate key value"), { code: "23505" }));

    const created = await createPgUserRepository(db).create({ username: "a", email: "a@example.com", passwordHash: "x" });
    expect(!created.ok && created.error.code).toBe(ErrorCode.USER_ALREADY_EXISTS);
  });

  it("returns null when no row matches", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([]));

    expect(await createPgUserRepository(db).findByEmail("nobody@example.com")).toEqual({ ok: true, value: null });
    expect(query.mock.calls[0]?.[1]).toEqual(["nobody@example.com"]);
  });
});

describe("Postgres post repository", () => {
  it("updates in one statement scoped by id and author", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([postRow]));

    const updated = await createPgPostRepository(db).updateByAuthor(postId(7), userId(1), {
      title: "Hello",
      content: "World",
    });
    expect(updated.ok && updated.value).toEqual({
      id: 7,
      title: "Hello",
      content: "World",
      authorId: 1,
      authorUsername: "alice",
      createdAt: 1_700_000_000_000,
      updatedAt: 1_700_000_005_000,
    });

    expect(query).toHaveBeenCalledTimes(1);
    const [text, values] = query.mock.calls[0] ?? [];
    expect(text).toContain("WHERE id = $4 AND author_id = $5");
    expect(values).toEqual(["Hello", "World", expect.any(Number), 7, 1]);
  });

  it("binds the injected clock as updated_at", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([postRow]));

    await createPgPostRepository(db, () => 1_700_000_005_000).updateByAuthor(postId(7), userId(1), {
      title: "Hello",
      content: "World",
    });
    const [, values] = query.mock.calls[0] ?? [];
    expect(values).toEqual(["Hello", "World", 1_700_000_005_000, 7, 1]);
  });

  it("returns null when the conditional update matches nothing", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([]));

    const updated = await createPgPostRepository(db).updateByAuthor(postId(7), userId(2), { title: "x", content: "" });
    expect(updated).toEqual({ ok: true, value: null });
  });

  it("reports deletion by affected row count", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([], 1)).mockResolvedValueOnce(result([], 0));
    const posts = createPgPostRepository(db);

    expect(await posts.deleteByAuthor(postId(7), userId(1))).toEqual({ ok: true, value: true });
    expect(await posts.deleteByAuthor(postId(7), userId(2))).toEqual({ ok: true, value: false });
  });

  it("lists with LIMIT/OFFSET and counts separately", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([postRow])).mockResolvedValueOnce(result([{ count: "12" }]));
    const posts = createPgPostRepository(db);

    const page = await posts.list({ limit: 5, offset: 10 });
    expect(page.ok && page.value.map((p) => p.id)).toEqual([7]);
    expect(query.mock.calls[0]?.[0]).toContain("ORDER BY p.created_at DESC, p.id DESC LIMIT $1 OFFSET $2");
    expect(query.mock.calls[0]?.[1]).toEqual([5, 10]);

    expect(await posts.count()).toEqual({ ok: true, value: 12 });
  });

  it("wraps driver failures as DATABASE errors", async () => {
    const { db, query } = scripted();
    query.mockRejectedValueOnce(new Error("connection terminated"));

    const found = await createPgPostRepository(db).findById(postId(1));
    expect(!found.ok && found.error.code).toBe(ErrorCode.DATABASE);
    expect(!found.ok && found.error.message).toBe("Failed to query post");
  });

  it("pings through the executor", async () => {
    const { db, query } = scripted();
    query.mockResolvedValueOnce(result([{ "?column?": 1 }])).mockRejectedValueOnce(new Error("down"));
    const health = createPgHealthCheck(db);

    expect((await health.ping()).ok).toBe(true);
    const down = await health.ping();
    expect(!down.ok && down.error.message).toBe("Postgres ping failed");
  });
});
