import { describe, expect, it, vi } from "vitest";
import { createBlogService } from "../../src/application/services/blog.service.js";
import { ErrorCode, databaseError } from "../../src/core/errors/app-error.js";
import type { PostRepository } from "../../src/core/ports/post.repository.js";
import { postId, userId } from "../../src/core/types/brand.js";
import { err, ok } from "../../src/core/types/result.js";
import { createInMemoryPostRepository } from "../../src/infrastructure/database/in-memory-post.repository.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { createInMemoryStore } from "../../src/infrastructure/database/store.js";
import { quietLogger } from "../support/fixtures.js";

const setup = async () => {
  const store = createInMemoryStore();
  const alice = await store.users.create({ username: "alice", email: "alice@example.com", passwordHash: "x" });
  const bob = await store.users.create({ username: "bob", email: "bob@example.com", passwordHash: "x" });
  if (!alice.ok || !bob.ok) throw new Error("seed failed");
  const service = createBlogService({ postRepo: store.posts, logger: quietLogger });
  return { store, service, alice: alice.value.id, bob: bob.value.id };
};

describe("BlogService", () => {
  it("creates a post owned by the caller", async () => {
    const { service, alice } = await setup();
    const result = await service.createPost(alice, { title: "Hello", content: "First post" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.authorId).toBe(alice);
    expect(result.value.title).toBe("Hello");
    expect(result.value.createdAt).toBe(result.value.updatedAt);
  });

  it("returns the post with its author's username", async () => {
    const { service, alice } = await setup();
    const created = await service.createPost(alice, { title: "Hello", content: "" });
    if (!created.ok) throw new Error("create failed");

    const found = await service.getPost(created.value.id);
    expect(found.ok && found.value.authorUsername).toBe("alice");
  });

  it("reports a missing post as POST_NOT_FOUND", async () => {
    const { service } = await setup();
    const result = await service.getPost(postId(999));
    expect(!result.ok && result.error.code).toBe(ErrorCode.POST_NOT_FOUND);
  });

  it("lets the author update and delete", async () => {
    const { service, alice } = await setup();
    const created = await service.createPost(alice, { title: "Draft", content: "v1" });
    if (!created.ok) throw new Error("create failed");

    const updated = await service.updatePost(created.value.id, alice, { title: "Final", content: "v2" });
    expect(updated.ok).toBe(true);
    if (updated.ok) {
      expect(updated.value.title).toBe("Final");
      expect(updated.value.content).toBe("v2");
      expect(updated.value.authorUsername).toBe("alice");
    }

    expect(await service.deletePost(created.value.id, alice)).toEqual({ ok: true, value: undefined });
    const gone = await service.getPost(created.value.id);
    expect(!gone.ok && gone.error.code).toBe(ErrorCode.POST_NOT_FOUND);
  });

  it("moves updatedAt forward on update and keeps createdAt", async () => {
    let clock = 1_700_000_000_000;
    const users = createInMemoryUserRepository();
    const service = createBlogService({
      postRepo: createInMemoryPostRepository(users, () => clock),
      logger: quietLogger,
    });
    const alice = await users.create({ username: "alice", email: "alice@example.com", passwordHash: "x" });
    if (!alice.ok) throw new Error("seed failed");

    const created = await service.createPost(alice.value.id, { title: "Draft", content: "v1" });
    if (!created.ok) throw new Error("create failed");

    clock += 1;
    const updated = await service.updatePost(created.value.id, alice.value.id, { title: "Final", content: "v2" });
    if (!updated.ok) throw new Error("update failed");
    expect(updated.value.createdAt).toBe(1_700_000_000_000);
    expect(updated.value.updatedAt).toBe(1_700_000_000_001);
    expect(updated.value.updatedAt).toBeGreaterThan(created.value.updatedAt);
  });

  it("forbids other users and leaves the post unchanged", async () => {
    const { service, alice, bob } = await setup();
    const created = await service.createPost(alice, { title: "Mine", content: "keep out" });
    if (!created.ok) throw new Error("create failed");

    const update = await service.updatePost(created.value.id, bob, { title: "Hacked", content: "" });
    expect(update).toEqual({
      ok: false,
      error: { code: ErrorCode.FORBIDDEN, message: "You can only modify your own posts" },
    });

    const remove = await service.deletePost(created.value.id, bob);
    expect(!remove.ok && remove.error.code).toBe(ErrorCode.FORBIDDEN);

    const still = await service.getPost(created.value.id);
    expect(still.ok && still.value.title).toBe("Mine");
  });

  it("reports update and delete of a missing post as POST_NOT_FOUND", async () => {
    const { service, alice } = await setup();
    const update = await service.updatePost(postId(42), alice, { title: "x", content: "" });
    expect(!update.ok && update.error.code).toBe(ErrorCode.POST_NOT_FOUND);
    const remove = await service.deletePost(postId(42), alice);
    expect(!remove.ok && remove.error.code).toBe(ErrorCode.POST_NOT_FOUND);
  });

  it("classifies only after the conditional write misses", async () => {
    const { store, service, alice } = await setup();
    const created = await service.createPost(alice, { title: "t", content: "c" });
    if (!created.ok) throw new Error("create failed");

    const findById = vi.spyOn(store.posts, "findById");
    await service.updatePost(created.value.id, alice, { title: "t2", content: "c2" });
    expect(findById).not.toHaveBeenCalled();
  });

  it("reports POST_NOT_FOUND when the post vanishes between write and classification", async () => {
    const { store } = await setup();
    // The conditional delete misses, and by the time of the read the post is gone.
    const racing: PostRepository = {
      ...store.posts,
      deleteByAuthor: async () => ok(false),
      findById: async () => ok(null),
    };
    const service = createBlogService({ postRepo: racing, logger: quietLogger });

    const result = await service.deletePost(postId(1), userId(2));
    expect(!result.ok && result.error.code).toBe(ErrorCode.POST_NOT_FOUND);
  });

  it("lists newest first with a total", async () => {
    const { service, alice, bob } = await setup();
    for (const [author, title] of [[alice, "one"], [bob, "two"], [alice, "three"]] as const) {
      await service.createPost(author, { title, content: "" });
    }

    const page = await service.listPosts({ limit: 2, offset: 0 });
    expect(page.ok).toBe(true);
    if (!page.ok) return;
    expect(page.value.total).toBe(3);
    expect(page.value.limit).toBe(2);
    expect(page.value.offset).toBe(0);
    expect(page.value.items.map((p) => p.title)).toEqual(["three", "two"]);
    expect(page.value.items.map((p) => p.authorUsername)).toEqual(["alice", "bob"]);

    const rest = await service.listPosts({ limit: 2, offset: 2 });
    expect(rest.ok && rest.value.items.map((p) => p.title)).toEqual(["one"]);
  });

  it("surfaces a failing count as a database error", async () => {
    const { store } = await setup();
    const failing: PostRepository = { ...store.posts, count: async () => err(databaseError("count failed")) };
    const service = createBlogService({ postRepo: failing, logger: quietLogger });

    const result = await service.listPosts({ limit: 10, offset: 0 });
    expect(!result.ok && result.error.code).toBe(ErrorCode.DATABASE);
  });
});
