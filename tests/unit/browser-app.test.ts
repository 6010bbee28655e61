import { describe, expect, it } from "vitest";
import { TOKEN_KEY, USER_KEY, createBlogApp, createMemoryStorage } from "../../src/client/browser.js";
import { ClientErrorKind } from "../../src/client/types.js";
import { createTestApp, inProcessFetch } from "../support/fixtures.js";

const setup = () => {
  const app = createTestApp();
  const storage = createMemoryStorage();
  const blog = createBlogApp("http://blog.test", storage, inProcessFetch(app.server));
  return { storage, blog };
};

const alice = { username: "alice", email: "alice@example.com", password: "password123" };

describe("browser app", () => {
  it("starts signed out", () => {
    const { blog } = setup();
    expect(blog.isAuthenticated()).toBe(false);
    expect(blog.getCurrentUser()).toBeNull();
  });

  it("keeps the session in storage after registering", async () => {
    const { blog, storage } = setup();
    const session = await blog.register(alice);
    expect(session.ok).toBe(true);
    if (!session.ok) return;

    expect(blog.isAuthenticated()).toBe(true);
    expect(storage.getItem(TOKEN_KEY)).toBe(session.value.token);
    expect(blog.getCurrentUser()).toEqual(session.value.user);
    expect(blog.getCurrentUser()?.username).toBe("alice");
  });

  it("picks the session up from storage in a new app instance", async () => {
    const app = createTestApp();
    const storage = createMemoryStorage();
    const first = createBlogApp("http://blog.test", storage, inProcessFetch(app.server));
    await first.register(alice);

    const reloaded = createBlogApp("http://blog.test", storage, inProcessFetch(app.server));
    const created = await reloaded.createPost({ title: "After reload", content: "still signed in" });
    expect(created.ok && created.value.title).toBe("After reload");

    const posts = await reloaded.loadPosts();
    expect(posts.ok && posts.value.posts.map((p) => p.title)).toEqual(["After reload"]);
  });

  it("drops a stored session the server rejects", async () => {
    const { blog, storage } = setup();
    storage.setItem(TOKEN_KEY, "stale-token");
    storage.setItem(USER_KEY, JSON.stringify({ id: 1, username: "ghost", email: "g@example.com", createdAt: "x" }));

    const result = await blog.createPost({ title: "t", content: "c" });
    expect(!result.ok && result.error.kind).toBe(ClientErrorKind.UNAUTHORIZED);
    expect(blog.isAuthenticated()).toBe(false);
    expect(storage.getItem(USER_KEY)).toBeNull();
  });

  it("ignores a corrupt stored user", () => {
    const { blog, storage } = setup();
    storage.setItem(USER_KEY, "{not json");
    expect(blog.getCurrentUser()).toBeNull();
  });

  it("logs out", async () => {
    const { blog } = setup();
    await blog.register(alice);
    blog.logout();

    expect(blog.isAuthenticated()).toBe(false);
    const result = await blog.deletePost(1);
    expect(!result.ok && result.error.kind).toBe(ClientErrorKind.NO_TOKEN);
  });
});
