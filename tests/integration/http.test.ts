import { describe, expect, it } from "vitest";
import { createTestApp, field } from "../support/fixtures.js";

const BASE = "http://blog.test";

const setup = (env: Record<string, string> = {}) => {
  const app = createTestApp(env);

  const request = (method: string, path: string, options: { token?: string; body?: unknown; headers?: Record<string, string> } = {}) => {
    const headers: Record<string, string> = { ...options.headers };
    if (options.token) headers.authorization = `Bearer ${options.token}`;
    if (options.body !== undefined) headers["content-type"] = "application/json";
    return app.server.fetch(
      new Request(`${BASE}${path}`, {
        method,
        headers,
        body: options.body === undefined ? null : typeof options.body === "string" ? options.body : JSON.stringify(options.body),
      }),
    );
  };

  const register = async (username: string): Promise<string> => {
    const res = await request("POST", "/api/v1/auth/register", {
      body: { username, email: `${username}@example.com`, password: "password123" },
    });
    const body: unknown = await res.json();
    const token = field(body, "token");
    if (typeof token !== "string") throw new Error("register failed");
    return token;
  };

  return { app, request, register };
};

describe("HTTP API", () => {
  describe("health", () => {
    it("answers the shallow probe", async () => {
      const { request } = setup();
      const res = await request("GET", "/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", timestamp: expect.any(String) });
    });

    it("pings the store for readiness", async () => {
      const { request } = setup();
      const res = await request("GET", "/readiness");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ok", version: "test", checks: { database: { status: "ok" } } });
    });
  });

  describe("auth", () => {
    it("registers with 201 and logs in with 200", async () => {
      const { request } = setup();
      const registered = await request("POST", "/api/v1/auth/register", {
        body: { username: "alice", email: "alice@example.com", password: "password123" },
      });
      expect(registered.status).toBe(201);
      expect(await registered.json()).toMatchObject({
        token: expect.any(String),
        user: { id: 1, username: "alice", email: "alice@example.com" },
      });

      const login = await request("POST", "/api/v1/auth/login", {
        body: { email: "alice@example.com", password: "password123" },
      });
      expect(login.status).toBe(200);
    });

    it("rejects a duplicate with 409", async () => {
      const { request, register } = setup();
      await register("alice");
      const res = await request("POST", "/api/v1/auth/register", {
        body: { username: "alice", email: "other@example.com", password: "password123" },
        headers: { "x-request-id": "req-dup" },
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: { code: "USER_ALREADY_EXISTS", message: "User already exists" },
        requestId: "req-dup",
      });
    });

    it("returns field errors with 400", async () => {
      const { request } = setup();
      const res = await request("POST", "/api/v1/auth/register", {
        body: { username: "alice", email: "alice@example.com", password: "short" },
        headers: { "x-request-id": "req-short" },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "VALIDATION",
          message: "password: String must contain at least 8 character(s)",
          details: { formErrors: [], fieldErrors: { password: ["String must contain at least 8 character(s)"] } },
        },
        requestId: "req-short",
      });
    });

    it("gives the same 401 for an unknown email and a wrong password", async () => {
      const { request, register } = setup();
      await register("alice");

      const unknown = await request("POST", "/api/v1/auth/login", {
        body: { email: "nobody@example.com", password: "password123" },
      });
      const wrong = await request("POST", "/api/v1/auth/login", {
        body: { email: "alice@example.com", password: "password124" },
      });

      expect(unknown.status).toBe(401);
      expect(wrong.status).toBe(401);
      const a: unknown = await unknown.json();
      const b: unknown = await wrong.json();
      expect(field(a, "error")).toEqual({ code: "INVALID_CREDENTIALS", message: "Invalid credentials" });
      expect(field(b, "error")).toEqual({ code: "INVALID_CREDENTIALS", message: "Invalid credentials" });
    });
  });

  describe("posts", () => {
    it("runs the full lifecycle with ownership checks", async () => {
      const { request, register } = setup();
      const alice = await register("alice");
      const bob = await register("bob");

      const created = await request("POST", "/api/v1/posts", { token: alice, body: { title: "Hello", content: "World" } });
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ id: 1, title: "Hello", authorId: 1, authorUsername: null });

      const fetched = await request("GET", "/api/v1/posts/1");
      expect(await fetched.json()).toMatchObject({ id: 1, authorUsername: "alice" });

      const hijack = await request("PUT", "/api/v1/posts/1", { token: bob, body: { title: "Mine", content: "now" } });
      expect(hijack.status).toBe(403);

      const updated = await request("PUT", "/api/v1/posts/1", { token: alice, body: { title: "Hello again", content: "v2" } });
      expect(updated.status).toBe(200);
      expect(await updated.json()).toMatchObject({ title: "Hello again", content: "v2", authorUsername: "alice" });

      expect((await request("DELETE", "/api/v1/posts/1", { token: bob })).status).toBe(403);
      const deleted = await request("DELETE", "/api/v1/posts/1", { token: alice });
      expect(deleted.status).toBe(204);
      expect(await deleted.text()).toBe("");

      expect((await request("GET", "/api/v1/posts/1")).status).toBe(404);
      expect((await request("DELETE", "/api/v1/posts/1", { token: alice })).status).toBe(404);
    });

    it("requires a bearer token for writes", async () => {
      const { request } = setup();
      const res = await request("POST", "/api/v1/posts", { body: { title: "t", content: "c" } });
      expect(res.status).toBe(401);
      const body: unknown = await res.json();
      expect(field(body, "error")).toEqual({
        code: "UNAUTHENTICATED",
        message: "Missing Authorization header",
      });
    });

    it("rejects a body that is not JSON", async () => {
      const { request, register } = setup();
      const token = await register("alice");
      const res = await request("POST", "/api/v1/posts", { token, body: "{nope" });
      expect(res.status).toBe(400);
      const body: unknown = await res.json();
      expect(field(body, "error")).toMatchObject({
        code: "VALIDATION",
        message: "Expected object, received null",
      });
    });

    it("rejects a non-numeric id", async () => {
      const { request } = setup();
      const res = await request("GET", "/api/v1/posts/abc");
      expect(res.status).toBe(400);
    });

    it("pages with limit and offset and clamps the limit", async () => {
      const { request, register } = setup();
      const token = await register("alice");
      for (const title of ["a", "b", "c"]) {
        await request("POST", "/api/v1/posts", { token, body: { title, content: "" } });
      }

      const page = await request("GET", "/api/v1/posts?limit=2&offset=1");
      const body: unknown = await page.json();
      expect(body).toMatchObject({ total: 3, limit: 2, offset: 1 });
      expect(field(body, "posts")).toHaveLength(2);

      const clamped = await request("GET", "/api/v1/posts?limit=1000&offset=-4");
      expect(await clamped.json()).toMatchObject({ total: 3, limit: 100, offset: 0 });

      expect((await request("GET", "/api/v1/posts?limit=ten")).status).toBe(400);
    });

    it("answers an offset past the safe integer range with an empty page", async () => {
      const { request, register } = setup();
      const token = await register("alice");
      await request("POST", "/api/v1/posts", { token, body: { title: "only", content: "" } });

      const res = await request("GET", "/api/v1/posts?offset=99999999999999999999");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ posts: [], total: 1, limit: 10, offset: Number.MAX_SAFE_INTEGER });
    });

    it("rejects post ids that are not plain decimals", async () => {
      const { request } = setup();
      for (const id of ["0x10", "1e3", "9007199254740993"]) {
        const res = await request("GET", `/api/v1/posts/${id}`);
        expect(res.status).toBe(400);
        expect(field(await res.json(), "error")).toMatchObject({ code: "VALIDATION" });
      }
    });
  });

  describe("transport", () => {
    it("answers unknown routes with a 404 envelope", async () => {
      const { request } = setup();
      const res = await request("GET", "/api/v1/comments", { headers: { "x-request-id": "req-404" } });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: "NOT_FOUND", message: "GET /api/v1/comments not found" },
        requestId: "req-404",
      });
    });

    it("ignores a trailing slash", async () => {
      const { request } = setup();
      expect((await request("GET", "/api/v1/posts/")).status).toBe(200);
    });

    it("echoes or assigns a request id", async () => {
      const { request } = setup();
      const echoed = await request("GET", "/health", { headers: { "x-request-id": "req-42" } });
      expect(echoed.headers.get("x-request-id")).toBe("req-42");

      const assigned = await request("GET", "/health");
      expect(assigned.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("adds CORS headers for allowed origins only", async () => {
      const { request } = setup({ CORS_ORIGINS: "http://app.test" });
      const allowed = await request("GET", "/health", { headers: { origin: "http://app.test" } });
      expect(allowed.headers.get("access-control-allow-origin")).toBe("http://app.test");

      const foreign = await request("GET", "/health", { headers: { origin: "http://evil.test" } });
      expect(foreign.headers.get("access-control-allow-origin")).toBeNull();

      const preflight = await request("OPTIONS", "/api/v1/posts", { headers: { origin: "http://evil.test" } });
      expect(preflight.status).toBe(403);
    });

    it("limits request rate per client with 429 and Retry-After", async () => {
      const { request } = setup({ RATE_LIMIT_MAX_REQUESTS: "2" });
      expect((await request("GET", "/health")).headers.get("x-ratelimit-remaining")).toBe("1");
      expect((await request("GET", "/health")).status).toBe(200);

      const limited = await request("GET", "/health");
      expect(limited.status).toBe(429);
      expect(limited.headers.get("retry-after")).toBe("60");
      const body: unknown = await limited.json();
      expect(field(body, "error")).toEqual({ code: "RATE_LIMITED", message: "Too many requests" });
    });
  });
});
