import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { stripAnsi } from "../../src/cli/ui.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";

describe("createLogger", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lines = (written: string[]): Record<string, unknown>[] =>
    written.map((line) => JSON.parse(line));

  it("drops entries below the minimum level", () => {
    const log = createLogger("warn", {}, "json");
    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    expect(stdout).toEqual([]);
    expect(lines(stderr).map((l) => l.msg)).toEqual(["shown"]);
  });

  it("routes info to stdout and error to stderr", () => {
    const log = createLogger("debug", {}, "json");
    log.info("hello");
    log.error("boom");

    expect(lines(stdout)[0]).toMatchObject({ level: "info", msg: "hello" });
    expect(lines(stderr)[0]).toMatchObject({ level: "error", msg: "boom" });
  });

  it("merges child bindings and redacts secrets", () => {
    const log = createLogger("info", { service: "auth" }, "json").child({ requestId: "r-1" });
    log.info("login", { email: "a@b.test", password: "hunter2", Token: "abc" });

    const [entry] = lines(stdout);
    expect(entry).toMatchObject({
      service: "auth",
      requestId: "r-1",
      email: "a@b.test",
      password: "[redacted]",
      Token: "[redacted]",
    });
  });

  it("flattens errors in JSON output", () => {
    const log = createLogger("info", {}, "json");
    log.error("failed", { cause: new TypeError("bad input") });
    expect(lines(stderr)[0]?.cause).toEqual({ name: "TypeError", message: "bad input" });
  });

  it("writes pretty lines with the level badge and fields", () => {
    const log = createLogger("info");
    log.info("Post created", { postId: 7 });

    expect(stdout.map(stripAnsi)).toEqual([expect.stringMatching(/^ {2}INF \d{2}:\d{2}:\d{2}\.\d{3} Post created postId=7\n$/)]);
  });
});
