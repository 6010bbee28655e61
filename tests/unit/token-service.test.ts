import { describe, expect, it } from "vitest";
import { userId } from "../../src/core/types/brand.js";
import { createJwtService, parseDuration } from "../../src/infrastructure/security/token-service.js";
import { TEST_SECRET } from "../support/fixtures.js";

describe("parseDuration", () => {
  it("converts units to seconds", () => {
    expect(parseDuration("45s")).toBe(45);
    expect(parseDuration("30m")).toBe(1800);
    expect(parseDuration("24h")).toBe(86_400);
    expect(parseDuration("7d")).toBe(604_800);
  });

  it("rejects unknown formats", () => {
    expect(() => parseDuration("1w")).toThrow("Invalid duration format: 1w");
  });
});

describe("JwtService", () => {
  let clock = 1_700_000_000;
  const service = createJwtService({ secret: TEST_SECRET, expiresIn: "24h", now: () => clock });

  it("round-trips the claims", () => {
    clock = 1_700_000_000;
    const token = service.generateToken(userId(42), "alice");
    if (!token.ok) throw new Error("sign failed");

    const claims = service.verifyToken(token.value);
    expect(claims).toEqual({
      ok: true,
      value: { userId: 42, username: "alice", issuedAt: 1_700_000_000, expiresAt: 1_700_086_400 },
    });
  });

  it("puts HS256 in the header and the id in sub as a string", () => {
    clock = 1_700_000_000;
    const token = service.generateToken(userId(7), "bob");
    if (!token.ok) throw new Error("sign failed");

    const [header, body] = token.value.split(".");
    expect(JSON.parse(Buffer.from(header ?? "", "base64url").toString())).toEqual({ alg: "HS256", typ: "JWT" });
    expect(JSON.parse(Buffer.from(body ?? "", "base64url").toString())).toEqual({
      sub: "7",
      username: "bob",
      iat: 1_700_000_000,
      exp: 1_700_086_400,
    });
  });

  it("accepts a token at its expiry second and rejects it after", () => {
    clock = 1_700_000_000;
    const token = service.generateToken(userId(1), "alice");
    if (!token.ok) throw new Error("sign failed");

    clock = 1_700_086_400;
    expect(service.verifyToken(token.value).ok).toBe(true);

    clock = 1_700_086_401;
    const expired = service.verifyToken(token.value);
    expect(expired.ok).toBe(false);
    if (!expired.ok) expect(expired.error.message).toBe("Token expired");
  });

  it("rejects a token signed with another secret", () => {
    clock = 1_700_000_000;
    const other = createJwtService({ secret: "another-test-secret-another-test-secret", expiresIn: "1h", now: () => clock });
    const token = other.generateToken(userId(1), "alice");
    if (!token.ok) throw new Error("sign failed");

    const result = service.verifyToken(token.value);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid token signature");
  });

  it("rejects a tampered payload", () => {
    clock = 1_700_000_000;
    const token = service.generateToken(userId(1), "alice");
    if (!token.ok) throw new Error("sign failed");

    const [header, , signature] = token.value.split(".");
    const forged = Buffer.from(
      JSON.stringify({ sub: "2", username: "mallory", iat: clock, exp: clock + 60 }),
    ).toString("base64url");
    const result = service.verifyToken(`${header}.${forged}.${signature}`);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid token signature");
  });

  it("rejects malformed tokens and foreign algorithms", () => {
    const malformed = service.verifyToken("invalid.token");
    expect(malformed.ok).toBe(false);
    if (!malformed.ok) expect(malformed.error.message).toBe("Malformed token");

    const none = Buffer.from(JSON.stringify({ alg: "none" })).toString("base64url");
    const unsigned = service.verifyToken(`${none}.e30.`);
    expect(unsigned.ok).toBe(false);
    if (!unsigned.ok) expect(unsigned.error.message).toBe("Unsupported token header");
  });
});
