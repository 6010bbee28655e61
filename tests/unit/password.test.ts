import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { Password } from "../../src/core/entities/password.js";
import { createPasswordHasher } from "../../src/infrastructure/security/password-hasher.js";
import { FAST_ARGON2 } from "../support/fixtures.js";

describe("PasswordHasher (argon2id)", () => {
  const hasher = createPasswordHasher(FAST_ARGON2);

  it("produces a PHC string with the configured parameters", async () => {
    const result = await hasher.hash("correct horse");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.startsWith("$argon2id$v=19$m=1024,t=1,p=1$")).toBe(true);
  });

  it("salts every hash", async () => {
    const a = await hasher.hash("same-password");
    const b = await hasher.hash("same-password");
    expect(a.ok && b.ok).toBe(true);
    if (!a.ok || !b.ok) return;
    expect(a.value).not.toBe(b.value);
  });

  it("verifies the right password only", async () => {
    const hashed = await hasher.hash("secret123");
    if (!hashed.ok) throw new Error("hash failed");
    expect(await hasher.verify("secret123", hashed.value)).toBe(true);
    expect(await hasher.verify("secret124", hashed.value)).toBe(false);
  });

  it("treats a malformed stored hash as a mismatch", async () => {
    expect(await hasher.verify("secret123", "not-a-phc-string")).toBe(false);
  });
});

describe("Password", () => {
  const hasher = createPasswordHasher(FAST_ARGON2);

  it("wraps the hash and verifies against it", async () => {
    const result = await Password.hash("secret123", hasher);
    if (!result.ok) throw new Error("hash failed");
    const password = result.value;

    expect(password.expose().startsWith("$argon2id$")).toBe(true);
    expect(await password.verify("secret123", hasher)).toBe(true);
    expect(await password.verify("wrong", hasher)).toBe(false);
  });

  it("masks itself in every textual form", () => {
    const password = Password.fromHash("$argon2id$v=19$m=1024,t=1,p=1$c2FsdA$aGFzaA");
    expect(String(password)).toBe("Password(********)");
    expect(JSON.stringify({ password })).toBe('{"password":"********"}');
    expect(inspect(password)).toBe("Password(********)");
  });
});
