import type { BlogClient } from "../../client/index.js";
import type { AuthSession } from "../../client/types.js";
import { requireFlags } from "../args.js";
import type { TokenStore } from "../token-store.js";
import { type Output, printKeyValue, success } from "../ui.js";
import { describeError } from "./format.js";

const saveSession = async (
  out: Output,
  tokens: TokenStore,
  session: AuthSession,
  heading: string,
): Promise<void> => {
  await tokens.save(session.token);
  success(out, heading);
  printKeyValue(out, [
    ["User ID", String(session.user.id)],
    ["Username", session.user.username],
    ["Email", session.user.email],
  ]);
  out.line(`  Token saved to ${tokens.path}`);
};

export const registerCommand = async (
  client: BlogClient,
  flags: ReadonlyMap<string, string>,
  out: Output,
  tokens: TokenStore,
): Promise<number> => {
  const input = requireFlags(flags, ["username", "email", "password"]);
  if (!input.ok) {
    out.fail(input.error);
    return 2;
  }

  const result = await client.register(input.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  await saveSession(out, tokens, result.value, "Registration successful");
  return 0;
};

export const loginCommand = async (
  client: BlogClient,
  flags: ReadonlyMap<string, string>,
  out: Output,
  tokens: TokenStore,
): Promise<number> => {
  const input = requireFlags(flags, ["email", "password"]);
  if (!input.ok) {
    out.fail(input.error);
    return 2;
  }

  const result = await client.login(input.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  await saveSession(out, tokens, result.value, "Login successful");
  return 0;
};
