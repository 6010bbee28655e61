import type { BlogClient } from "../../client/index.js";
import { intFlag, requireFlags } from "../args.js";
import { type Output, section, success } from "../ui.js";
import { describeError, printPost } from "./format.js";

type Flags = ReadonlyMap<string, string>;

/** Exit codes: 0 ok, 1 request failed, 2 bad usage. */

export const createCommand = async (client: BlogClient, flags: Flags, out: Output): Promise<number> => {
  const input = requireFlags(flags, ["title", "content"]);
  if (!input.ok) {
    out.fail(input.error);
    return 2;
  }

  const result = await client.createPost(input.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  success(out, "Post created");
  printPost(out, result.value);
  return 0;
};

export const getCommand = async (client: BlogClient, flags: Flags, out: Output): Promise<number> => {
  const id = intFlag(flags, "id");
  if (!id.ok) {
    out.fail(id.error);
    return 2;
  }

  const result = await client.getPost(id.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  printPost(out, result.value);
  return 0;
};

export const updateCommand = async (client: BlogClient, flags: Flags, out: Output): Promise<number> => {
  const id = intFlag(flags, "id");
  if (!id.ok) {
    out.fail(id.error);
    return 2;
  }
  const input = requireFlags(flags, ["title", "content"]);
  if (!input.ok) {
    out.fail(input.error);
    return 2;
  }

  const result = await client.updatePost(id.value, input.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  success(out, "Post updated");
  printPost(out, result.value);
  return 0;
};

export const deleteCommand = async (client: BlogClient, flags: Flags, out: Output): Promise<number> => {
  const id = intFlag(flags, "id");
  if (!id.ok) {
    out.fail(id.error);
    return 2;
  }

  const result = await client.deletePost(id.value);
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  success(out, `Post ${id.value} deleted`);
  return 0;
};

export const listCommand = async (client: BlogClient, flags: Flags, out: Output): Promise<number> => {
  const limit = intFlag(flags, "limit", 10);
  if (!limit.ok) {
    out.fail(limit.error);
    return 2;
  }
  const offset = intFlag(flags, "offset", 0);
  if (!offset.ok) {
    out.fail(offset.error);
    return 2;
  }

  const result = await client.listPosts({ limit: limit.value, offset: offset.value });
  if (!result.ok) {
    out.fail(describeError(result.error));
    return 1;
  }

  const { posts, total, offset: served } = result.value;
  const end = Math.min(served + posts.length, total);
  section(out, `Posts (${served + 1}-${end} of ${total})`);
  for (const post of posts) {
    out.line(`  [${post.id}] ${post.title} (by ${post.authorUsername ?? "unknown"})`);
  }
  if (posts.length === 0) out.line("  No posts found.");
  return 0;
};
