import { z } from "zod";
import { type Result, err, ok } from "../core/types/result.js";
import { type ClientError, ClientErrorKind, clientError } from "./types.js";

/** Response shapes, checked before they reach the caller. */

export const httpUserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  createdAt: z.string(),
});

export const httpPostSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  authorId: z.number().int(),
  authorUsername: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const httpAuthSchema = z.object({ token: z.string(), user: httpUserSchema });

export const httpPostListSchema = z.object({
  posts: z.array(httpPostSchema),
  total: z.number().int(),
  limit: z.number().int(),
  offset: z.number().int(),
});

export const httpErrorSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

const decimalId = z
  .string()
  .regex(/^\d+$/, "Expected a decimal id")
  .transform(Number);

export const rpcUserSchema = z.object({
  id: decimalId,
  username: z.string(),
  email: z.string(),
  createdAt: z.string(),
});

export const rpcPostSchema = z
  .object({
    id: decimalId,
    title: z.string(),
    content: z.string(),
    authorId: decimalId,
    authorUsername: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .transform((post) => ({ ...post, authorUsername: post.authorUsername || null }));

export const rpcAuthSchema = z.object({ token: z.string(), user: rpcUserSchema });

export const rpcPostListSchema = z.object({
  posts: z.array(rpcPostSchema),
  totalCount: z.union([z.string(), z.number()]).pipe(z.coerce.number().int()),
  page: z.number().int(),
  pageSize: z.number().int(),
});

/** Parse a response body; a mismatch is the server's fault. */
export const decode = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
): Result<T, ClientError> => {
  const parsed = schema.safeParse(value);
  if (parsed.success) return ok(parsed.data);
  const first = parsed.error.issues[0];
  return err(
    clientError(
      ClientErrorKind.SERVER,
      `Unexpected response: ${first ? `${first.path.join(".")} ${first.message}` : "invalid body"}`,
    ),
  );
};
