import { z } from "zod";

/** Shared by create and update: both replace title and content whole. */
export const postBodyDto = z.object({
  title: z.string().trim().min(1, "Title must not be empty").max(200),
  content: z.string().max(50_000),
});

/** Positive id as it arrives on the wire: a decimal string within the safe integer range. */
export const postIdDto = z
  .string({ invalid_type_error: "Post id must be a string" })
  .regex(/^\d+$/, "Post id must be a decimal integer")
  .transform(Number)
  .pipe(z.number().int().positive().safe());

const queryInt = z
  .string()
  .regex(/^-?\d+$/, "Expected an integer")
  .transform(Number)
  .optional();

/** `?limit=&offset=` before clamping. */
export const listQueryDto = z.object({
  limit: queryInt,
  offset: queryInt,
});

export type PostBodyDto = z.infer<typeof postBodyDto>;
export type ListQueryDto = z.infer<typeof listQueryDto>;
