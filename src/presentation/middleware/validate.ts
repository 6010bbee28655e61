import type { ZodType, ZodTypeDef } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate unknown input against a Zod schema.
 * Returns a typed Result and never throws.
 */
export const validateBody = <T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): Result<T, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.flatten();
    const first = result.error.issues[0];
    const message = first
      ? `${first.path.length > 0 ? `${first.path.join(".")}: ` : ""}${first.message}`
      : "Validation failed";
    return err(
      validation({ formErrors: issues.formErrors, fieldErrors: issues.fieldErrors }, message),
    );
  }
  return ok(result.data);
};

/** Parse a JSON request body and validate it. A body that is not JSON validates as `null`. */
export const validateJson = async <T>(
  req: Request,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<Result<T, AppError>> => validateBody(schema, await req.json().catch(() => null));
