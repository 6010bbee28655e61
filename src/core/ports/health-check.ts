import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/** Port: anything the readiness probe can ping. */
export interface HealthCheck {
  ping(): Promise<Result<void, AppError>>;
}
