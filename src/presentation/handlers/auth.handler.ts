import { loginDto, registerDto } from "../../application/dtos/auth.dto.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { validateJson } from "../middleware/validate.js";
import { createdResponse, errorResponse, jsonResponse } from "./response.js";
import { authJson } from "./wire.js";

/**
 * `POST /api/v1/auth/register` answers 201, `POST /api/v1/auth/login` 200;
 * both return `{ token, user }`.
 */
export const authHandlers = (authService: AuthService, logger: Logger) => {
  const rejected = (action: string, error: AppError, ctx: RequestContext): Response => {
    logger.warn(`${action} rejected`, { requestId: ctx.requestId, code: error.code });
    return errorResponse(error, ctx.requestId, ctx.logger);
  };

  return {
    register: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const input = await validateJson(req, registerDto);
      if (!input.ok) return rejected("Registration", input.error, ctx);

      const result = await authService.register(input.value);
      return result.ok ? createdResponse(authJson(result.value)) : rejected("Registration", result.error, ctx);
    },

    login: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const input = await validateJson(req, loginDto);
      if (!input.ok) return rejected("Login", input.error, ctx);

      const result = await authService.login(input.value);
      return result.ok ? jsonResponse(authJson(result.value)) : rejected("Login", result.error, ctx);
    },
  };
};
