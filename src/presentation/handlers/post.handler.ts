import { listQueryDto, postBodyDto, postIdDto } from "../../application/dtos/post.dto.js";
import type { BlogService } from "../../application/services/blog.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { postId } from "../../core/types/brand.js";
import { type PaginationLimits, normalizeOffsetPage } from "../../core/types/pagination.js";
import type { RequestContext } from "../context.js";
import { authenticate } from "../middleware/auth.js";
import { validateBody, validateJson } from "../middleware/validate.js";
import {
  createdResponse,
  errorResponse,
  jsonResponse,
  noContentResponse,
} from "./response.js";
import { postJson, postListJson } from "./wire.js";

export const postHandlers = (
  blogService: BlogService,
  tokenService: TokenService,
  pagination: PaginationLimits,
  logger: Logger,
) => ({
  create: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = authenticate(req, tokenService);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const validated = await validateJson(req, postBodyDto);
    if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

    const result = await blogService.createPost(auth.value.userId, validated.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId, ctx.logger);

    return createdResponse(postJson(result.value));
  },

  get: async (_req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
    const id = validateBody(postIdDto, rawId);
    if (!id.ok) return errorResponse(id.error, ctx.requestId);

    const result = await blogService.getPost(postId(id.value));
    if (!result.ok) return errorResponse(result.error, ctx.requestId, ctx.logger);

    return jsonResponse(postJson(result.value));
  },

  update: async (req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
    const auth = authenticate(req, tokenService);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const id = validateBody(postIdDto, rawId);
    if (!id.ok) return errorResponse(id.error, ctx.requestId);

    const validated = await validateJson(req, postBodyDto);
    if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

    const result = await blogService.updatePost(postId(id.value), auth.value.userId, validated.value);
    if (!result.ok) {
      logger.warn("Post update rejected", { requestId: ctx.requestId, code: result.error.code });
      return errorResponse(result.error, ctx.requestId, ctx.logger);
    }

    return jsonResponse(postJson(result.value));
  },

  remove: async (req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
    const auth = authenticate(req, tokenService);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const id = validateBody(postIdDto, rawId);
    if (!id.ok) return errorResponse(id.error, ctx.requestId);

    const result = await blogService.deletePost(postId(id.value), auth.value.userId);
    if (!result.ok) {
      logger.warn("Post delete rejected", { requestId: ctx.requestId, code: result.error.code });
      return errorResponse(result.error, ctx.requestId, ctx.logger);
    }

    return noContentResponse();
  },

  list: async (_req: Request, ctx: RequestContext): Promise<Response> => {
    const params = new URLSearchParams(ctx.search);
    const query = validateBody(listQueryDto, {
      limit: params.get("limit") ?? undefined,
      offset: params.get("offset") ?? undefined,
    });
    if (!query.ok) return errorResponse(query.error, ctx.requestId);

    const result = await blogService.listPosts(normalizeOffsetPage(query.value, pagination));
    if (!result.ok) return errorResponse(result.error, ctx.requestId, ctx.logger);

    return jsonResponse(postListJson(result.value));
  },
});
