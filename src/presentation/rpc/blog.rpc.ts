import { type Metadata, type UntypedServiceImplementation, type handleUnaryCall, status } from "@grpc/grpc-js";
import { z } from "zod";
import { loginDto, registerDto } from "../../application/dtos/auth.dto.js";
import { postBodyDto, postIdDto } from "../../application/dtos/post.dto.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { BlogService } from "../../application/services/blog.service.js";
import type { Claims } from "../../core/entities/auth.js";
import { type AppError, GENERIC_SERVER_MESSAGE, isServerError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { postId } from "../../core/types/brand.js";
import { type PaginationLimits, pageToOffset } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { BlogMethod } from "../../shared/proto.js";
import { generateId } from "../../shared/utils/id.js";
import { authenticateBearer } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { authResponseMessage, postMessage } from "./messages.js";
import { type RpcFailure, toRpcFailure } from "./status.js";

/** The part of a grpc-js unary call the handlers read. */
export interface UnaryCallLike {
  readonly request: unknown;
  readonly metadata: Metadata;
}

export type RpcHandler = (call: UnaryCallLike) => Promise<Result<object, RpcFailure>>;

export type BlogRpcHandlers = Readonly<Record<BlogMethod, RpcHandler>>;

const postIdRequest = z.object({ postId: postIdDto });

const updateRequest = postBodyDto.extend({ postId: postIdDto });

const listRequest = z.object({
  page: z.number().int().default(0),
  pageSize: z.number().int().min(0, "page_size must not be negative").default(0),
});

interface Deps {
  readonly authService: AuthService;
  readonly blogService: BlogService;
  readonly tokenService: TokenService;
  readonly pagination: PaginationLimits;
  readonly logger: Logger;
}

/** Reads `authorization: Bearer <token>` from call metadata. */
const bearerFrom = (metadata: Metadata): string | undefined => {
  const [value] = metadata.get("authorization");
  return typeof value === "string" ? value : undefined;
};

export const createBlogRpcHandlers = (deps: Deps): BlogRpcHandlers => {
  const { authService, blogService, tokenService, pagination, logger } = deps;

  const fail = (error: AppError, log: Logger): Result<never, RpcFailure> => {
    if (isServerError(error)) {
      log.error("Request failed", { code: error.code, message: error.message, cause: error.cause });
    }
    return err(toRpcFailure(error));
  };

  const authorize = (call: UnaryCallLike): Result<Claims, AppError> =>
    authenticateBearer(bearerFrom(call.metadata), tokenService);

  /** Scopes a logger to one call and times it. */
  const traced =
    (method: BlogMethod, run: (call: UnaryCallLike, log: Logger) => Promise<Result<object, RpcFailure>>): RpcHandler =>
    async (call) => {
      const log = logger.child({ requestId: generateId(), rpc: method });
      const start = performance.now();
      const result = await run(call, log);
      log.debug("RPC completed", {
        ok: result.ok,
        code: result.ok ? status.OK : result.error.code,
        durationMs: Math.round(performance.now() - start),
      });
      return result;
    };

  return {
    Register: traced(BlogMethod.Register, async (call, log) => {
      const input = validateBody(registerDto, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const result = await authService.register(input.value);
      return result.ok ? ok(authResponseMessage(result.value)) : fail(result.error, log);
    }),

    Login: traced(BlogMethod.Login, async (call, log) => {
      const input = validateBody(loginDto, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const result = await authService.login(input.value);
      return result.ok ? ok(authResponseMessage(result.value)) : fail(result.error, log);
    }),

    CreatePost: traced(BlogMethod.CreatePost, async (call, log) => {
      const auth = authorize(call);
      if (!auth.ok) return err(toRpcFailure(auth.error));

      const input = validateBody(postBodyDto, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const result = await blogService.createPost(auth.value.userId, input.value);
      return result.ok ? ok(postMessage(result.value)) : fail(result.error, log);
    }),

    GetPost: traced(BlogMethod.GetPost, async (call, log) => {
      const input = validateBody(postIdRequest, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const result = await blogService.getPost(postId(input.value.postId));
      return result.ok ? ok(postMessage(result.value)) : fail(result.error, log);
    }),

    UpdatePost: traced(BlogMethod.UpdatePost, async (call, log) => {
      const auth = authorize(call);
      if (!auth.ok) return err(toRpcFailure(auth.error));

      const input = validateBody(updateRequest, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const { postId: id, title, content } = input.value;
      const result = await blogService.updatePost(postId(id), auth.value.userId, { title, content });
      return result.ok ? ok(postMessage(result.value)) : fail(result.error, log);
    }),

    DeletePost: traced(BlogMethod.DeletePost, async (call, log) => {
      const auth = authorize(call);
      if (!auth.ok) return err(toRpcFailure(auth.error));

      const input = validateBody(postIdRequest, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const result = await blogService.deletePost(postId(input.value.postId), auth.value.userId);
      return result.ok ? ok({ success: true, message: "Post deleted" }) : fail(result.error, log);
    }),

    ListPosts: traced(BlogMethod.ListPosts, async (call, log) => {
      const input = validateBody(listRequest, call.request);
      if (!input.ok) return err(toRpcFailure(input.error));

      const { page, limit, offset } = pageToOffset(input.value.page, input.value.pageSize, pagination);
      const result = await blogService.listPosts({ limit, offset });
      if (!result.ok) return fail(result.error, log);

      return ok({
        posts: result.value.items.map(postMessage),
        totalCount: result.value.total,
        page,
        pageSize: limit,
      });
    }),
  };
};

/**
 * Adapt the handlers to grpc-js callbacks. A handler that throws is
 * reported as INTERNAL with the generic message.
 */
export const toServiceImplementation = (
  handlers: BlogRpcHandlers,
  logger: Logger,
): UntypedServiceImplementation => {
  const impl: UntypedServiceImplementation = {};
  for (const name of Object.values(BlogMethod)) {
    const handler = handlers[name];
    const unary: handleUnaryCall<object, object> = (call, callback) => {
      void handler(call).then(
        (result) => {
          if (result.ok) callback(null, result.value);
          else callback({ code: result.error.code, details: result.error.details });
        },
        (cause: unknown) => {
          logger.error("Unhandled RPC failure", { rpc: name, cause });
          callback({ code: status.INTERNAL, details: GENERIC_SERVER_MESSAGE });
        },
      );
    };
    impl[name] = unary;
  }
  return impl;
};
