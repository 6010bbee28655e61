import type { AuthService } from "../../application/services/auth.service.js";
import type { BlogService } from "../../application/services/blog.service.js";
import type { HealthService } from "../../application/services/health.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import type { PaginationLimits } from "../../core/types/pagination.js";
import type { RequestContext } from "../context.js";
import { authHandlers } from "../handlers/auth.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { postHandlers } from "../handlers/post.handler.js";

/**
 * Static routes use O(1) map lookup.
 * `/api/v1/posts/:id` uses prefix matching.
 */
type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

export interface RouterDeps {
  readonly authService: AuthService;
  readonly blogService: BlogService;
  readonly healthService: HealthService;
  readonly tokenService: TokenService;
  readonly pagination: PaginationLimits;
  readonly logger: Logger;
}

const POST_PREFIX = "/api/v1/posts/";

export const createRouter = (deps: RouterDeps) => {
  const { logger } = deps;
  const health = healthHandler(deps.healthService);
  const auth = authHandlers(deps.authService, logger.child({ layer: "handler", handler: "auth" }));
  const posts = postHandlers(
    deps.blogService,
    deps.tokenService,
    deps.pagination,
    logger.child({ layer: "handler", handler: "post" }),
  );

  const notFound404 = (method: string, path: string, requestId: string): Response => {
    logger.debug("Route not found", { method, path });
    return Response.json(
      { error: { code: "NOT_FOUND", message: `${method} ${path} not found` }, requestId },
      { status: 404 },
    );
  };

  /** Static route table */
  const routes = new Map<string, RouteHandler>([
    // Health: shallow (instant) for probes, deep for readiness
    ["GET /health", async () => health.shallowCheck()],
    ["GET /api/v1/health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],

    // Auth
    ["POST /api/v1/auth/register", auth.register],
    ["POST /api/v1/auth/login", auth.login],

    // Posts
    ["GET /api/v1/posts", posts.list],
    ["POST /api/v1/posts", posts.create],
  ]);

  /** Match /api/v1/posts/:id */
  const matchPost = (method: string, path: string): RouteHandler | null => {
    if (!path.startsWith(POST_PREFIX)) return null;

    const id = path.substring(POST_PREFIX.length);
    if (id.length === 0 || id.includes("/")) return null;

    switch (method) {
      case "GET":
        return (req, ctx) => posts.get(req, ctx, id);
      case "PUT":
        return (req, ctx) => posts.update(req, ctx, id);
      case "DELETE":
        return (req, ctx) => posts.remove(req, ctx, id);
      default:
        return null;
    }
  };

  return {
    handle(req: Request, ctx: RequestContext): Promise<Response> {
      const path = ctx.path.length > 1 && ctx.path.endsWith("/") ? ctx.path.slice(0, -1) : ctx.path;

      const handler = routes.get(`${req.method} ${path}`) ?? matchPost(req.method, path);
      if (handler) return handler(req, ctx);

      return Promise.resolve(notFound404(req.method, path, ctx.requestId));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
