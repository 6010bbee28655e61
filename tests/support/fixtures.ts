import { Metadata } from "@grpc/grpc-js";
import { type AuthService, createAuthService } from "../../src/application/services/auth.service.js";
import { type BlogService, createBlogService } from "../../src/application/services/blog.service.js";
import { createHealthService } from "../../src/application/services/health.service.js";
import type { RpcCaller } from "../../src/client/grpc.js";
import type { TokenService } from "../../src/core/ports/token-service.js";
import { err, ok } from "../../src/core/types/result.js";
import { type AppConfig, parseConfig } from "../../src/infrastructure/config/config.js";
import { type Store, createInMemoryStore } from "../../src/infrastructure/database/store.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import {
  type Argon2Params,
  createPasswordHasher,
} from "../../src/infrastructure/security/password-hasher.js";
import { createJwtService } from "../../src/infrastructure/security/token-service.js";
import { createRouter } from "../../src/presentation/routes/router.js";
import {
  type BlogRpcHandlers,
  createBlogRpcHandlers,
} from "../../src/presentation/rpc/blog.rpc.js";
import { type HttpServer, createServer } from "../../src/presentation/server.js";
import { type BlogMethod, blogMethod } from "../../src/shared/proto.js";

export const TEST_SECRET = "test-secret-test-secret-test-secret";

/** Cheapest Argon2id settings the binding accepts. */
export const FAST_ARGON2: Argon2Params = { memoryCost: 1024, timeCost: 1, parallelism: 1 };

export const quietLogger = createLogger("fatal");

export const testConfig = (env: Record<string, string> = {}): AppConfig => {
  const parsed = parseConfig({
    NODE_ENV: "test",
    JWT_SECRET: TEST_SECRET,
    LOG_LEVEL: "fatal",
    DATABASE_DRIVER: "memory",
    ...env,
  });
  if (!parsed.ok) throw new Error(`Invalid test config: ${JSON.stringify(parsed.error)}`);
  return parsed.value;
};

export interface TestApp {
  readonly config: AppConfig;
  readonly store: Store;
  readonly tokenService: TokenService;
  readonly authService: AuthService;
  readonly blogService: BlogService;
  readonly server: HttpServer;
  readonly rpc: BlogRpcHandlers;
}

/** Full service graph over the in-memory store, no sockets. */
export const createTestApp = (env: Record<string, string> = {}): TestApp => {
  const config = testConfig(env);
  const store = createInMemoryStore();
  const tokenService = createJwtService(config.jwt);
  const authService = createAuthService({
    userRepo: store.users,
    passwordHasher: createPasswordHasher(FAST_ARGON2),
    tokenService,
    logger: quietLogger,
  });
  const blogService = createBlogService({ postRepo: store.posts, logger: quietLogger });
  const healthService = createHealthService({
    logger: quietLogger,
    version: "test",
    components: { database: store.health },
  });
  const router = createRouter({
    authService,
    blogService,
    healthService,
    tokenService,
    pagination: config.pagination,
    logger: quietLogger,
  });
  const rpc = createBlogRpcHandlers({
    authService,
    blogService,
    tokenService,
    pagination: config.pagination,
    logger: quietLogger,
  });

  return {
    config,
    store,
    tokenService,
    authService,
    blogService,
    server: createServer({ config, logger: quietLogger, router }),
    rpc,
  };
};

/** `fetch` stand-in that hands requests straight to the server pipeline. */
export const inProcessFetch =
  (server: HttpServer) =>
  (input: string, init?: RequestInit): Promise<Response> =>
    server.fetch(new Request(input, init));

/**
 * RPC caller that runs messages through the proto codecs and the service
 * handlers without opening a port.
 */
export const inProcessCaller = (handlers: BlogRpcHandlers): RpcCaller => ({
  async call(name: BlogMethod, request: object, metadata: Metadata) {
    const method = blogMethod(name);
    const decoded = method.requestDeserialize(method.requestSerialize(request));
    const result = await handlers[name]({ request: decoded, metadata });
    if (!result.ok) return err(result.error);
    return ok(method.responseDeserialize(method.responseSerialize(result.value)));
  },
  close: () => {},
});

/** Metadata carrying a bearer token, as a client would send it. */
export const bearer = (token: string): Metadata => {
  const metadata = new Metadata();
  metadata.set("authorization", `Bearer ${token}`);
  return metadata;
};

/** Reads one property of a decoded body without asserting its shape. */
export const field = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
