import "dotenv/config";
import { createAuthService } from "./application/services/auth.service.js";
import { createBlogService } from "./application/services/blog.service.js";
import { createHealthService } from "./application/services/health.service.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { openStore } from "./infrastructure/database/store.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createPasswordHasher } from "./infrastructure/security/password-hasher.js";
import { createJwtService } from "./infrastructure/security/token-service.js";
import { createRouter } from "./presentation/routes/router.js";
import { createBlogRpcHandlers } from "./presentation/rpc/blog.rpc.js";
import { createRpcServer } from "./presentation/rpc/server.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

const VERSION = "0.1.0";

/**
 * Bootstrap: compose the dependency graph, then start both servers.
 * Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async (): Promise<void> => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Infrastructure
  const logger = createLogger(config.log.level, {}, config.log.format);
  const passwordHasher = createPasswordHasher(config.argon2);
  const tokenService = createJwtService(config.jwt);

  // 3. Store: opened and migrated before anything listens
  const store = await openStore(config.database, logger.child({ component: "store" }));
  logger.info("Store ready", { driver: store.driver });

  // 4. Application services
  const authService = createAuthService({
    userRepo: store.users,
    passwordHasher,
    tokenService,
    logger: logger.child({ service: "auth" }),
  });

  const blogService = createBlogService({
    postRepo: store.posts,
    logger: logger.child({ service: "blog" }),
  });

  const healthService = createHealthService({
    logger: logger.child({ service: "health" }),
    version: VERSION,
    components: { database: store.health },
  });

  // 5. Presentation: HTTP and gRPC share the services
  const router = createRouter({
    authService,
    blogService,
    healthService,
    tokenService,
    pagination: config.pagination,
    logger,
  });
  const http = createServer({ config, logger, router });

  const rpc = createRpcServer({
    host: config.grpc.host,
    port: config.grpc.port,
    handlers: createBlogRpcHandlers({
      authService,
      blogService,
      tokenService,
      pagination: config.pagination,
      logger: logger.child({ transport: "grpc" }),
    }),
    logger,
  });

  // 6. Start
  await Promise.all([http.start(), rpc.start()]);

  printStartupBanner({
    config,
    version: VERSION,
    driver: store.driver,
    bootTimeMs: performance.now() - bootStart,
  });

  // 7. Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    printShutdown(signal);
    await Promise.allSettled([http.stop(), rpc.stop()]);
    http.flush();
    await store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // 8. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Startup failed: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
  process.exit(1);
});
