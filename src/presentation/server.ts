import {
  type IncomingMessage,
  type Server,
  type ServerResponse,
  createServer as createHttpServer,
} from "node:http";
import { GENERIC_SERVER_MESSAGE } from "../core/errors/app-error.js";
import type { Logger } from "../core/ports/logger.js";
import { brand } from "../core/types/brand.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog, formatRejection } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import { errorResponse } from "./handlers/response.js";
import { corsHeaders, handlePreflight } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rate-limit.js";
import type { Router } from "./routes/router.js";

interface ServerDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly router: Router;
}

const MAX_BODY_BYTES = 1_048_576; // 1 MiB

const internalErrorBody = JSON.stringify({
  error: { code: "INTERNAL", message: GENERIC_SERVER_MESSAGE },
});

/** Read the full request body, or null once it passes `limit` bytes. */
const readBody = (incoming: IncomingMessage, limit: number): Promise<Buffer | null> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    incoming.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        resolve(null);
        incoming.resume();
        return;
      }
      chunks.push(chunk);
    });
    incoming.on("end", () => resolve(Buffer.concat(chunks)));
    incoming.on("error", reject);
  });

const toHeaders = (incoming: IncomingMessage): Headers => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incoming.headers)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) headers.append(key, v);
  }
  return headers;
};

/**
 * HTTP transport. `fetch` is the whole pipeline on web Request/Response;
 * `start` puts it behind node:http.
 */
export const createServer = (deps: ServerDeps) => {
  const { config, logger, router } = deps;
  const origins = config.cors.origins;
  const limiter = createRateLimiter(config.rateLimit);

  // ── Batched access log: immediate in development, flushed every 100ms in production ──
  let logBuffer: string[] = [];
  let flushTimer: NodeJS.Timeout | undefined;
  const isDev = config.env !== "production";
  const LOG_FLUSH_INTERVAL_MS = 100;

  const flushLogs = (): void => {
    if (flushTimer) clearTimeout(flushTimer);
    flushTimer = undefined;
    if (logBuffer.length === 0) return;
    const batch = logBuffer;
    logBuffer = [];
    process.stdout.write(batch.join(""));
  };

  const writeLog = (line: string): void => {
    if (isDev) {
      process.stdout.write(line);
      return;
    }
    logBuffer.push(line);
    flushTimer ??= setTimeout(flushLogs, LOG_FLUSH_INTERVAL_MS);
  };

  const shouldLog = config.log.level !== "fatal"; // "fatal" = effectively no access log
  const jsonLog = config.log.format === "json";

  const accessLog = (
    method: string,
    path: string,
    status: number,
    start: number,
    ip: string,
    requestId: string,
  ): void => {
    if (!shouldLog) return;
    const durationMs = Math.round((performance.now() - start) * 100) / 100;
    if (jsonLog) {
      logger.info("request", { method, path, status, durationMs, ip, requestId });
      return;
    }
    writeLog(formatAccessLog({ method, path, status, durationMs, ip, requestId }));
  };

  const handleRequest = async (req: Request, ip = "local"): Promise<Response> => {
    const method = req.method;

    const preflight = handlePreflight(origins, req);
    if (preflight) {
      if (preflight.status === 403 && shouldLog) {
        writeLog(formatRejection("cors", { origin: req.headers.get("origin") ?? "none" }));
      }
      return preflight;
    }

    const url = new URL(req.url);
    const path = url.pathname;
    const requestId = req.headers.get("x-request-id") ?? generateId();
    const startTime = performance.now();

    const limit = limiter.check(ip);
    if (!limit.ok) {
      if (shouldLog) writeLog(formatRejection("rate-limit", { ip, hits: limit.error.hits }));
      const response = errorResponse(limit.error, requestId);
      response.headers.set("X-Request-Id", requestId);
      const retryAfter = Math.max(1, Math.ceil((limit.error.resetAt - Date.now()) / 1000));
      response.headers.set("Retry-After", String(retryAfter));
      accessLog(method, path, 429, startTime, ip, requestId);
      return response;
    }

    const ctx: RequestContext = {
      requestId: brand<string, "RequestId">(requestId),
      path,
      search: url.search.slice(1),
      logger: logger.child({ requestId }),
    };

    let response: Response;
    try {
      response = await router.handle(req, ctx);
    } catch (e: unknown) {
      logger.error("Unhandled error", {
        requestId,
        error: e instanceof Error ? e.message : String(e),
      });
      response = Response.json(
        { error: { code: "INTERNAL", message: GENERIC_SERVER_MESSAGE }, requestId },
        { status: 500 },
      );
    }

    // ── Cross-cutting headers ──
    response.headers.set("X-Request-Id", requestId);
    for (const [k, v] of Object.entries(limiter.headers(limit.value))) response.headers.set(k, v);
    const cors = corsHeaders(origins, req.headers.get("origin"));
    if (cors) {
      for (const [k, v] of Object.entries(cors)) response.headers.set(k, v);
    }

    accessLog(method, path, response.status, startTime, ip, requestId);
    return response;
  };

  /** node:http ⇄ fetch bridge */
  const bridge = async (incoming: IncomingMessage, outgoing: ServerResponse): Promise<void> => {
    const body = await readBody(incoming, MAX_BODY_BYTES);
    if (body === null) {
      outgoing.writeHead(413, { "Content-Type": "application/json" });
      outgoing.end(JSON.stringify({ error: { code: "VALIDATION", message: "Request body too large" } }));
      return;
    }

    const method = incoming.method ?? "GET";
    const host = incoming.headers.host ?? `${config.http.host}:${config.http.port}`;
    const request = new Request(`http://${host}${incoming.url ?? "/"}`, {
      method,
      headers: toHeaders(incoming),
      body: method === "GET" || method === "HEAD" || body.length === 0 ? null : body,
    });

    const response = await handleRequest(request, incoming.socket.remoteAddress ?? "unknown");
    const payload = Buffer.from(await response.arrayBuffer());
    response.headers.forEach((value, key) => outgoing.setHeader(key, value));
    outgoing.writeHead(response.status);
    outgoing.end(payload);
  };

  let server: Server | undefined;

  return {
    fetch: handleRequest,

    start(): Promise<Server> {
      const instance = createHttpServer((incoming, outgoing) => {
        bridge(incoming, outgoing).catch((e: unknown) => {
          logger.error("HTTP bridge failure", { error: e instanceof Error ? e.message : String(e) });
          if (!outgoing.headersSent) outgoing.writeHead(500, { "Content-Type": "application/json" });
          outgoing.end(internalErrorBody);
        });
      });
      instance.requestTimeout = 30_000;
      server = instance;

      return new Promise((resolve, reject) => {
        instance.once("error", reject);
        instance.listen(config.http.port, config.http.host, () => {
          instance.off("error", reject);
          resolve(instance);
        });
      });
    },

    stop(): Promise<void> {
      flushLogs();
      const instance = server;
      if (!instance) return Promise.resolve();
      server = undefined;
      return new Promise((resolve, reject) => {
        instance.close((e) => (e ? reject(e) : resolve()));
        instance.closeAllConnections();
      });
    },

    /** Force-flush any buffered access logs (call before exit) */
    flush: flushLogs,
  };
};

export type HttpServer = ReturnType<typeof createServer>;
