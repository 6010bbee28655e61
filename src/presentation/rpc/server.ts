import { Server, ServerCredentials } from "@grpc/grpc-js";
import type { Logger } from "../../core/ports/logger.js";
import { loadBlogService } from "../../shared/proto.js";
import { type BlogRpcHandlers, toServiceImplementation } from "./blog.rpc.js";

export interface RpcServerOptions {
  readonly host: string;
  readonly port: number;
  readonly handlers: BlogRpcHandlers;
  readonly logger: Logger;
}

export interface RpcServer {
  /** Binds and starts serving; resolves to the bound port. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

/** Plaintext gRPC server exposing `blog.BlogService`. */
export const createRpcServer = (options: RpcServerOptions): RpcServer => {
  const { host, port, handlers, logger } = options;
  const server = new Server();
  server.addService(loadBlogService(), toServiceImplementation(handlers, logger));

  return {
    start: () =>
      new Promise((resolve, reject) => {
        server.bindAsync(`${host}:${port}`, ServerCredentials.createInsecure(), (error, bound) => {
          if (error) {
            reject(error);
            return;
          }
          logger.info("gRPC server listening", { host, port: bound });
          resolve(bound);
        });
      }),

    stop: () =>
      new Promise((resolve) => {
        server.tryShutdown((error) => {
          if (error) {
            logger.warn("gRPC graceful shutdown failed, forcing", { error: error.message });
            server.forceShutdown();
          }
          resolve();
        });
      }),
  };
};
