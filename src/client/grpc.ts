import {
  Metadata,
  type ServiceError,
  credentials,
  makeGenericClientConstructor,
  status,
} from "@grpc/grpc-js";
import { offsetToPage } from "../core/types/pagination.js";
import { type Result, err, ok } from "../core/types/result.js";
import { BlogMethod, blogMethod, loadBlogService } from "../shared/proto.js";
import { type ClientError, ClientErrorKind, type Transport, clientError } from "./types.js";
import { decode, rpcAuthSchema, rpcPostListSchema, rpcPostSchema } from "./wire.js";

export interface RpcCallError {
  readonly code: status;
  readonly details: string;
}

/**
 * Sends one unary call. The network caller below is the real one; tests
 * plug in a caller that invokes the service handlers in process.
 */
export interface RpcCaller {
  call(method: BlogMethod, request: object, metadata: Metadata): Promise<Result<unknown, RpcCallError>>;
  close(): void;
}

export interface GrpcTransportOptions {
  readonly endpoint: string;
  readonly caller?: RpcCaller | undefined;
  /** Per-call deadline. */
  readonly timeoutMs?: number | undefined;
}

/** gRPC status to client error kind. */
export const kindForRpcStatus = (code: status): ClientErrorKind => {
  switch (code) {
    case status.NOT_FOUND:
      return ClientErrorKind.NOT_FOUND;
    case status.UNAUTHENTICATED:
      return ClientErrorKind.UNAUTHORIZED;
    case status.PERMISSION_DENIED:
      return ClientErrorKind.FORBIDDEN;
    case status.ALREADY_EXISTS:
      return ClientErrorKind.CONFLICT;
    case status.INVALID_ARGUMENT:
      return ClientErrorKind.INVALID_REQUEST;
    case status.RESOURCE_EXHAUSTED:
      return ClientErrorKind.RATE_LIMITED;
    case status.UNAVAILABLE:
    case status.DEADLINE_EXCEEDED:
    case status.CANCELLED:
      return ClientErrorKind.TRANSPORT;
    default:
      return ClientErrorKind.SERVER;
  }
};

/** Accepts `host:port` or `http://host:port`. */
export const toGrpcTarget = (endpoint: string): string => endpoint.replace(/^[a-z]+:\/\//i, "").replace(/\/+$/, "");

export const createNetworkCaller = (endpoint: string, timeoutMs = 10_000): RpcCaller => {
  const ClientCtor = makeGenericClientConstructor(loadBlogService(), "blog.BlogService");
  const client = new ClientCtor(toGrpcTarget(endpoint), credentials.createInsecure());

  return {
    call: (name, request, metadata) =>
      new Promise((resolve) => {
        const method = blogMethod(name);
        client.makeUnaryRequest(
          method.path,
          method.requestSerialize,
          method.responseDeserialize,
          request,
          metadata,
          { deadline: Date.now() + timeoutMs },
          (error: ServiceError | null, value?: object) => {
            if (error) resolve(err({ code: error.code, details: error.details }));
            else resolve(ok(value));
          },
        );
      }),
    close: () => client.close(),
  };
};

const authMetadata = (token?: string): Metadata => {
  const metadata = new Metadata();
  if (token) metadata.set("authorization", `Bearer ${token}`);
  return metadata;
};

/** gRPC transport for `blog.BlogService`. */
export const createGrpcTransport = (options: GrpcTransportOptions): Transport => {
  const caller = options.caller ?? createNetworkCaller(options.endpoint, options.timeoutMs);

  const invoke = async (
    method: BlogMethod,
    request: object,
    token?: string,
  ): Promise<Result<unknown, ClientError>> => {
    const result = await caller.call(method, request, authMetadata(token));
    if (result.ok) return result;
    return err(clientError(kindForRpcStatus(result.error.code), result.error.details));
  };

  return {
    register: async (input) => {
      const res = await invoke(BlogMethod.Register, input);
      return res.ok ? decode(rpcAuthSchema, res.value) : res;
    },

    login: async (input) => {
      const res = await invoke(BlogMethod.Login, input);
      return res.ok ? decode(rpcAuthSchema, res.value) : res;
    },

    createPost: async (token, input) => {
      const res = await invoke(BlogMethod.CreatePost, input, token);
      return res.ok ? decode(rpcPostSchema, res.value) : res;
    },

    getPost: async (id) => {
      const res = await invoke(BlogMethod.GetPost, { postId: String(id) });
      return res.ok ? decode(rpcPostSchema, res.value) : res;
    },

    updatePost: async (token, id, input) => {
      const res = await invoke(BlogMethod.UpdatePost, { postId: String(id), ...input }, token);
      return res.ok ? decode(rpcPostSchema, res.value) : res;
    },

    deletePost: async (token, id) => {
      const res = await invoke(BlogMethod.DeletePost, { postId: String(id) }, token);
      return res.ok ? ok(undefined) : res;
    },

    listPosts: async (limit, offset) => {
      const { page, pageSize } = offsetToPage({ limit, offset });
      const res = await invoke(BlogMethod.ListPosts, { page, pageSize });
      if (!res.ok) return res;

      const list = decode(rpcPostListSchema, res.value);
      if (!list.ok) return list;
      const { posts, totalCount, page: served, pageSize: size } = list.value;
      return ok({ posts, total: totalCount, limit: size, offset: (served - 1) * size });
    },

    close: () => caller.close(),
  };
};
