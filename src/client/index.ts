import { type Result, err } from "../core/types/result.js";
import { type FetchLike, createHttpTransport } from "./http.js";
import { type RpcCaller, createGrpcTransport } from "./grpc.js";
import {
  type AuthSession,
  type BlogPost,
  type ClientError,
  type ClientResult,
  type ListOptions,
  type LoginInput,
  type PostInput,
  type PostList,
  type RegisterInput,
  type Transport,
  noToken,
} from "./types.js";

export type ClientOptions =
  | {
      readonly kind: "http";
      readonly baseUrl: string;
      readonly fetch?: FetchLike | undefined;
      readonly token?: string | undefined;
    }
  | {
      readonly kind: "grpc";
      readonly endpoint: string;
      readonly caller?: RpcCaller | undefined;
      readonly token?: string | undefined;
    };

/**
 * One API over either transport. Holds the session token: register and
 * login store it, authenticated calls attach it, and those calls fail
 * locally with NO_TOKEN when there is none.
 */
export interface BlogClient {
  readonly kind: ClientOptions["kind"];
  register(input: RegisterInput): ClientResult<AuthSession>;
  login(input: LoginInput): ClientResult<AuthSession>;
  createPost(input: PostInput): ClientResult<BlogPost>;
  getPost(id: number): ClientResult<BlogPost>;
  updatePost(id: number, input: PostInput): ClientResult<BlogPost>;
  deletePost(id: number): ClientResult<void>;
  listPosts(options?: ListOptions): ClientResult<PostList>;
  getToken(): string | undefined;
  setToken(token: string): void;
  clearToken(): void;
  close(): void;
}

export const DEFAULT_LIST_LIMIT = 10;

const transportFor = (options: ClientOptions): Transport =>
  options.kind === "http"
    ? createHttpTransport({ baseUrl: options.baseUrl, fetch: options.fetch })
    : createGrpcTransport({ endpoint: options.endpoint, caller: options.caller });

export const createBlogClient = (options: ClientOptions): BlogClient => {
  const transport = transportFor(options);
  let token = options.token;

  const remember = (session: Result<AuthSession, ClientError>): Result<AuthSession, ClientError> => {
    if (session.ok) token = session.value.token;
    return session;
  };

  const withToken = async <T>(run: (current: string) => ClientResult<T>): ClientResult<T> =>
    token ? run(token) : err(noToken());

  return {
    kind: options.kind,

    register: async (input) => remember(await transport.register(input)),
    login: async (input) => remember(await transport.login(input)),

    createPost: (input) => withToken((t) => transport.createPost(t, input)),
    getPost: (id) => transport.getPost(id),
    updatePost: (id, input) => withToken((t) => transport.updatePost(t, id, input)),
    deletePost: (id) => withToken((t) => transport.deletePost(t, id)),

    listPosts: (listOptions = {}) =>
      transport.listPosts(listOptions.limit ?? DEFAULT_LIST_LIMIT, listOptions.offset ?? 0),

    getToken: () => token,
    setToken: (value) => {
      token = value;
    },
    clearToken: () => {
      token = undefined;
    },
    close: () => transport.close(),
  };
};

export type { FetchLike } from "./http.js";
export type { RpcCaller, RpcCallError } from "./grpc.js";
export * from "./types.js";
