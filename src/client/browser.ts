import type { Result } from "../core/types/result.js";
import type { FetchLike } from "./http.js";
import { createBlogClient } from "./index.js";
import type {
  AuthSession,
  BlogPost,
  BlogUser,
  ClientError,
  ClientResult,
  LoginInput,
  PostInput,
  PostList,
  RegisterInput,
} from "./types.js";
import { httpUserSchema } from "./wire.js";

export const TOKEN_KEY = "blog_token";
export const USER_KEY = "blog_user";

/** The subset of the Web Storage API the app uses. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export interface BlogApp {
  isAuthenticated(): boolean;
  getCurrentUser(): BlogUser | null;
  logout(): void;
  register(input: RegisterInput): ClientResult<AuthSession>;
  login(input: LoginInput): ClientResult<AuthSession>;
  loadPosts(limit?: number, offset?: number): ClientResult<PostList>;
  getPost(id: number): ClientResult<BlogPost>;
  createPost(input: PostInput): ClientResult<BlogPost>;
  updatePost(id: number, input: PostInput): ClientResult<BlogPost>;
  deletePost(id: number): ClientResult<void>;
}

const isStorage = (value: unknown): value is KeyValueStorage =>
  typeof value === "object" &&
  value !== null &&
  "getItem" in value &&
  typeof value.getItem === "function" &&
  "setItem" in value &&
  typeof value.setItem === "function" &&
  "removeItem" in value &&
  typeof value.removeItem === "function";

/** Map-backed storage for hosts without `localStorage`. */
export const createMemoryStorage = (): KeyValueStorage => {
  const items = new Map<string, string>();
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
    removeItem: (key) => {
      items.delete(key);
    },
  };
};

const defaultStorage = (): KeyValueStorage => {
  const candidate: unknown = Reflect.get(globalThis, "localStorage");
  return isStorage(candidate) ? candidate : createMemoryStorage();
};

const readUser = (raw: string | null): BlogUser | null => {
  if (raw === null) return null;
  try {
    const parsed = httpUserSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

/**
 * Browser-side session over the HTTP API. Token and current user live in
 * `storage` so a reload keeps the session.
 */
export const createBlogApp = (
  baseUrl: string,
  storage: KeyValueStorage = defaultStorage(),
  fetchImpl?: FetchLike,
): BlogApp => {
  const client = createBlogClient({ kind: "http", baseUrl, fetch: fetchImpl });

  const syncToken = (): void => {
    const token = storage.getItem(TOKEN_KEY);
    if (token) client.setToken(token);
    else client.clearToken();
  };

  const persist = (session: Result<AuthSession, ClientError>): Result<AuthSession, ClientError> => {
    if (session.ok) {
      storage.setItem(TOKEN_KEY, session.value.token);
      storage.setItem(USER_KEY, JSON.stringify(session.value.user));
    }
    return session;
  };

  const clear = (): void => {
    storage.removeItem(TOKEN_KEY);
    storage.removeItem(USER_KEY);
    client.clearToken();
  };

  /** A rejected token ends the stored session. */
  const authed = async <T>(run: () => ClientResult<T>): ClientResult<T> => {
    syncToken();
    const result = await run();
    if (!result.ok && result.error.kind === "UNAUTHORIZED") clear();
    return result;
  };

  return {
    isAuthenticated: () => storage.getItem(TOKEN_KEY) !== null,
    getCurrentUser: () => readUser(storage.getItem(USER_KEY)),
    logout: clear,

    register: async (input) => persist(await client.register(input)),
    login: async (input) => persist(await client.login(input)),

    loadPosts: (limit = 10, offset = 0) => client.listPosts({ limit, offset }),
    getPost: (id) => client.getPost(id),

    createPost: (input) => authed(() => client.createPost(input)),
    updatePost: (id, input) => authed(() => client.updatePost(id, input)),
    deletePost: (id) => authed(() => client.deletePost(id)),
  };
};

