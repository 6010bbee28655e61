import type { z } from "zod";
import { type Result, err, ok } from "../core/types/result.js";
import {
  type ClientError,
  ClientErrorKind,
  type Transport,
  clientError,
} from "./types.js";
import { decode, httpAuthSchema, httpErrorSchema, httpPostListSchema, httpPostSchema } from "./wire.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  readonly baseUrl: string;
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchLike | undefined;
}

/** HTTP status to client error kind. */
export const kindForStatus = (status: number): ClientErrorKind => {
  switch (status) {
    case 400:
    case 413:
    case 422:
      return ClientErrorKind.INVALID_REQUEST;
    case 401:
      return ClientErrorKind.UNAUTHORIZED;
    case 403:
      return ClientErrorKind.FORBIDDEN;
    case 404:
      return ClientErrorKind.NOT_FOUND;
    case 409:
      return ClientErrorKind.CONFLICT;
    case 429:
      return ClientErrorKind.RATE_LIMITED;
    default:
      return ClientErrorKind.SERVER;
  }
};

const errorFromResponse = async (res: Response): Promise<ClientError> => {
  const body: unknown = await res.json().catch(() => null);
  const parsed = httpErrorSchema.safeParse(body);
  const message = parsed.success ? parsed.data.error.message : `HTTP ${res.status} ${res.statusText}`.trim();
  return clientError(kindForStatus(res.status), message);
};

/** REST transport over `fetch`. */
export const createHttpTransport = (options: HttpTransportOptions): Transport => {
  const base = options.baseUrl.replace(/\/+$/, "");
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  const send = async (
    method: string,
    path: string,
    init: { token?: string | undefined; body?: unknown } = {},
  ): Promise<Result<Response, ClientError>> => {
    const headers: Record<string, string> = { accept: "application/json" };
    if (init.token) headers.authorization = `Bearer ${init.token}`;
    if (init.body !== undefined) headers["content-type"] = "application/json";

    try {
      const res = await doFetch(`${base}${path}`, {
        method,
        headers,
        body: init.body === undefined ? null : JSON.stringify(init.body),
      });
      if (!res.ok) return err(await errorFromResponse(res));
      return ok(res);
    } catch (e: unknown) {
      return err(clientError(ClientErrorKind.TRANSPORT, e instanceof Error ? e.message : String(e)));
    }
  };

  const json = async <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    response: Result<Response, ClientError>,
  ): Promise<Result<T, ClientError>> => {
    if (!response.ok) return response;
    const body: unknown = await response.value.json().catch(() => null);
    return decode(schema, body);
  };

  return {
    register: async (input) =>
      json(httpAuthSchema, await send("POST", "/api/v1/auth/register", { body: input })),

    login: async (input) => json(httpAuthSchema, await send("POST", "/api/v1/auth/login", { body: input })),

    createPost: async (token, input) =>
      json(httpPostSchema, await send("POST", "/api/v1/posts", { token, body: input })),

    getPost: async (id) => json(httpPostSchema, await send("GET", `/api/v1/posts/${id}`)),

    updatePost: async (token, id, input) =>
      json(httpPostSchema, await send("PUT", `/api/v1/posts/${id}`, { token, body: input })),

    deletePost: async (token, id) => {
      const res = await send("DELETE", `/api/v1/posts/${id}`, { token });
      return res.ok ? ok(undefined) : res;
    },

    listPosts: async (limit, offset) => {
      const query = new URLSearchParams({ limit: String(limit), offset: String(offset) });
      return json(httpPostListSchema, await send("GET", `/api/v1/posts?${query.toString()}`));
    },

    close: () => {},
  };
};
