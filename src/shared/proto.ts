import * as protoLoader from "@grpc/proto-loader";
import { fileURLToPath } from "node:url";

/**
 * `blog.BlogService`, loaded from proto/blog.proto at run time.
 * Field names are camelCased; int64 values come back as strings.
 */
export const PROTO_PATH = fileURLToPath(new URL("../../proto/blog.proto", import.meta.url));

export const BlogMethod = {
  Register: "Register",
  Login: "Login",
  CreatePost: "CreatePost",
  GetPost: "GetPost",
  UpdatePost: "UpdatePost",
  DeletePost: "DeletePost",
  ListPosts: "ListPosts",
} as const;

export type BlogMethod = (typeof BlogMethod)[keyof typeof BlogMethod];

export type BlogMethodDefinition = protoLoader.MethodDefinition<object, object>;

export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const isServiceDefinition = (
  def: protoLoader.AnyDefinition,
): def is protoLoader.ServiceDefinition => !("format" in def);

let cached: protoLoader.ServiceDefinition | undefined;

export const loadBlogService = (): protoLoader.ServiceDefinition => {
  if (cached) return cached;
  const definition = protoLoader.loadSync(PROTO_PATH, LOADER_OPTIONS)["blog.BlogService"];
  if (!definition || !isServiceDefinition(definition)) {
    throw new Error(`blog.BlogService not found in ${PROTO_PATH}`);
  }
  cached = definition;
  return definition;
};

export const blogMethod = (name: BlogMethod): BlogMethodDefinition => {
  const method = loadBlogService()[name];
  if (!method) throw new Error(`blog.BlogService has no method ${name}`);
  return method;
};
