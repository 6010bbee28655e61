import { z } from "zod";
import { type Result, err, ok } from "../../core/types/result.js";
import { printConfigError } from "../../shared/cli.js";

/**
 * Application config: validated at boot via Zod.
 * Fails fast with clear messages if env vars are missing.
 */
const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),

  http: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: port(3000),
  }),

  grpc: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: port(50051),
  }),

  jwt: z.object({
    secret: z.string().min(32),
    expiresIn: z
      .string()
      .regex(/^\d+[smhd]$/, "Expected a duration such as 30m, 24h or 7d")
      .default("24h"),
  }),

  cors: z.object({
    origins: z
      .string()
      .transform((s) => s.split(",").map((o) => o.trim()))
      .default("*"),
  }),

  rateLimit: z.object({
    windowMs: z.coerce.number().int().positive().default(60_000),
    maxRequests: z.coerce.number().int().positive().default(100),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  database: z.object({
    driver: z.enum(["sqlite", "postgres", "memory"]).optional(),
    url: z.string().url().optional(),
    path: z.string().default("data/inkwell.sqlite"),
  }),

  pagination: z
    .object({
      defaultLimit: z.coerce.number().int().positive().default(10),
      maxLimit: z.coerce.number().int().positive().default(100),
    })
    .refine((p) => p.defaultLimit <= p.maxLimit, {
      message: "PAGINATION_DEFAULT_LIMIT must not exceed PAGINATION_MAX_LIMIT",
      path: ["defaultLimit"],
    }),

  argon2: z.object({
    memoryCost: z.coerce.number().int().min(1024).default(65_536), // KiB → 64 MiB
    timeCost: z.coerce.number().int().positive().default(3),
    parallelism: z.coerce.number().int().positive().default(4),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type DatabaseDriver = "sqlite" | "postgres" | "memory";

type Env = Readonly<Record<string, string | undefined>>;

/** DATABASE_DRIVER wins; otherwise a DATABASE_URL means Postgres. */
export const resolveDriver = (database: AppConfig["database"]): DatabaseDriver =>
  database.driver ?? (database.url !== undefined ? "postgres" : "sqlite");

/** Validate an env map. Errors are keyed by dotted config path. */
export const parseConfig = (env: Env): Result<AppConfig, Record<string, string[]>> => {
  // An empty assignment such as `DATABASE_URL=` counts as unset.
  const v = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  const result = configSchema.safeParse({
    env: v("NODE_ENV"),
    http: { host: v("HTTP_HOST"), port: v("HTTP_PORT") },
    grpc: { host: v("GRPC_HOST"), port: v("GRPC_PORT") },
    jwt: { secret: v("JWT_SECRET"), expiresIn: v("JWT_EXPIRES_IN") },
    cors: { origins: v("CORS_ORIGINS") },
    rateLimit: {
      windowMs: v("RATE_LIMIT_WINDOW_MS"),
      maxRequests: v("RATE_LIMIT_MAX_REQUESTS"),
    },
    log: { level: v("LOG_LEVEL"), format: v("LOG_FORMAT") },
    database: {
      driver: v("DATABASE_DRIVER"),
      url: v("DATABASE_URL"),
      path: v("DATABASE_PATH"),
    },
    pagination: {
      defaultLimit: v("PAGINATION_DEFAULT_LIMIT"),
      maxLimit: v("PAGINATION_MAX_LIMIT"),
    },
    argon2: {
      memoryCost: v("ARGON2_MEMORY_COST"),
      timeCost: v("ARGON2_TIME_COST"),
      parallelism: v("ARGON2_PARALLELISM"),
    },
  });

  if (result.success) return ok(result.data);

  const errors: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.join(".") || "config";
    errors[key] = [...(errors[key] ?? []), issue.message];
  }
  return err(errors);
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = parseConfig(env);
  if (!parsed.ok) {
    printConfigError(parsed.error);
    process.exit(1);
  }
  return parsed.value;
};
