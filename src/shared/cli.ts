import { networkInterfaces } from "node:os";
import type { AppConfig } from "../infrastructure/config/config.js";
import { BlogMethod } from "./proto.js";
import { badge, bold, cyan, dim, gray, green, magenta, red, white, yellow } from "./ansi.js";

const ENV_BADGES: Readonly<Record<AppConfig["env"], string>> = {
  production: badge(42, "PRODUCTION"),
  development: badge(46, "DEVELOPMENT"),
  test: badge(43, "TEST"),
};

const METHOD_COLORS: Readonly<Record<string, (s: string) => string>> = {
  GET: green,
  POST: cyan,
  PUT: yellow,
  DELETE: red,
};

/** [method, path, needs a bearer token, description] */
const HTTP_ROUTES: readonly (readonly [string, string, boolean, string])[] = [
  ["GET", "/health", false, "Shallow health check"],
  ["GET", "/readiness", false, "Store ping"],
  ["POST", "/api/v1/auth/register", false, "Register"],
  ["POST", "/api/v1/auth/login", false, "Log in"],
  ["GET", "/api/v1/posts", false, "List posts (?limit&offset)"],
  ["POST", "/api/v1/posts", true, "Create post"],
  ["GET", "/api/v1/posts/:id", false, "Get post"],
  ["PUT", "/api/v1/posts/:id", true, "Update own post"],
  ["DELETE", "/api/v1/posts/:id", true, "Delete own post"],
];

const RULE = `  ${gray("─".repeat(60))}`;

const logo = (version: string): string =>
  [
    bold(cyan("  ┌─────────────────────────────────────────┐")),
    `${bold(cyan("  │"))}   ${bold(white("✎ inkwell"))}  ${dim(gray(`v${version}`))}                      ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Blog API over HTTP and gRPC"))}           ${bold(cyan("│"))}`,
    bold(cyan("  └─────────────────────────────────────────┘")),
  ].join("\n");

const localIp = (): string => {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const net of addresses ?? []) {
      if (net.family === "IPv4" && !net.internal) return net.address;
    }
  }
  return "0.0.0.0";
};

/** Loopback address, plus the LAN one when bound to every interface. */
const endpoints = (label: string, scheme: string, host: string, port: number): string[] => {
  const row = (name: string, address: string) =>
    `  ${bold(white("→"))} ${dim(name.padEnd(10))} ${bold(cyan(`${scheme}${address}:${port}`))}`;
  const rows = [row(`${label}:`, "localhost")];
  if (host === "0.0.0.0") rows.push(row("  network:", localIp()));
  return rows;
};

const tree = (rows: readonly (readonly [string, string])[]): string[] =>
  rows.map(([key, value], i) => `  ${gray(i === rows.length - 1 ? "└─" : "├─")} ${dim(key.padEnd(13))} ${value}`);

export interface StartupInfo {
  readonly config: AppConfig;
  readonly version: string;
  readonly driver: string;
  readonly bootTimeMs: number;
}

/** Printed once both servers are listening. */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config } = info;
  const boot = info.bootTimeMs < 1000 ? `${Math.round(info.bootTimeMs)}ms` : `${(info.bootTimeMs / 1000).toFixed(2)}s`;

  const routes = HTTP_ROUTES.map(([method, path, auth, description]) => {
    const color = METHOD_COLORS[method] ?? white;
    return `  ${auth ? yellow("🔒") : "  "} ${bold(color(method.padEnd(7)))} ${path.padEnd(30)} ${dim(gray(description))}`;
  });

  const lines = [
    "",
    logo(info.version),
    "",
    `  ${ENV_BADGES[config.env]}  ${dim("booted in")} ${bold(green(boot))}`,
    "",
    ...endpoints("HTTP", "http://", config.http.host, config.http.port),
    ...endpoints("gRPC", "", config.grpc.host, config.grpc.port),
    "",
    ...tree([
      ["PID", white(String(process.pid))],
      ["Runtime", magenta(`Node.js ${process.versions.node}`)],
      ["Store", green(info.driver)],
      ["Rate limit", white(`${config.rateLimit.maxRequests} req/${config.rateLimit.windowMs / 1000}s`)],
      ["Log level", white(`${config.log.level} (${config.log.format})`)],
    ]),
    "",
    `  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`,
    RULE,
    ...routes,
    RULE,
    `  ${dim("gRPC")} ${white("blog.BlogService")} ${dim(Object.values(BlogMethod).join(", "))}`,
    "",
    `  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`,
    "",
  ];

  process.stdout.write(`${lines.join("\n")}\n`);
};

export const printShutdown = (signal: string): void => {
  process.stdout.write(`\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", closing servers and store…")}\n\n`);
};

/** Every config problem, one per line, keyed by config path. */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const problems = Object.entries(errors).flatMap(([path, messages]) =>
    messages.map((msg) => `  ${red("✗")} ${bold(white(path))} ${dim("→")} ${red(msg)}`),
  );

  const lines = [
    "",
    `  ${badge(45, "CONFIG ERROR", 97)}  ${dim("Invalid configuration")}`,
    "",
    ...problems,
    "",
    `  ${dim("Environment variables are read from the process and from .env; see .env.example:")}`,
    `  ${cyan("$ cp .env.example .env")}`,
    "",
  ];

  process.stderr.write(`${lines.join("\n")}\n`);
};
