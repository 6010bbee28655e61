/**
 * `inkwell help`: display help information.
 */

import { DEFAULT_GRPC_SERVER, DEFAULT_HTTP_SERVER } from "../args.js";
import { TOKEN_FILE } from "../token-store.js";
import { type Output, bold, cyan, dim, gray, green, logo, white, yellow } from "../ui.js";

const COMMANDS = [
  ["register", "--username <name> --email <email> --password <pw>", "Create an account and log in"],
  ["login", "--email <email> --password <pw>", "Log in and save the token"],
  ["create", "--title <title> --content <text>", "Publish a post"],
  ["get", "--id <id>", "Show one post"],
  ["update", "--id <id> --title <title> --content <text>", "Replace a post you own"],
  ["delete", "--id <id>", "Delete a post you own"],
  ["list", "[--limit 10] [--offset 0]", "List posts, newest first"],
  ["version", "", "Show CLI version"],
  ["help", "", "Show this help message"],
] as const;

const GLOBAL_OPTIONS = [
  ["--grpc", "Use the gRPC transport instead of HTTP"],
  ["--server <addr>", `Server address (${DEFAULT_HTTP_SERVER}, or ${DEFAULT_GRPC_SERVER} with --grpc)`],
] as const;

export const helpCommand = (out: Output, version: string): void => {
  out.line("");
  out.line(logo(version));
  out.line("");

  out.line(`  ${bold(white("USAGE"))}`);
  out.line(`  ${gray("─".repeat(50))}`);
  out.line(`  ${dim("$")} ${cyan("inkwell")} ${dim("[--grpc] [--server <addr>]")} ${green("<command>")} ${dim("[options]")}`);
  out.line("");

  out.line(`  ${bold(white("COMMANDS"))}`);
  out.line(`  ${gray("─".repeat(50))}`);
  const maxCmd = Math.max(...COMMANDS.map(([c]) => c.length));
  for (const [cmd, opts, desc] of COMMANDS) {
    out.line(`  ${green(cmd.padEnd(maxCmd + 2))} ${dim(desc)}`);
    if (opts) out.line(`  ${" ".repeat(maxCmd + 2)} ${yellow(opts)}`);
  }

  out.line("");
  out.line(`  ${bold(white("GLOBAL OPTIONS"))}`);
  out.line(`  ${gray("─".repeat(50))}`);
  const maxOpt = Math.max(...GLOBAL_OPTIONS.map(([o]) => o.length));
  for (const [opt, desc] of GLOBAL_OPTIONS) {
    out.line(`  ${yellow(opt.padEnd(maxOpt + 2))} ${dim(desc)}`);
  }

  out.line("");
  out.line(`  ${dim(`The session token is kept in ~/${TOKEN_FILE}.`)}`);
  out.line("");
};
