import { type BlogClient, createBlogClient } from "../client/index.js";
import { type ParsedArgs, parseArgs } from "./args.js";
import { loginCommand, registerCommand } from "./commands/auth.js";
import { helpCommand } from "./commands/help.js";
import {
  createCommand,
  deleteCommand,
  getCommand,
  listCommand,
  updateCommand,
} from "./commands/posts.js";
import type { TokenStore } from "./token-store.js";
import { type Output, bold, cyan, dim, white } from "./ui.js";

export const VERSION = "0.1.0";

export interface CliDeps {
  readonly out: Output;
  readonly tokens: TokenStore;
  /** Builds the client for the chosen transport. */
  readonly connect?: ((args: ParsedArgs, token: string | undefined) => BlogClient) | undefined;
}

const defaultConnect = (args: ParsedArgs, token: string | undefined): BlogClient =>
  args.grpc
    ? createBlogClient({ kind: "grpc", endpoint: args.server, token })
    : createBlogClient({ kind: "http", baseUrl: args.server, token });

const CLIENT_COMMANDS = new Set(["register", "login", "create", "get", "update", "delete", "list"]);

/** Runs one invocation and resolves to the process exit code. */
export const runCli = async (argv: readonly string[], deps: CliDeps): Promise<number> => {
  const { out, tokens } = deps;
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    out.fail(parsed.error);
    return 2;
  }
  const args = parsed.value;

  switch (args.command) {
    case "":
    case "help":
      helpCommand(out, VERSION);
      return 0;
    case "version":
      out.line(`inkwell v${VERSION}`);
      return 0;
  }

  if (!CLIENT_COMMANDS.has(args.command)) {
    out.fail(`Unknown command: ${bold(white(args.command))}`);
    out.line(`  ${dim("Run")} ${cyan("inkwell help")} ${dim("to see available commands.")}`);
    return 2;
  }

  const client = (deps.connect ?? defaultConnect)(args, await tokens.load());
  try {
    switch (args.command) {
      case "register":
        return await registerCommand(client, args.flags, out, tokens);
      case "login":
        return await loginCommand(client, args.flags, out, tokens);
      case "create":
        return await createCommand(client, args.flags, out);
      case "get":
        return await getCommand(client, args.flags, out);
      case "update":
        return await updateCommand(client, args.flags, out);
      case "delete":
        return await deleteCommand(client, args.flags, out);
      default:
        return await listCommand(client, args.flags, out);
    }
  } finally {
    client.close();
  }
};
