import { type Result, err, ok } from "../core/types/result.js";

export const DEFAULT_HTTP_SERVER = "http://localhost:3000";
export const DEFAULT_GRPC_SERVER = "localhost:50051";

export interface ParsedArgs {
  readonly command: string;
  readonly grpc: boolean;
  readonly server: string;
  /** Command flags, `--name value` or `--name=value`. */
  readonly flags: ReadonlyMap<string, string>;
}

const BOOLEAN_FLAGS = new Set(["grpc", "help", "version"]);

/**
 * `inkwell [--grpc] [--server <addr>] <command> [--flag value ...]`.
 * Global flags may appear anywhere.
 */
export const parseArgs = (argv: readonly string[]): Result<ParsedArgs, string> => {
  let command = "";
  let grpc = false;
  let server: string | undefined;
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "-h") {
      command ||= "help";
      continue;
    }
    if (arg === "-v") {
      command ||= "version";
      continue;
    }

    if (!arg.startsWith("--")) {
      if (command) return err(`Unexpected argument: ${arg}`);
      command = arg.toLowerCase();
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!name) return err(`Invalid flag: ${arg}`);

    if (BOOLEAN_FLAGS.has(name)) {
      if (name === "grpc") grpc = true;
      else command ||= name;
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) return err(`Missing value for --${name}`);
      i++;
    }

    if (name === "server") server = value;
    else flags.set(name, value);
  }

  return ok({
    command,
    grpc,
    server: server ?? (grpc ? DEFAULT_GRPC_SERVER : DEFAULT_HTTP_SERVER),
    flags,
  });
};

export const requireFlag = (flags: ReadonlyMap<string, string>, name: string): Result<string, string> => {
  const value = flags.get(name);
  return value === undefined ? err(`Missing required flag --${name}`) : ok(value);
};

/** Optional integer flag; `fallback` when absent. */
export const intFlag = (
  flags: ReadonlyMap<string, string>,
  name: string,
  fallback?: number,
): Result<number, string> => {
  const raw = flags.get(name);
  if (raw === undefined) {
    return fallback === undefined ? err(`Missing required flag --${name}`) : ok(fallback);
  }
  if (!/^-?\d+$/.test(raw)) return err(`--${name} must be an integer, got "${raw}"`);
  return ok(Number(raw));
};

const hasAll = <K extends string>(
  values: Partial<Record<K, string>>,
  names: readonly K[],
): values is Record<K, string> => names.every((name) => values[name] !== undefined);

/** All of `names`, or the first one missing. */
export const requireFlags = <K extends string>(
  flags: ReadonlyMap<string, string>,
  names: readonly K[],
): Result<Record<K, string>, string> => {
  const values: Partial<Record<K, string>> = {};
  for (const name of names) {
    const value = requireFlag(flags, name);
    if (!value.ok) return value;
    values[name] = value.value;
  }
  return hasAll(values, names) ? ok(values) : err("Missing required flags");
};
