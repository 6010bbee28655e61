/**
 * Terminal output for the CLI, styled like the server banner.
 */
import { bold, cyan, dim, gray, green, red, white } from "../shared/ansi.js";

export { bold, cyan, dim, gray, green, red, stripAnsi, white, yellow } from "../shared/ansi.js";

export const icons = {
  success: green("✔"),
  error: red("✗"),
} as const;

export const logo = (version: string): string =>
  [
    bold(cyan("  ┌─────────────────────────────────────────┐")),
    `${bold(cyan("  │"))}   ${bold(white("✎ inkwell"))}  ${dim(gray(`v${version}`))}                      ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Blog client for HTTP and gRPC"))}         ${bold(cyan("│"))}`,
    bold(cyan("  └─────────────────────────────────────────┘")),
  ].join("\n");

/** Where command output goes. Tests capture it. */
export interface Output {
  line(msg: string): void;
  fail(msg: string): void;
}

export const consoleOutput: Output = {
  line: (msg) => process.stdout.write(`${msg}\n`),
  fail: (msg) => process.stderr.write(`  ${icons.error} ${red(msg)}\n`),
};

export const success = (out: Output, msg: string): void => out.line(`  ${icons.success} ${green(msg)}`);

/** Aligned `│ key  value` rows. */
export const printKeyValue = (out: Output, pairs: readonly (readonly [string, string])[]): void => {
  const width = Math.max(...pairs.map(([key]) => key.length));
  for (const [key, value] of pairs) out.line(`  ${gray("│")} ${dim(key.padEnd(width))}  ${value}`);
};

export const section = (out: Output, title: string): void => {
  out.line(`  ${bold(white(title))}`);
  out.line(`  ${gray("─".repeat(60))}`);
};
