#!/usr/bin/env node

/**
 * inkwell CLI: talks to the blog server over HTTP or gRPC.
 *
 * Usage:
 *   inkwell register --username alice --email alice@example.com --password <password>
 *   inkwell login --email alice@example.com --password <password>
 *   inkwell --grpc list --limit 5
 *   inkwell help
 */

import { runCli } from "./run.js";
import { createFileTokenStore } from "./token-store.js";
import { consoleOutput } from "./ui.js";

const run = async (): Promise<void> => {
  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      out: consoleOutput,
      tokens: createFileTokenStore(),
    });
  } catch (e) {
    consoleOutput.fail(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
};

void run();
