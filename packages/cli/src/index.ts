#!/usr/bin/env -S node --import tsx
/**
 * scriptdex CLI
 *
 * @example
 * ```bash
 * scriptdex build
 * scriptdex search deploy --scope callables
 * scriptdex next
 * eval "$(scriptdex fuzzy git --action load)"
 * ```
 */

import { EXIT_FAILURE } from "@scriptdex/core/errors";
import { runCommand } from "./commands.js";
import { createCliContext } from "./context.js";
import { processOutput } from "./output.js";
import { runCli } from "./program.js";

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    output: processOutput,
    run: async (command) => runCommand(command, await createCliContext(), processOutput),
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = EXIT_FAILURE;
  },
);
