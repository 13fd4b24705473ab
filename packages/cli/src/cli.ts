#!/usr/bin/env tsx

/**
 * neoscope CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already reported its own usage errors (and help/version output)
    if (!(err instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    }
    process.exitCode = mapSdkErrorToExitCode(err);
  }
}

await main();
