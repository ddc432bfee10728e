#!/usr/bin/env node

/**
 * Command line entry point
 */

import { CompileCli, exitWithError } from "#cli";

async function main(): Promise<void> {
  let cli: CompileCli;
  try {
    cli = new CompileCli();
  } catch (error) {
    exitWithError(error instanceof Error ? error.message : String(error));
  }
  await cli.run();
}

await main();
