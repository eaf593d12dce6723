#!/usr/bin/env tsx

import { CommanderError } from "commander";
import { isStoreError } from "@blobvault/storage-core";
import { createProgram } from "./program.ts";

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help, --version and usage errors already printed their message
      process.exit(error.exitCode);
    }
    if (isStoreError(error)) {
      console.error(`Error: ${error.code}: ${error.message}`);
    } else if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exit(1);
  }
}

await main();
