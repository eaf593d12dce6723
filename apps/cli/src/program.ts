import { Command, Option } from "commander";
import { registerBlobCommands } from "./commands/blob.ts";
import { registerNameCommands } from "./commands/name.ts";
import { OUTPUT_FORMATS } from "./lib/output.ts";

export type GlobalOptions = {
  store?: string;
  format: string;
  quiet?: boolean;
  verbose?: boolean;
};

export function createProgram(): Command {
  const program = new Command();

  program
    .name("blobvault")
    .description("Local access to a blobvault storage directory")
    .version("0.1.0")
    .option("-s, --store <dir>", "storage directory (default: $STORE_DIR or ./store)")
    .addOption(
      new Option("-f, --format <type>", "output format").choices(OUTPUT_FORMATS).default("text")
    )
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  // Set before registering so subcommands inherit it
  program.exitOverride();

  registerBlobCommands(program);
  registerNameCommands(program);
  return program;
}
