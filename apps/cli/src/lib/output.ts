import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";
import { z } from "zod";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export type OutputRecord = Record<string, unknown>;

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  // Output structured data
  output(data: OutputRecord, textFormatter?: (data: OutputRecord) => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        this.printObjectTable(data);
        break;
      default:
        console.log(textFormatter ? textFormatter(data) : formatValue(data));
    }
  }

  // Print object as key-value table
  printObjectTable(obj: OutputRecord): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  // Print success message
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green("✓"), message);
    }
  }

  // Print warning message
  warn(message: string): void {
    if (!this.options.quiet) {
      console.warn(chalk.yellow("⚠"), message);
    }
  }

  // Print verbose/debug message
  debug(message: string): void {
    if (this.options.verbose) {
      console.log(chalk.gray("⋯"), chalk.gray(message));
    }
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  return new OutputFormatter({
    format: OutputFormatSchema.parse(options.format ?? "text"),
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? false,
  });
}

// Format file size
export function formatSize(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / 1024 ** i;
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}
