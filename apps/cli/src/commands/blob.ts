import type { Command } from "commander";
import { openInput, writeOutput } from "../lib/io.ts";
import { createFormatter, formatSize } from "../lib/output.ts";
import type { GlobalOptions } from "../program.ts";
import { withStore } from "../lib/store.ts";

export function registerBlobCommands(program: Command): void {
  program
    .command("put <file>")
    .description("Store a file by content and print its id (use '-' for stdin)")
    .action(async (file: string) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const stored = await withStore(opts, formatter, async (store) =>
        store.content.put(await openInput(file))
      );
      formatter.debug(
        stored.created ? `Stored new blob ${stored.digest}` : `Blob ${stored.digest} already present`
      );
      formatter.output(
        { id: stored.digest, size: stored.size, content_type: stored.contentType },
        () => stored.digest
      );
    });

  program
    .command("cat <id>")
    .description("Write the content of an object to stdout")
    .option("-o, --output <path>", "write to a file instead of stdout")
    .action(async (id: string, cmdOpts: { output?: string }) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      await withStore(opts, formatter, async (store) => {
        const blob = await store.content.get(id);
        if (blob === null) throw new Error(`Object not found: ${id}`);
        const written = await writeOutput(await blob.open(), cmdOpts.output);
        if (cmdOpts.output !== undefined) {
          formatter.success(`Wrote ${formatSize(written)} to ${cmdOpts.output}`);
        }
      });
    });

  program
    .command("stat <id>")
    .description("Show size, content type and modification time of an object")
    .action(async (id: string) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const info = await withStore(opts, formatter, (store) => store.content.stat(id));
      if (info === null) throw new Error(`Object not found: ${id}`);
      formatter.output(
        {
          id: info.digest,
          size: info.size,
          content_type: info.contentType,
          last_modified: info.lastModified.toISOString(),
        },
        () =>
          [
            `id:            ${info.digest}`,
            `size:          ${formatSize(info.size)}`,
            `content type:  ${info.contentType}`,
            `last modified: ${info.lastModified.toISOString()}`,
          ].join("\n")
      );
    });
}
