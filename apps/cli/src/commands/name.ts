import { parseObjectPath } from "@blobvault/key-index";
import type { NamedObject } from "@blobvault/objects";
import type { Command } from "commander";
import { openInput, writeOutput } from "../lib/io.ts";
import { createFormatter, formatSize, type OutputRecord } from "../lib/output.ts";
import type { GlobalOptions } from "../program.ts";
import { withStore } from "../lib/store.ts";

const toRecord = (object: NamedObject): OutputRecord => ({
  bucket: object.bucket,
  key: object.key,
  id: object.digest,
  size: object.size,
  content_type: object.contentType,
  modified_at: object.modifiedAt.toISOString(),
});

export function registerNameCommands(program: Command): void {
  const name = program.command("name").description("Named objects (bucket/key)");

  name
    .command("put <path> <file>")
    .description("Store a file under bucket/key (use '-' for stdin)")
    .action(async (path: string, file: string) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const { bucket, key } = parseObjectPath(path);
      const stored = await withStore(opts, formatter, async (store) =>
        store.objects.putNamed(bucket, key, await openInput(file))
      );
      formatter.output(toRecord(stored), () => `${bucket}/${key} -> ${stored.digest}`);
    });

  name
    .command("get <path>")
    .description("Write the content stored under bucket/key to stdout")
    .option("-o, --output <path>", "write to a file instead of stdout")
    .action(async (path: string, cmdOpts: { output?: string }) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const { bucket, key } = parseObjectPath(path);
      await withStore(opts, formatter, async (store) => {
        const found = await store.objects.getNamed(bucket, key);
        if (found === null) throw new Error(`No object at ${bucket}/${key}`);
        const written = await writeOutput(await found.open(), cmdOpts.output);
        if (cmdOpts.output !== undefined) {
          formatter.success(`Wrote ${formatSize(written)} to ${cmdOpts.output}`);
        }
      });
    });

  name
    .command("stat <path>")
    .description("Show the entry stored under bucket/key")
    .action(async (path: string) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const { bucket, key } = parseObjectPath(path);
      const found = await withStore(opts, formatter, (store) =>
        store.objects.getNamed(bucket, key)
      );
      if (found === null) throw new Error(`No object at ${bucket}/${key}`);
      formatter.output(toRecord(found.object), (record) =>
        Object.entries(record)
          .map(([field, value]) => `${field}: ${String(value)}`)
          .join("\n")
      );
    });

  name
    .command("rm <path>")
    .description("Remove the name; the content stays addressable by id")
    .action(async (path: string) => {
      const opts = program.opts<GlobalOptions>();
      const formatter = createFormatter(opts);
      const { bucket, key } = parseObjectPath(path);
      const removed = await withStore(opts, formatter, (store) =>
        store.objects.deleteNamed(bucket, key)
      );
      if (removed) {
        formatter.success(`Removed ${bucket}/${key}`);
      } else {
        formatter.warn(`No object at ${bucket}/${key}`);
      }
    });
}
