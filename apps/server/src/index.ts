/**
 * blobvault server
 *
 * Environment:
 * - STORE_DIR: storage root (default ./store)
 * - LISTEN_ADDR: host:port (default :8080); PORT overrides the port
 * - STAGING_MAX_AGE_MS: startup sweep age for staging files (default 1h)
 * - SNIFF_LENGTH: bytes used for media-type sniffing (default 512)
 * - REQUEST_LOG: "false" disables per-request logging
 */
import { serve } from "@hono/node-server";
import { openLocalObjectStore } from "@blobvault/objects";
import { createApp } from "./app.ts";
import { loadConfig } from "./config.ts";

async function main(): Promise<void> {
  const config = loadConfig();

  console.log(`[blobvault] Starting server...`);
  const store = await openLocalObjectStore({
    rootDir: config.storeDir,
    sniffLength: config.sniffLength,
  });
  console.log(`[blobvault] Storage: ${store.layout.rootDir}`);

  const swept = await store.storage.sweepStaging(config.stagingMaxAgeMs);
  if (swept > 0) {
    console.log(`[blobvault] Removed ${swept} stale staging file(s)`);
  }

  const app = createApp({
    content: store.content,
    objects: store.objects,
    requestLog: config.requestLog,
  });

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      console.log(`[blobvault] Listening on http://${config.host ?? "localhost"}:${info.port}`);
    }
  );

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[blobvault] ${signal} received, shutting down`);
    server.close((err) => {
      if (err) console.error(`[blobvault] Error closing server:`, err);
      store.close().then(
        () => process.exit(err ? 1 : 0),
        (closeErr: unknown) => {
          console.error(`[blobvault] Error closing index:`, closeErr);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(`[blobvault] Failed to start:`, err);
  process.exit(1);
});
