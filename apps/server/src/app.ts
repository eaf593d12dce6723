import type { ContentStore } from "@blobvault/cas";
import { parseObjectPath } from "@blobvault/key-index";
import type { NamedObjectFacade } from "@blobvault/objects";
import { HEALTH_OK_BODY, METHOD_NOT_ALLOWED, NOT_FOUND } from "@blobvault/protocol";
import { type Context, Hono } from "hono";
import { logger } from "hono/logger";
import { createNamedController } from "./controllers/named.ts";
import { createObjectsController } from "./controllers/objects.ts";
import type { Env, ErrorBody } from "./types.ts";
import { errorJson, handleStoreError } from "./util/errors.ts";

export type AppDeps = {
  content: ContentStore;
  objects: NamedObjectFacade;
  /** One log line per request (default: true) */
  requestLog?: boolean;
};

const methodNotAllowed = (allow: string) => (c: Context<Env>) =>
  errorJson(c, 405, METHOD_NOT_ALLOWED, `${c.req.method} not allowed on ${c.req.path}`, {
    Allow: allow,
  });

export function createApp(deps: AppDeps) {
  const app = new Hono<Env>();
  if (deps.requestLog ?? true) {
    app.use(logger((message, ...rest) => console.log(`[blobvault] ${message}`, ...rest)));
  }

  app.get("/healthz", (c) => c.text(HEALTH_OK_BODY, 200));
  app.all("/healthz", methodNotAllowed("GET, HEAD"));

  const objects = createObjectsController({ content: deps.content });
  app.post("/objects", (c) => objects.put(c));
  app.all("/objects", methodNotAllowed("POST"));
  app.get("/objects/*", (c) => objects.get(c));
  app.all("/objects/*", methodNotAllowed("GET, HEAD"));

  const named = createNamedController({ objects: deps.objects });
  app.put("/:bucket/:key{.+}", (c) => named.put(c));
  app.get("/:bucket/:key{.+}", (c) => named.get(c));
  app.delete("/:bucket/:key{.+}", (c) => named.delete(c));
  app.all("/:bucket/:key{.+}", methodNotAllowed("PUT, GET, HEAD, DELETE"));

  app.notFound((c) => {
    try {
      parseObjectPath(c.req.path);
    } catch (err) {
      return handleStoreError(c, err);
    }
    return errorJson(c, 404, NOT_FOUND, `No route for ${c.req.path}`);
  });

  app.onError((err, c) => {
    console.error(`[blobvault] ${c.req.method} ${c.req.path} failed:`, err);
    const body: ErrorBody = {
      error: "INTERNAL_ERROR",
      message: err.message || "Internal server error",
    };
    return c.json(body, 500);
  });
  return app;
}

export type App = ReturnType<typeof createApp>;
