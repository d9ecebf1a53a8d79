import { Hono } from "hono";
import { createRpcRoutes } from "./rpc/index.ts";
import { RPC_ERRORS, rpcError } from "./rpc/schema.ts";
import type { Pipeline } from "./pipeline/index.ts";
import { createChildLogger } from "./lib/logger.ts";

const log = createChildLogger("server");

export interface AppOptions {
  pipeline: Pipeline;
}

export function createApp(opts: AppOptions) {
  const app = new Hono();

  app.get("/health", (c) => {
    return c.json({ status: "healthy" });
  });

  app.route("/a2a", createRpcRoutes({ pipeline: opts.pipeline }));

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json(
      rpcError(null, RPC_ERRORS.internalError, "Internal error", err.message),
      500,
    );
  });

  return app;
}
