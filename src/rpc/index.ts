import { Hono } from "hono";
import type { Pipeline } from "../pipeline/index.ts";
import {
  RPC_ERRORS,
  rpcError,
  rpcRequestSchema,
  sendParamsSchema,
} from "./schema.ts";
import { formatIssues } from "../lib/validation.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("rpc");

export const SEND_METHOD = "message/send";

export interface RpcHandlerDeps {
  pipeline: Pipeline;
}

export function createRpcRoutes(deps: RpcHandlerDeps): Hono {
  const { pipeline } = deps;
  const app = new Hono();

  app.post("/summarize", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      log.warn({ err }, "Request body is not valid JSON");
      return c.json(rpcError(null, RPC_ERRORS.parseError, "Parse error"), 400);
    }

    const envelope = rpcRequestSchema.safeParse(body);
    if (!envelope.success) {
      return c.json(
        rpcError(null, RPC_ERRORS.invalidRequest, "Invalid Request", formatIssues(envelope.error)),
        400,
      );
    }

    const { id, method, params } = envelope.data;

    if (method !== SEND_METHOD) {
      log.warn({ id, method }, "Unsupported method");
      return c.json(
        rpcError(id, RPC_ERRORS.methodNotFound, `Method must be '${SEND_METHOD}'`),
        400,
      );
    }

    const parsed = sendParamsSchema.safeParse(params);
    if (!parsed.success) {
      return c.json(
        rpcError(id, RPC_ERRORS.invalidParams, "Invalid params", formatIssues(parsed.error)),
        400,
      );
    }

    try {
      const { message, configuration } = parsed.data;
      const result = await pipeline.processMessage(message, configuration);
      return c.json({ jsonrpc: "2.0", id, result });
    } catch (err) {
      log.error({ id, err }, "Unhandled error while processing request");
      return c.json(
        rpcError(
          id,
          RPC_ERRORS.internalError,
          "Internal error",
          err instanceof Error ? err.message : String(err),
        ),
        500,
      );
    }
  });

  return app;
}
