import { randomUUID } from "node:crypto";
import { z } from "zod";

const textPartSchema = z.object({
  kind: z.literal("text"),
  text: z.string(),
});

const dataPartSchema = z.object({
  kind: z.literal("data"),
  data: z.unknown(),
});

const filePartSchema = z.object({
  kind: z.literal("file"),
  file: z.record(z.unknown()),
});

const partSchema = z.discriminatedUnion("kind", [
  textPartSchema,
  dataPartSchema,
  filePartSchema,
]);

export const messageSchema = z.object({
  kind: z.literal("message").default("message"),
  role: z.enum(["user", "agent"]).default("user"),
  parts: z.array(partSchema),
  messageId: z.string().min(1).default(() => randomUUID()),
  taskId: z.string().min(1).optional(),
  contextId: z.string().min(1).optional(),
});

export const configurationSchema = z.object({
  blocking: z.boolean().default(true),
  pushNotificationConfig: z
    .object({
      url: z.string().url(),
      token: z.string(),
    })
    .nullish()
    .transform((value) => value ?? undefined),
});

export const sendParamsSchema = z.object({
  message: messageSchema,
  configuration: configurationSchema.default({}),
});

export const rpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0").default("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string(),
  params: z.unknown(),
});

export type RpcId = z.infer<typeof rpcRequestSchema>["id"];

export const RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const;

export interface RpcErrorResponse {
  jsonrpc: "2.0";
  id: RpcId;
  error: { code: number; message: string; data?: string };
}

export function rpcError(
  id: RpcId,
  code: number,
  message: string,
  data?: string,
): RpcErrorResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}
