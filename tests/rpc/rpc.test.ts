import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import { createRpcRoutes } from "../../src/rpc/index.ts";
import { acknowledge } from "../../src/pipeline/task.ts";

function post(app: ReturnType<typeof createRpcRoutes>, body: unknown) {
  return app.request("/summarize", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

const inboundMessage = {
  kind: "message",
  role: "user",
  messageId: "msg-1",
  parts: [{ kind: "text", text: "https://youtu.be/abc" }],
};

describe("createRpcRoutes", () => {
  let processMessage: Mock;
  let app: ReturnType<typeof createRpcRoutes>;

  beforeEach(() => {
    processMessage = vi
      .fn()
      .mockResolvedValue(acknowledge({ taskId: "t-1", contextId: "ctx-1" }));
    app = createRpcRoutes({ pipeline: { processMessage } });
  });

  it("dispatches message/send to the pipeline", async () => {
    const res = await post(app, {
      jsonrpc: "2.0",
      id: "req-1",
      method: "message/send",
      params: { message: inboundMessage, configuration: { blocking: true } },
    });

    expect(res.status).toBe(200);
    const json = (await res.json()) as {
      jsonrpc: string;
      id: string;
      result: { id: string; status: { state: string } };
    };
    expect(json.jsonrpc).toBe("2.0");
    expect(json.id).toBe("req-1");
    expect(json.result.id).toBe("t-1");
    expect(json.result.status.state).toBe("working");
    expect(processMessage).toHaveBeenCalledWith(inboundMessage, { blocking: true });
  });

  it("fills in message defaults and a blocking configuration", async () => {
    await post(app, {
      jsonrpc: "2.0",
      id: 7,
      method: "message/send",
      params: { message: { parts: [{ kind: "text", text: "hi" }] } },
    });

    const [message, configuration] = processMessage.mock.calls[0] ?? [];
    expect(message).toMatchObject({
      kind: "message",
      role: "user",
      parts: [{ kind: "text", text: "hi" }],
    });
    expect(typeof message.messageId).toBe("string");
    expect(configuration).toEqual({ blocking: true });
  });

  it("passes the push notification config through", async () => {
    const pushNotificationConfig = { url: "https://hooks.test/notify", token: "test-token" };

    await post(app, {
      jsonrpc: "2.0",
      id: "req-2",
      method: "message/send",
      params: {
        message: inboundMessage,
        configuration: { blocking: false, pushNotificationConfig },
      },
    });

    expect(processMessage).toHaveBeenCalledWith(inboundMessage, {
      blocking: false,
      pushNotificationConfig,
    });
  });

  it("accepts file parts and scalar data parts", async () => {
    const parts = [
      { kind: "file", file: { name: "clip.mp4", uri: "https://files.test/clip.mp4" } },
      { kind: "data", data: 42 },
      { kind: "text", text: "https://youtu.be/abc" },
    ];

    const res = await post(app, {
      jsonrpc: "2.0",
      id: "req-6",
      method: "message/send",
      params: { message: { ...inboundMessage, parts } },
    });

    expect(res.status).toBe(200);
    expect(processMessage).toHaveBeenCalledWith(
      { ...inboundMessage, parts },
      { blocking: true },
    );
  });

  it("returns a parse error for malformed JSON", async () => {
    const res = await post(app, "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Parse error" },
    });
  });

  it("returns an invalid request error when the envelope is wrong", async () => {
    const res = await post(app, { jsonrpc: "2.0", id: "req-3" });

    expect(res.status).toBe(400);
    const json = (await res.json()) as { error: { code: number; data: string } };
    expect(json.error.code).toBe(-32600);
    expect(json.error.data).toContain("method");
  });

  it("rejects other methods with a client error", async () => {
    const res = await post(app, {
      jsonrpc: "2.0",
      id: 1,
      method: "tasks/get",
      params: {},
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32601, message: "Method must be 'message/send'" },
    });
    expect(processMessage).not.toHaveBeenCalled();
  });

  it("rejects params that are not a message", async () => {
    const res = await post(app, {
      jsonrpc: "2.0",
      id: "req-4",
      method: "message/send",
      params: { message: { parts: "https://youtu.be/abc" } },
    });

    expect(res.status).toBe(400);
    const json = (await res.json()) as { id: string; error: { code: number } };
    expect(json.id).toBe("req-4");
    expect(json.error.code).toBe(-32602);
    expect(processMessage).not.toHaveBeenCalled();
  });

  it("reports pipeline faults as an internal error", async () => {
    processMessage.mockRejectedValue(new Error("kaboom"));

    const res = await post(app, {
      jsonrpc: "2.0",
      id: "req-5",
      method: "message/send",
      params: { message: inboundMessage },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: "req-5",
      error: { code: -32603, message: "Internal error", data: "kaboom" },
    });
  });
});
