import type { Message, Part } from "../../src/lib/types.ts";

export function makeMessage(parts: Part[], taskId?: string): Message {
  const message: Message = {
    kind: "message",
    role: "user",
    parts,
    messageId: "msg-1",
  };
  if (taskId) message.taskId = taskId;
  return message;
}

export function textMessage(text: string, taskId?: string): Message {
  return makeMessage([{ kind: "text", text }], taskId);
}
