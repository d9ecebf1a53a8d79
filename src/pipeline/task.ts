import { randomUUID } from "node:crypto";
import type { Message, TaskResult } from "../lib/types.ts";
import { TaskError } from "../lib/errors.ts";

export type PipelineStage =
  | "received"
  | "extracting"
  | "fetching"
  | "summarizing"
  | "completed"
  | "failed";

const VALID_TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  received: ["extracting"],
  extracting: ["fetching", "failed"],
  fetching: ["summarizing", "failed"],
  summarizing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export interface TaskRun {
  taskId: string;
  contextId: string;
  stage: PipelineStage;
  inbound: Message;
}

export function createTaskRun(opts: {
  taskId: string;
  contextId: string;
  inbound: Message;
}): TaskRun {
  return { ...opts, stage: "received" };
}

export function transitionRun(run: TaskRun, next: PipelineStage): TaskRun {
  const allowed = VALID_TRANSITIONS[run.stage];
  if (!allowed.includes(next)) {
    throw new TaskError(
      `Invalid transition: ${run.stage} → ${next} for task ${run.taskId}`,
    );
  }
  return { ...run, stage: next };
}

export function createAgentMessage(opts: {
  taskId: string;
  contextId: string;
  text: string;
}): Message {
  return {
    kind: "message",
    role: "agent",
    parts: [{ kind: "text", text: opts.text }],
    messageId: randomUUID(),
    taskId: opts.taskId,
    contextId: opts.contextId,
  };
}

/** Immediate reply to a non-blocking submission. Carries no message. */
export function acknowledge(opts: { taskId: string; contextId: string }): TaskResult {
  return {
    kind: "task",
    id: opts.taskId,
    contextId: opts.contextId,
    status: { state: "working", timestamp: now() },
  };
}

export function completeRun(
  run: TaskRun,
  output: { summary: string; transcript: string },
): TaskResult {
  const done = transitionRun(run, "completed");
  const reply = createAgentMessage({
    taskId: done.taskId,
    contextId: done.contextId,
    text: output.summary,
  });

  return {
    kind: "task",
    id: done.taskId,
    contextId: done.contextId,
    status: { state: "completed", message: reply, timestamp: now() },
    artifacts: [
      {
        artifactId: randomUUID(),
        name: "summary",
        parts: [{ kind: "text", text: output.summary }],
      },
      {
        artifactId: randomUUID(),
        name: "full_transcript",
        parts: [{ kind: "text", text: output.transcript }],
      },
    ],
    history: [done.inbound, reply],
  };
}

export function failRun(run: TaskRun, reason: string): TaskResult {
  const failed = transitionRun(run, "failed");
  const reply = createAgentMessage({
    taskId: failed.taskId,
    contextId: failed.contextId,
    text: reason,
  });

  return {
    kind: "task",
    id: failed.taskId,
    contextId: failed.contextId,
    status: { state: "failed", message: reply, timestamp: now() },
    history: [failed.inbound, reply],
  };
}

function now(): string {
  return new Date().toISOString();
}
