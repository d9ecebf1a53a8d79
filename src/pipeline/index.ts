import { randomUUID } from "node:crypto";
import type { ExecutionConfiguration, Message, TaskResult } from "../lib/types.ts";
import type { TranscriptProvider } from "../transcript/index.ts";
import type { Summarizer } from "../summarizer/index.ts";
import type { Notifier } from "../notifier/index.ts";
import type { BackgroundRunner } from "./runner.ts";
import {
  acknowledge,
  completeRun,
  createTaskRun,
  failRun,
  transitionRun,
} from "./task.ts";
import type { PipelineStage, TaskRun } from "./task.ts";
import { extractVideoReference, resolveVideoId } from "../agent/interpreter.ts";
import {
  SummarizationError,
  TranscriptFetchError,
  ValidationError,
  isTaskFailure,
} from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("pipeline");

export interface Pipeline {
  processMessage(message: Message, config: ExecutionConfiguration): Promise<TaskResult>;
}

export interface PipelineDeps {
  transcripts: TranscriptProvider;
  summarizer: Summarizer;
  notifier: Notifier;
  runner: BackgroundRunner;
  generateId?: () => string;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { transcripts, summarizer, notifier, runner, generateId = randomUUID } = deps;

  function advance(run: TaskRun, stage: PipelineStage): TaskRun {
    const next = transitionRun(run, stage);
    log.debug({ taskId: run.taskId, from: run.stage, to: stage }, "Task stage changed");
    return next;
  }

  // Provider errors outside the known taxonomy still end the task as failed,
  // so a webhook caller always hears back.
  async function fetchTranscript(videoId: string): Promise<string> {
    try {
      return await transcripts.fetchTranscript(videoId);
    } catch (err) {
      if (isTaskFailure(err)) throw err;
      throw new TranscriptFetchError(
        "An unexpected error occurred while trying to get the video transcript.",
        err,
      );
    }
  }

  async function summarize(transcript: string): Promise<string> {
    try {
      return await summarizer.summarize(transcript);
    } catch (err) {
      if (isTaskFailure(err)) throw err;
      throw new SummarizationError(err instanceof Error ? err.message : String(err), err);
    }
  }

  async function execute(start: TaskRun): Promise<TaskResult> {
    let run = advance(start, "extracting");

    try {
      const reference = extractVideoReference(run.inbound);
      if (!reference) {
        throw new ValidationError("No valid YouTube URL found in the message.");
      }

      const videoId = resolveVideoId(reference);
      if (!videoId) {
        throw new ValidationError("Could not extract a valid video ID from the URL.");
      }

      run = advance(run, "fetching");
      log.info({ taskId: run.taskId, videoId }, "Fetching transcript");
      const transcript = await fetchTranscript(videoId);

      run = advance(run, "summarizing");
      log.info(
        { taskId: run.taskId, provider: summarizer.provider },
        "Summarizing transcript",
      );
      const summary = await summarize(transcript);

      const result = completeRun(run, { summary, transcript });
      log.info({ taskId: run.taskId }, "Task completed");
      return result;
    } catch (err) {
      if (!isTaskFailure(err)) throw err;

      log.warn({ taskId: run.taskId, stage: run.stage, code: err.code }, err.message);
      return failRun(run, describeFailure(err));
    }
  }

  return {
    async processMessage(
      message: Message,
      config: ExecutionConfiguration,
    ): Promise<TaskResult> {
      const run = createTaskRun({
        taskId: message.taskId ?? generateId(),
        contextId: generateId(),
        inbound: message,
      });

      const push = config.pushNotificationConfig;
      if (!config.blocking && push) {
        log.info({ taskId: run.taskId }, "Running in non-blocking (webhook) mode");
        runner.submit(`task:${run.taskId}`, async () => {
          const result = await execute(run);
          await notifier.deliver(push.url, push.token, result);
        });
        return acknowledge(run);
      }

      log.info({ taskId: run.taskId }, "Running in blocking mode");
      return execute(run);
    },
  };
}

function describeFailure(err: Error): string {
  if (err instanceof SummarizationError) {
    return `Failed to summarize the transcript: ${err.message}`;
  }
  return err.message;
}
