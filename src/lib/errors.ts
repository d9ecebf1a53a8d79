export type ErrorCode =
  | "VALIDATION_ERROR"
  | "TRANSCRIPT_UNAVAILABLE"
  | "TRANSCRIPT_FETCH_ERROR"
  | "SUMMARIZATION_ERROR"
  | "CONFIGURATION_ERROR"
  | "TASK_ERROR";

/** Base for every error this service raises on purpose. */
export abstract class SummarizerAgentError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** The inbound message does not point at a usable video. */
export class ValidationError extends SummarizerAgentError {
  readonly code = "VALIDATION_ERROR";
}

/** Captions are disabled or no transcript exists for the video. */
export class TranscriptUnavailableError extends SummarizerAgentError {
  readonly code = "TRANSCRIPT_UNAVAILABLE";
}

export class TranscriptFetchError extends SummarizerAgentError {
  readonly code = "TRANSCRIPT_FETCH_ERROR";
}

export class SummarizationError extends SummarizerAgentError {
  readonly code = "SUMMARIZATION_ERROR";
}

/** Startup only: the process must not serve with a broken provider. */
export class ConfigurationError extends SummarizerAgentError {
  readonly code = "CONFIGURATION_ERROR";
}

/** Internal fault, e.g. an illegal stage transition. */
export class TaskError extends SummarizerAgentError {
  readonly code = "TASK_ERROR";
}

export type TaskFailure =
  | ValidationError
  | TranscriptUnavailableError
  | TranscriptFetchError
  | SummarizationError;

/** Errors the pipeline turns into a failed task instead of a fault. */
export function isTaskFailure(err: unknown): err is TaskFailure {
  return (
    err instanceof ValidationError ||
    err instanceof TranscriptUnavailableError ||
    err instanceof TranscriptFetchError ||
    err instanceof SummarizationError
  );
}
