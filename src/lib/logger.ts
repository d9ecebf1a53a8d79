import type { Logger, LoggerOptions } from "pino";
import pino from "pino";

// API keys and webhook tokens travel through request and config objects.
const REDACTED_PATHS = [
  "token",
  "apiKey",
  "*.token",
  "*.apiKey",
  "headers.Authorization",
  "pushNotificationConfig.token",
];

function buildOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  const options: LoggerOptions = {
    name: "yt-summarizer",
    level: env["LOG_LEVEL"] ?? "info",
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    serializers: { err: pino.stdSerializers.err },
  };

  if (env["NODE_ENV"] !== "production") {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, ignore: "pid,hostname" },
    };
  }
  return options;
}

export const logger: Logger = pino(buildOptions(process.env));

/** Scoped logger for one area of the service, e.g. `pipeline` or `rpc`. */
export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
