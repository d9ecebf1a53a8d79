import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./server.ts";
import { loadConfig } from "./config/index.ts";
import { createTranscriptProvider } from "./transcript/index.ts";
import { createSummarizer } from "./summarizer/index.ts";
import { createNotifier } from "./notifier/index.ts";
import { createBackgroundRunner } from "./pipeline/runner.ts";
import { createPipeline } from "./pipeline/index.ts";
import { createChildLogger, logger } from "./lib/logger.ts";

const log = createChildLogger("main");

function main() {
  // Configuration problems are fatal: never serve with a broken provider.
  const config = loadConfig();
  const summarizer = createSummarizer(config.llm);

  const runner = createBackgroundRunner();
  const pipeline = createPipeline({
    transcripts: createTranscriptProvider({ lang: config.transcript.lang }),
    summarizer,
    notifier: createNotifier(),
    runner,
  });

  const app = createApp({ pipeline });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    log.info(`Server running on http://localhost:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal, pending: runner.pending() }, "Shutting down...");
    server.close();
    runner
      .idle()
      .then(() => {
        log.info("Background work drained");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to drain background work");
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
}
