import type { TaskResult } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("notifier");

export interface Notifier {
  deliver(url: string, token: string, result: TaskResult): Promise<void>;
}

/**
 * Posts a finished task's status message to the caller's webhook.
 * Failures are logged and dropped: the caller was already answered.
 */
export function createNotifier(opts: { fetchFn?: typeof fetch } = {}): Notifier {
  const { fetchFn = fetch } = opts;

  return {
    async deliver(url: string, token: string, result: TaskResult): Promise<void> {
      const message = result.status.message;
      if (!message) {
        log.info(
          { taskId: result.id, state: result.status.state },
          "Webhook notification skipped: no final message in the task result",
        );
        return;
      }

      log.info({ taskId: result.id, url }, "Sending final message to webhook");

      let response: Response;
      try {
        response = await fetchFn(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${token}`,
          },
          body: JSON.stringify(message),
        });
      } catch (err) {
        log.error({ taskId: result.id, url, err }, "Error sending webhook notification");
        return;
      }

      if (!response.ok) {
        log.error(
          { taskId: result.id, url, status: response.status, body: await readBody(response) },
          "Webhook endpoint rejected notification",
        );
        return;
      }

      log.info({ taskId: result.id }, "Webhook notification sent");
    },
  };
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    return `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`;
  }
}
