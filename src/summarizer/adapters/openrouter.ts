import { z } from "zod";
import type { Summarizer } from "../index.ts";
import { SYSTEM_PROMPT, buildUserPrompt } from "../prompt.ts";
import { SummarizationError } from "../../lib/errors.ts";
import { createChildLogger } from "../../lib/logger.ts";

const log = createChildLogger("summarizer:openrouter");

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    ),
});

export function createOpenRouterSummarizer(opts: {
  apiKey: string;
  model: string;
  baseUrl: string;
  fetchFn?: typeof fetch;
}): Summarizer {
  const { apiKey, model, baseUrl, fetchFn = fetch } = opts;
  const endpoint = `${baseUrl.replace(/\/+$/, "")}/chat/completions`;

  return {
    provider: "openrouter",

    async summarize(transcript: string): Promise<string> {
      let response: Response;
      try {
        response = await fetchFn(endpoint, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: buildUserPrompt(transcript) },
            ],
          }),
        });
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new SummarizationError(`OpenRouter request failed: ${detail}`, err);
      }

      if (!response.ok) {
        throw new SummarizationError(
          `OpenRouter returned ${response.status}: ${await readBody(response)}`,
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new SummarizationError("OpenRouter response is not valid JSON", err);
      }

      const parsed = completionSchema.safeParse(body);
      if (!parsed.success) {
        throw new SummarizationError(
          "OpenRouter response has no message content",
          parsed.error,
        );
      }

      const [choice] = parsed.data.choices;
      if (!choice) {
        throw new SummarizationError("OpenRouter response has no message content");
      }

      log.debug({ model, length: choice.message.content.length }, "Summary generated");
      return choice.message.content;
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
