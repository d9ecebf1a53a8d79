import type { GoogleGenAI } from "@google/genai";
import type { Summarizer } from "../index.ts";
import { SYSTEM_PROMPT, buildUserPrompt } from "../prompt.ts";
import { SummarizationError } from "../../lib/errors.ts";
import { createChildLogger } from "../../lib/logger.ts";

const log = createChildLogger("summarizer:google");

export type GeminiModels = Pick<GoogleGenAI["models"], "generateContent">;

export function createGeminiSummarizer(opts: {
  models: GeminiModels;
  model: string;
}): Summarizer {
  const { models, model } = opts;

  return {
    provider: "google",

    async summarize(transcript: string): Promise<string> {
      // The hosted model takes a single prompt, so the instruction leads it.
      const prompt = `${SYSTEM_PROMPT}\n\n${buildUserPrompt(transcript)}`;

      let text: string | undefined;
      try {
        const response = await models.generateContent({ model, contents: prompt });
        text = response.text;
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new SummarizationError(`Gemini request failed: ${detail}`, err);
      }

      if (!text) {
        throw new SummarizationError("Gemini returned no text content");
      }

      log.debug({ model, length: text.length }, "Summary generated");
      return text;
    },
  };
}
