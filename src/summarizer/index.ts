import { GoogleGenAI } from "@google/genai";
import type { AppConfig } from "../config/schema.ts";
import { createGeminiSummarizer } from "./adapters/gemini.ts";
import type { GeminiModels } from "./adapters/gemini.ts";
import { createOpenRouterSummarizer } from "./adapters/openrouter.ts";
import { createChildLogger } from "../lib/logger.ts";
import { ConfigurationError } from "../lib/errors.ts";

const log = createChildLogger("summarizer");

export interface Summarizer {
  provider: string;
  summarize(transcript: string): Promise<string>;
}

export interface SummarizerDeps {
  /** Stands in for the Gemini SDK client. */
  gemini?: (apiKey: string) => GeminiModels;
  fetchFn?: typeof fetch;
}

export function createSummarizer(
  config: AppConfig["llm"],
  deps: SummarizerDeps = {},
): Summarizer {
  const summarizer = createProvider(config, deps);
  log.info({ provider: summarizer.provider }, "Summarizer configured");
  return summarizer;
}

function createProvider(config: AppConfig["llm"], deps: SummarizerDeps): Summarizer {
  switch (config.provider) {
    case "google": {
      if (!config.googleApiKey) {
        throw new ConfigurationError(
          "GOOGLE_API_KEY is required for the 'google' provider.",
        );
      }
      const gemini = deps.gemini ?? defaultGemini;
      return createGeminiSummarizer({
        models: gemini(config.googleApiKey),
        model: config.googleModel,
      });
    }
    case "openrouter": {
      if (!config.openrouterApiKey) {
        throw new ConfigurationError(
          "OPENROUTER_API_KEY is required for the 'openrouter' provider.",
        );
      }
      return createOpenRouterSummarizer({
        apiKey: config.openrouterApiKey,
        model: config.openrouterModel,
        baseUrl: config.openrouterBaseUrl,
        fetchFn: deps.fetchFn,
      });
    }
    default:
      throw new ConfigurationError(
        `Unknown LLM_PROVIDER: '${String(config.provider)}'. Must be 'google' or 'openrouter'.`,
      );
  }
}

function defaultGemini(apiKey: string): GeminiModels {
  return new GoogleGenAI({ apiKey }).models;
}
