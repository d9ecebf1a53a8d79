import { ZodError } from "zod";
import { configSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";
import { ConfigurationError } from "../lib/errors.ts";
import { formatIssues } from "../lib/validation.ts";

export type { AppConfig };

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const raw = {
    llm: {
      provider: env["LLM_PROVIDER"] || "google",
      googleApiKey: env["GOOGLE_API_KEY"] ?? "",
      googleModel: env["GOOGLE_MODEL"] || undefined,
      openrouterApiKey: env["OPENROUTER_API_KEY"] ?? "",
      openrouterModel: env["OPENROUTER_MODEL"] || undefined,
      openrouterBaseUrl: env["OPENROUTER_BASE_URL"] || undefined,
    },
    transcript: {
      lang: env["TRANSCRIPT_LANG"] || undefined,
    },
    server: {
      port: parseIntOrDefault(env["PORT"], 8000),
    },
  };

  try {
    return configSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(err)}`, err);
    }
    throw err;
  }
}

function parseIntOrDefault(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
