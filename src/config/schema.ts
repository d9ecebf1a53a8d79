import { z } from "zod";

export const PROVIDERS = ["google", "openrouter"] as const;

const llmSchema = z.object({
  provider: z.enum(PROVIDERS).default("google"),
  googleApiKey: z.string().default(""),
  googleModel: z.string().min(1).default("gemini-2.5-flash"),
  openrouterApiKey: z.string().default(""),
  openrouterModel: z.string().min(1).default("openai/gpt-oss-20b:free"),
  openrouterBaseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
});

const transcriptSchema = z.object({
  lang: z.string().min(1).optional(),
});

const serverSchema = z.object({
  port: z.number().int().positive().default(8000),
});

export const configSchema = z.object({
  llm: llmSchema,
  transcript: transcriptSchema,
  server: serverSchema,
});

export type AppConfig = z.infer<typeof configSchema>;
export type LlmProvider = (typeof PROVIDERS)[number];
