import { z } from "zod";
import { getNumber, getRequiredString, getStage, getString, isProduction } from "../util/env";

export const DEFAULT_MODEL = "meta-llama/Meta-Llama-3.1-8B-Instruct";

const summaryConfigSchema = z.object({
  transport: z.enum(["inference", "chat"]),
  model: z.string().min(1),
  token: z.string().min(1),
  endpoint: z.string().url().optional(),
  chatBaseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0).max(10),
});

export type SummaryConfig = z.infer<typeof summaryConfigSchema> & {
  stage: string;
  production: boolean;
};

export function loadSummaryConfig(): SummaryConfig {
  const parsed = summaryConfigSchema.parse({
    transport: getString("SUMMARY_TRANSPORT", "inference"),
    model: getString("MODEL_NAME", DEFAULT_MODEL),
    token: getRequiredString("HF_TOKEN"),
    endpoint: getString("SUMMARY_ENDPOINT"),
    chatBaseUrl: getString("SUMMARY_CHAT_BASE_URL"),
    maxTokens: getNumber("SUMMARY_MAX_TOKENS", 400),
    temperature: getNumber("SUMMARY_TEMPERATURE", 0.6),
    timeoutMs: getNumber("SUMMARY_TIMEOUT_MS", 30_000),
    maxRetries: getNumber("SUMMARY_MAX_RETRIES", 2),
  });
  return { ...parsed, stage: getStage(), production: isProduction() };
}
