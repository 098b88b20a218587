import { z } from "zod";
import { loadSummaryConfig, SummaryConfig } from "../ai/config";
import { DEFAULT_MAX_PROMPT_CHARS } from "../reporting/prompt_composer";
import { getBoolean, getList, getNumber, getRequiredString, getString } from "../util/env";

const pipelineConfigSchema = z.object({
  news: z.object({
    apiKey: z.string().min(1),
    baseUrl: z.string().url().optional(),
    query: z.string().min(1),
    pageSize: z.number().int().min(1).max(100),
    attempts: z.number().int().min(1).max(5),
    failurePolicy: z.enum(["abort", "continue"]),
  }),
  market: z.object({
    baseUrl: z.string().url().optional(),
    tickers: z.array(z.string().min(1)).min(1),
    /** Days of daily closes sent with each quote; 0 sends the latest quote only */
    lookbackDays: z.number().int().min(0).max(365),
  }),
  concurrentFetch: z.boolean(),
  maxPromptChars: z.number().int().positive(),
  cacheTtlSeconds: z.number().int().min(0),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema> & {
  summary: SummaryConfig;
};

/**
 * Reads the whole pipeline configuration from the environment.
 * Credentials are required; everything else has a default.
 */
export function loadPipelineConfig(): PipelineConfig {
  const parsed = pipelineConfigSchema.parse({
    news: {
      apiKey: getRequiredString("NEWS_API_KEY"),
      baseUrl: getString("NEWS_API_BASE_URL"),
      query: getString("NEWS_QUERY", "stock market OR finance"),
      pageSize: getNumber("NEWS_PAGE_SIZE", 5),
      attempts: getNumber("NEWS_ATTEMPTS", 1),
      failurePolicy: getString("NEWS_FAILURE_POLICY", "abort"),
    },
    market: {
      baseUrl: getString("MARKET_DATA_BASE_URL"),
      tickers: getList("TICKERS", ["AAPL"]),
      lookbackDays: getNumber("LOOKBACK_DAYS", 5),
    },
    concurrentFetch: getBoolean("CONCURRENT_FETCH", false),
    maxPromptChars: getNumber("MAX_PROMPT_CHARS", DEFAULT_MAX_PROMPT_CHARS),
    cacheTtlSeconds: getNumber("CACHE_TTL_SECONDS", 300),
  });
  return { ...parsed, summary: loadSummaryConfig() };
}
