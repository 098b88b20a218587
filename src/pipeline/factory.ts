/**
 * Wires concrete fetchers and clients from a loaded PipelineConfig.
 * Credentials flow from the config object into each constructor; nothing
 * reads them from the environment after this point.
 */
import type { SummaryConfig } from "../ai/config";
import { createSummaryClient, SummaryClient } from "../ai/summary_client";
import { createChatTransport } from "../ai/transports/chat";
import { createInferenceTransport } from "../ai/transports/inference";
import type { SummaryTransport } from "../ai/transports/types";
import {
  createMarketDataFetcher,
  lookbackRange,
  MarketDataFetcher,
} from "../market/market_data_fetcher";
import { createNewsFetcher, NewsFetcher } from "../news/news_fetcher";
import type { FetchLike } from "../util/http";
import type { PipelineConfig } from "./config";
import { DashboardSession } from "./dashboard_session";
import { createOrchestrator, Orchestrator, SummaryRequest } from "./orchestrator";

export interface PipelineComponents {
  newsFetcher: NewsFetcher;
  marketDataFetcher: MarketDataFetcher;
  summaryClient: SummaryClient;
}

export interface FactoryOverrides {
  fetchFn?: FetchLike;
  now?: () => Date;
}

export function createSummaryTransport(
  config: SummaryConfig,
  overrides: FactoryOverrides = {}
): SummaryTransport {
  if (config.transport === "chat") {
    return createChatTransport({
      token: config.token,
      baseUrl: config.chatBaseUrl,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });
  }
  return createInferenceTransport({
    token: config.token,
    endpoint: config.endpoint,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    fetchFn: overrides.fetchFn,
  });
}

export function createComponents(
  config: PipelineConfig,
  overrides: FactoryOverrides = {}
): PipelineComponents {
  return {
    newsFetcher: createNewsFetcher({
      apiKey: config.news.apiKey,
      baseUrl: config.news.baseUrl,
      attempts: config.news.attempts,
      fetchFn: overrides.fetchFn,
    }),
    marketDataFetcher: createMarketDataFetcher({
      baseUrl: config.market.baseUrl,
      fetchFn: overrides.fetchFn,
    }),
    summaryClient: createSummaryClient({
      transport: createSummaryTransport(config.summary, overrides),
      retry: { maxRetries: config.summary.maxRetries },
    }),
  };
}

export function createPipeline(
  config: PipelineConfig,
  overrides: FactoryOverrides = {}
): { orchestrator: Orchestrator; request: SummaryRequest } {
  const components = createComponents(config, overrides);
  const now = overrides.now ?? (() => new Date());
  const { lookbackDays } = config.market;
  return {
    orchestrator: createOrchestrator({
      ...components,
      maxPromptChars: config.maxPromptChars,
      newsFailurePolicy: config.news.failurePolicy,
      concurrentFetch: config.concurrentFetch,
    }),
    request: {
      query: config.news.query,
      tickers: config.market.tickers,
      range: lookbackDays > 0 ? lookbackRange(now(), lookbackDays) : undefined,
      pageSize: config.news.pageSize,
      modelId: config.summary.model,
      timeoutMs: config.summary.timeoutMs,
    },
  };
}

export function createDashboardSession(
  config: PipelineConfig,
  overrides: FactoryOverrides = {}
): DashboardSession {
  return new DashboardSession({
    ...createComponents(config, overrides),
    modelId: config.summary.model,
    summaryTimeoutMs: config.summary.timeoutMs,
    pageSize: config.news.pageSize,
    maxPromptChars: config.maxPromptChars,
    cacheTtlMs: config.cacheTtlSeconds * 1000,
    now: overrides.now,
  });
}
