export * from "./domain/types";
export * from "./domain/errors";
export * from "./news/news_fetcher";
export * from "./market/market_data_fetcher";
export * from "./reporting/prompt_composer";
export { MARKET_SUMMARY_TEMPLATE } from "./reporting/prompts/market_summary";
export * from "./ai/summary_client";
export * from "./ai/transports/types";
export { createInferenceTransport } from "./ai/transports/inference";
export { createChatTransport } from "./ai/transports/chat";
export { loadSummaryConfig } from "./ai/config";
export type { SummaryConfig } from "./ai/config";
export * from "./pipeline/orchestrator";
export * from "./pipeline/dashboard_session";
export * from "./pipeline/cached_sources";
export { loadPipelineConfig } from "./pipeline/config";
export type { PipelineConfig } from "./pipeline/config";
export * from "./pipeline/factory";
