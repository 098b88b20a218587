/**
 * Pipeline state machine:
 *   Idle -> FetchingNews -> FetchingMarket -> Composing -> Summarizing -> Done | Failed
 *
 * `run` never throws. Any component error ends the run in `Failed` with the
 * original typed error attached; cancellation ends it in `Failed` with a
 * CancelledError. The only join point is before composition.
 */
import crypto from "crypto";
import {
  CancelledError,
  NewsFetchError,
  PipelineError,
  TickerNotFoundError,
  toPipelineError,
} from "../domain/errors";
import type { DateRange, Headline, Prompt, Quote, Summary } from "../domain/types";
import type { MarketDataFetcher, QuoteBatch } from "../market/market_data_fetcher";
import { normalizeTickers } from "../market/market_data_fetcher";
import type { NewsFetcher } from "../news/news_fetcher";
import type { SummaryClient } from "../ai/summary_client";
import { compose } from "../reporting/prompt_composer";
import { MARKET_SUMMARY_TEMPLATE } from "../reporting/prompts/market_summary";
import { linkSignals } from "../util/async";
import { withRunContext } from "../util/logger";

export type OrchestratorStatus =
  | "Idle"
  | "FetchingNews"
  | "FetchingMarket"
  | "Composing"
  | "Summarizing"
  | "Done"
  | "Failed";

export type NewsFailurePolicy = "abort" | "continue";

export interface SummaryRequest {
  query: string;
  tickers: readonly string[];
  range?: DateRange;
  pageSize?: number;
  modelId: string;
  timeoutMs?: number;
  template?: string;
}

export interface DoneState {
  status: "Done";
  runId: string;
  summary: Summary;
  prompt: Prompt;
  // display-only pass-throughs
  headlines: Headline[];
  quotes: Record<string, Quote>;
  tickerErrors: TickerNotFoundError[];
  warnings: PipelineError[];
}

export interface FailedState {
  status: "Failed";
  runId: string;
  error: PipelineError;
}

export type RunOutcome = DoneState | FailedState;

export type StateListener = (
  next: OrchestratorStatus,
  previous: OrchestratorStatus
) => void;

export interface RunOptions {
  signal?: AbortSignal;
  onStateChange?: StateListener;
}

export interface OrchestratorDependencies {
  newsFetcher: NewsFetcher;
  marketDataFetcher: MarketDataFetcher;
  summaryClient: SummaryClient;
  maxPromptChars?: number;
  /** Issue news and market requests concurrently */
  concurrentFetch?: boolean;
  newsFailurePolicy?: NewsFailurePolicy;
  idFactory?: () => string;
}

export interface Orchestrator {
  run(request: SummaryRequest, options?: RunOptions): Promise<RunOutcome>;
}

export const DEFAULT_PAGE_SIZE = 5;
export const DEFAULT_SUMMARY_TIMEOUT_MS = 30_000;

export function createOrchestrator(deps: OrchestratorDependencies): Orchestrator {
  const newsFailurePolicy = deps.newsFailurePolicy ?? "abort";
  const idFactory = deps.idFactory ?? (() => crypto.randomUUID());

  return {
    async run(request, options = {}) {
      const { signal, onStateChange } = options;
      const runId = idFactory();
      const logger = withRunContext("pipeline/orchestrator", {
        runId,
        tickers: request.tickers,
      });
      const warnings: PipelineError[] = [];
      let status: OrchestratorStatus = "Idle";

      const transition = (next: OrchestratorStatus) => {
        const previous = status;
        status = next;
        logger.debug({ from: previous, to: next }, "state transition");
        onStateChange?.(next, previous);
      };
      const ensureActive = () => {
        if (signal?.aborted) throw new CancelledError("Run cancelled");
      };

      const loadNews = async (s?: AbortSignal): Promise<Headline[]> => {
        try {
          return await deps.newsFetcher.fetchNews(
            request.query,
            request.pageSize ?? DEFAULT_PAGE_SIZE,
            { signal: s }
          );
        } catch (err) {
          if (newsFailurePolicy === "continue" && err instanceof NewsFetchError) {
            logger.warn({ error: err.message }, "continuing without headlines");
            warnings.push(err);
            return [];
          }
          throw err;
        }
      };
      const loadQuotes = (s?: AbortSignal): Promise<QuoteBatch> =>
        deps.marketDataFetcher.fetchQuotes(request.tickers, request.range, {
          signal: s,
        });

      try {
        ensureActive();
        let headlines: Headline[];
        let batch: QuoteBatch;

        if (deps.concurrentFetch) {
          const { controller, dispose } = linkSignals(signal);
          const failFast = <T>(p: Promise<T>) =>
            p.catch((err: unknown) => {
              controller.abort();
              throw err;
            });
          try {
            transition("FetchingNews");
            const newsTask = failFast(loadNews(controller.signal));
            transition("FetchingMarket");
            const quoteTask = failFast(loadQuotes(controller.signal));
            [headlines, batch] = await Promise.all([newsTask, quoteTask]);
          } finally {
            dispose();
          }
        } else {
          transition("FetchingNews");
          headlines = await loadNews(signal);
          ensureActive();
          transition("FetchingMarket");
          batch = await loadQuotes(signal);
        }
        ensureActive();

        if (Object.keys(batch.quotes).length === 0) {
          throw (
            batch.errors[0] ??
            new TickerNotFoundError(normalizeTickers(request.tickers).join(","))
          );
        }

        transition("Composing");
        const prompt = compose(
          headlines,
          batch.quotes,
          request.template ?? MARKET_SUMMARY_TEMPLATE,
          { maxLength: deps.maxPromptChars }
        );
        logger.debug(
          {
            promptChars: prompt.text.length,
            headlines: prompt.headlineCount,
            omittedHeadlines: prompt.omittedHeadlines,
          },
          "prompt composed"
        );
        ensureActive();

        transition("Summarizing");
        const summary = await deps.summaryClient.summarize(
          prompt,
          request.modelId,
          request.timeoutMs ?? DEFAULT_SUMMARY_TIMEOUT_MS,
          { signal }
        );

        transition("Done");
        logger.info({ modelId: summary.modelId }, "run completed");
        return {
          status: "Done",
          runId,
          summary,
          prompt,
          headlines,
          quotes: batch.quotes,
          tickerErrors: batch.errors,
          warnings,
        };
      } catch (err) {
        const error =
          signal?.aborted && !(err instanceof CancelledError)
            ? new CancelledError("Run cancelled", { cause: err })
            : toPipelineError(err);
        const failedIn = status;
        transition("Failed");
        if (error instanceof CancelledError) {
          logger.info({ failedIn }, "run cancelled");
        } else {
          logger.error({ failedIn, kind: error.kind, error: error.message }, "run failed");
        }
        return { status: "Failed", runId, error };
      }
    },
  };
}
