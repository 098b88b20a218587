/**
 * Interactive front-end adapter.
 *
 * Each user action maps to one explicit call: `loadMarketView` when the
 * sidebar inputs change, `generateSummary` when the user asks for a summary.
 * A short-lived read-through cache absorbs repeated calls for the same inputs.
 * Starting a new load or summary aborts the previous one of the same kind;
 * `cancel` aborts both.
 */
import type { SummaryClient } from "../ai/summary_client";
import {
  CancelledError,
  PipelineError,
  TickerNotFoundError,
  toPipelineError,
} from "../domain/errors";
import type { DateRange, Headline, PricePoint, Quote } from "../domain/types";
import type { MarketDataFetcher } from "../market/market_data_fetcher";
import { lookbackRange, normalizeTickers } from "../market/market_data_fetcher";
import type { NewsFetcher } from "../news/news_fetcher";
import { getLogger } from "../util/logger";
import { CachedSources, createCachedSources } from "./cached_sources";
import {
  createOrchestrator,
  DEFAULT_PAGE_SIZE,
  Orchestrator,
  RunOutcome,
  StateListener,
} from "./orchestrator";

export const DEFAULT_DASHBOARD_TICKER = "AAPL";
export const DEFAULT_LOOKBACK_DAYS = 30;

export interface DashboardInput {
  tickers?: string[];
  range?: DateRange;
  /** Defaults to the tickers joined with OR */
  query?: string;
}

export interface MarketView {
  tickers: string[];
  range: DateRange;
  headlines: Headline[];
  quotes: Record<string, Quote>;
  /** Close series per ticker, ready for a line chart */
  chart: Record<string, PricePoint[]>;
  tickerErrors: TickerNotFoundError[];
  newsError?: PipelineError;
  marketError?: PipelineError;
}

export interface DashboardSessionOptions {
  newsFetcher: NewsFetcher;
  marketDataFetcher: MarketDataFetcher;
  summaryClient: SummaryClient;
  modelId: string;
  summaryTimeoutMs?: number;
  pageSize?: number;
  maxPromptChars?: number;
  cacheTtlMs?: number;
  now?: () => Date;
}

function viewError(reason: unknown, signal: AbortSignal): PipelineError {
  if (signal.aborted && !(reason instanceof CancelledError)) {
    return new CancelledError("Market view cancelled", { cause: reason });
  }
  return toPipelineError(reason);
}

export class DashboardSession {
  private readonly logger = getLogger("pipeline/dashboard_session");
  private readonly sources: CachedSources;
  private readonly orchestrator: Orchestrator;
  private readonly now: () => Date;
  private inFlight: AbortController | undefined;
  private viewLoad: AbortController | undefined;

  constructor(private readonly options: DashboardSessionOptions) {
    this.now = options.now ?? (() => new Date());
    this.sources = createCachedSources({
      newsFetcher: options.newsFetcher,
      marketDataFetcher: options.marketDataFetcher,
      ttlMs: options.cacheTtlMs ?? 5 * 60 * 1000,
      now: () => this.now().getTime(),
    });
    this.orchestrator = createOrchestrator({
      newsFetcher: this.sources.newsFetcher,
      marketDataFetcher: this.sources.marketDataFetcher,
      summaryClient: options.summaryClient,
      maxPromptChars: options.maxPromptChars,
      concurrentFetch: true,
      // A failed news search should not hide the chart or block the summary
      newsFailurePolicy: "continue",
    });
  }

  resolveInput(input: DashboardInput = {}): {
    tickers: string[];
    range: DateRange;
    query: string;
  } {
    const tickers = normalizeTickers(input.tickers ?? []);
    const effective = tickers.length > 0 ? tickers : [DEFAULT_DASHBOARD_TICKER];
    return {
      tickers: effective,
      range: input.range ?? lookbackRange(this.now(), DEFAULT_LOOKBACK_DAYS),
      query: input.query?.trim() || effective.join(" OR "),
    };
  }

  async loadMarketView(input: DashboardInput = {}): Promise<MarketView> {
    this.viewLoad?.abort(new CancelledError("Superseded by a newer view"));
    const controller = new AbortController();
    this.viewLoad = controller;
    const { signal } = controller;
    const { tickers, range, query } = this.resolveInput(input);

    try {
      const [news, market] = await Promise.allSettled([
        this.sources.newsFetcher.fetchNews(
          query,
          this.options.pageSize ?? DEFAULT_PAGE_SIZE,
          { signal }
        ),
        this.sources.marketDataFetcher.fetchQuotes(tickers, range, { signal }),
      ]);

      const view: MarketView = {
        tickers,
        range,
        headlines: [],
        quotes: {},
        chart: {},
        tickerErrors: [],
      };
      if (news.status === "fulfilled") {
        view.headlines = news.value;
      } else {
        view.newsError = viewError(news.reason, signal);
        this.logger.warn({ error: view.newsError.message }, "headlines unavailable");
      }
      if (market.status === "fulfilled") {
        view.quotes = market.value.quotes;
        view.tickerErrors = market.value.errors;
        for (const [ticker, quote] of Object.entries(market.value.quotes)) {
          view.chart[ticker] = [...(quote.series ?? [])];
        }
      } else {
        view.marketError = viewError(market.reason, signal);
        this.logger.warn({ error: view.marketError.message }, "market data unavailable");
      }
      return view;
    } finally {
      if (this.viewLoad === controller) this.viewLoad = undefined;
    }
  }

  async generateSummary(
    input: DashboardInput = {},
    onStateChange?: StateListener
  ): Promise<RunOutcome> {
    this.cancelSummary();
    const controller = new AbortController();
    this.inFlight = controller;
    const { tickers, range, query } = this.resolveInput(input);

    try {
      return await this.orchestrator.run(
        {
          query,
          tickers,
          range,
          pageSize: this.options.pageSize,
          modelId: this.options.modelId,
          timeoutMs: this.options.summaryTimeoutMs,
        },
        { signal: controller.signal, onStateChange }
      );
    } finally {
      if (this.inFlight === controller) this.inFlight = undefined;
    }
  }

  /** Aborts the market view load and the summary in flight, if any. */
  cancel(): void {
    if (this.viewLoad) {
      this.logger.debug("cancelling in-flight market view");
      this.viewLoad.abort(new CancelledError("Market view cancelled"));
      this.viewLoad = undefined;
    }
    this.cancelSummary();
  }

  private cancelSummary(): void {
    if (!this.inFlight) return;
    this.logger.debug("cancelling in-flight summary");
    this.inFlight.abort(new CancelledError("Superseded by a newer request"));
    this.inFlight = undefined;
  }

  get busy(): boolean {
    return this.inFlight !== undefined || this.viewLoad !== undefined;
  }
}
