/**
 * Latest quotes (and optional daily series) per ticker from the Yahoo Finance chart API.
 *
 * Endpoint: GET {baseUrl}/v8/finance/chart/{ticker}
 *   - quote window: range=5d&interval=1d (latest price + previous close)
 *   - series window: period1/period2 epoch seconds, interval=1d
 * Behavior:
 *   - Normalizes and de-duplicates requested tickers, keeping request order.
 *   - Unknown symbols are reported per ticker; the rest of the batch continues.
 *   - Transport failures abort the whole batch and cancel in-flight requests.
 */
import { z } from "zod";
import {
  CancelledError,
  MarketDataFetchError,
  TickerNotFoundError,
} from "../domain/errors";
import type { DateRange, PricePoint, Quote } from "../domain/types";
import { linkSignals } from "../util/async";
import {
  buildUrl,
  FetchLike,
  HttpStatusError,
  MalformedResponseError,
  requestJson,
} from "../util/http";
import { getLogger } from "../util/logger";

const DAY_SECONDS = 24 * 60 * 60;

const chartResultSchema = z.object({
  meta: z.object({
    symbol: z.string().optional(),
    currency: z.string().nullish(),
    regularMarketPrice: z.number().nullish(),
    regularMarketTime: z.number().nullish(),
    chartPreviousClose: z.number().nullish(),
    previousClose: z.number().nullish(),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(
      z.object({
        close: z.array(z.number().nullable()).optional(),
      })
    ),
  }),
});

const chartSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z
      .object({ code: z.string(), description: z.string().nullish() })
      .nullable()
      .optional(),
  }),
});

type ChartResult = z.infer<typeof chartResultSchema>;

export interface QuoteBatch {
  /** Resolved quotes keyed by normalized ticker, in request order */
  quotes: Record<string, Quote>;
  /** One entry per ticker the provider does not know */
  errors: TickerNotFoundError[];
}

export interface MarketDataFetcherOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchLike;
}

export interface FetchQuotesCallOptions {
  signal?: AbortSignal;
}

export interface MarketDataFetcher {
  fetchQuotes(
    tickers: Iterable<string>,
    range?: DateRange,
    options?: FetchQuotesCallOptions
  ): Promise<QuoteBatch>;
}

export function normalizeTickers(tickers: Iterable<string>): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const raw of tickers) {
    const norm = String(raw || "")
      .trim()
      .toUpperCase();
    if (!norm || seen.has(norm)) continue;
    seen.add(norm);
    ordered.push(norm);
  }
  return ordered;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toEpochWindow(range: DateRange): {
  period1: number;
  period2: number;
} {
  if (!DATE_PATTERN.test(range.from) || !DATE_PATTERN.test(range.to)) {
    throw new RangeError(
      `Date range must use YYYY-MM-DD, got ${range.from}..${range.to}`
    );
  }
  const from = Date.parse(`${range.from}T00:00:00Z`);
  const to = Date.parse(`${range.to}T00:00:00Z`);
  if (Number.isNaN(from) || Number.isNaN(to) || from > to) {
    throw new RangeError(`Invalid date range ${range.from}..${range.to}`);
  }
  // `to` is inclusive: extend to the end of that day
  return { period1: from / 1000, period2: to / 1000 + DAY_SECONDS };
}

/**
 * Calendar range covering the `days` before `now` through `now` (UTC dates).
 */
export function lookbackRange(now: Date, days: number): DateRange {
  const start = new Date(now.getTime() - days * DAY_SECONDS * 1000);
  return {
    from: start.toISOString().slice(0, 10),
    to: now.toISOString().slice(0, 10),
  };
}

function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

function toIso(epochSeconds: number | null | undefined): string {
  return epochSeconds != null ? new Date(epochSeconds * 1000).toISOString() : "";
}

function closesOf(result: ChartResult): Array<{ t: number; close: number }> {
  const timestamps = result.timestamp ?? [];
  const closes = result.indicators.quote[0]?.close ?? [];
  const points: Array<{ t: number; close: number }> = [];
  timestamps.forEach((t, i) => {
    const close = closes[i];
    if (typeof close === "number" && Number.isFinite(close)) {
      points.push({ t, close });
    }
  });
  return points;
}

/** Returns null when the provider has a chart but no usable price in it. */
export function buildQuote(ticker: string, result: ChartResult): Quote | null {
  const points = closesOf(result);
  const last = points[points.length - 1];
  const price = result.meta.regularMarketPrice ?? last?.close;
  if (price == null) return null;

  const previous =
    points.length >= 2
      ? points[points.length - 2].close
      : result.meta.chartPreviousClose ?? result.meta.previousClose ?? price;
  const change = price - previous;

  return {
    ticker,
    price: roundTo(price, 6),
    changeAbsolute: roundTo(change, 6),
    changePercent: previous !== 0 ? roundTo((change / previous) * 100, 6) : 0,
    asOf: toIso(result.meta.regularMarketTime ?? last?.t),
    currency: result.meta.currency ?? undefined,
  };
}

function buildSeries(result: ChartResult): PricePoint[] {
  return closesOf(result).map(({ t, close }) => ({
    timestamp: toIso(t),
    price: roundTo(close, 6),
  }));
}

type ChartLookup = { found: true; result: ChartResult } | { found: false };

export function createMarketDataFetcher(
  options: MarketDataFetcherOptions = {}
): MarketDataFetcher {
  const logger = getLogger("market/market_data_fetcher");
  const baseUrl = options.baseUrl ?? "https://query1.finance.yahoo.com";
  const timeoutMs = options.timeoutMs ?? 10_000;
  const fetchFn: FetchLike = options.fetchFn ?? fetch;

  async function loadChart(
    ticker: string,
    params: Record<string, string | number>,
    signal: AbortSignal
  ): Promise<ChartLookup> {
    const url = buildUrl(
      baseUrl,
      `v8/finance/chart/${encodeURIComponent(ticker)}`,
      params
    );
    const res = await requestJson(
      fetchFn,
      url,
      {
        method: "GET",
        headers: {
          Accept: "application/json",
          "User-Agent": "Mozilla/5.0 (compatible; market-summary/0.1)",
        },
      },
      { timeoutMs, signal }
    );

    const parsed = chartSchema.safeParse(res.body);
    if (res.status === 404) return { found: false };
    if (!res.ok) throw new HttpStatusError(res.status, res.statusText, res.body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected chart payload for ${ticker}: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }
    const { result, error } = parsed.data.chart;
    if (error?.code === "Not Found") return { found: false };
    const first = result?.[0];
    if (!first) return { found: false };
    return { found: true, result: first };
  }

  async function fetchOne(
    ticker: string,
    window: { period1: number; period2: number } | undefined,
    signal: AbortSignal
  ): Promise<Quote | TickerNotFoundError> {
    const latest = await loadChart(ticker, { range: "5d", interval: "1d" }, signal);
    const quote = latest.found ? buildQuote(ticker, latest.result) : null;
    if (!quote) {
      logger.debug({ ticker }, "ticker not found");
      return new TickerNotFoundError(ticker);
    }
    if (!window) return quote;

    const history = await loadChart(
      ticker,
      { period1: window.period1, period2: window.period2, interval: "1d" },
      signal
    );
    return {
      ...quote,
      series: history.found ? buildSeries(history.result) : [],
    };
  }

  return {
    async fetchQuotes(tickers, range, callOptions = {}) {
      const normalized = normalizeTickers(tickers);
      if (normalized.length === 0) {
        throw new RangeError("At least one ticker is required");
      }
      const window = range ? toEpochWindow(range) : undefined;
      const { controller, dispose } = linkSignals(callOptions.signal);

      try {
        const outcomes = await Promise.all(
          normalized.map(async ticker => {
            try {
              return await fetchOne(ticker, window, controller.signal);
            } catch (err) {
              if (err instanceof CancelledError) throw err;
              // First transport failure cancels the siblings
              controller.abort();
              logger.error(
                { ticker, error: err instanceof Error ? err.message : String(err) },
                "market data fetch failed"
              );
              throw new MarketDataFetchError(err, ticker);
            }
          })
        );

        const batch: QuoteBatch = { quotes: {}, errors: [] };
        for (const outcome of outcomes) {
          if (outcome instanceof TickerNotFoundError) {
            batch.errors.push(outcome);
          } else {
            batch.quotes[outcome.ticker] = outcome;
          }
        }
        logger.debug(
          {
            requested: normalized.length,
            resolved: Object.keys(batch.quotes).length,
            notFound: batch.errors.map(e => e.ticker),
          },
          "quotes fetched"
        );
        return batch;
      } finally {
        dispose();
      }
    },
  };
}
