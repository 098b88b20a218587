/**
 * Read-through caching decorators for the two fetchers.
 * News is keyed by (query, pageSize); quotes by (ticker set, date range).
 * Callers get their own copy of the cached collections; the stored entry is never handed out.
 */
import type { Headline } from "../domain/types";
import type { MarketDataFetcher, QuoteBatch } from "../market/market_data_fetcher";
import { normalizeTickers } from "../market/market_data_fetcher";
import type { NewsFetcher } from "../news/news_fetcher";
import { TtlCache } from "../util/cache";
import { getLogger } from "../util/logger";

export interface CachedSources {
  newsFetcher: NewsFetcher;
  marketDataFetcher: MarketDataFetcher;
}

export interface CachedSourcesOptions extends CachedSources {
  ttlMs: number;
  now?: () => number;
}

export function createCachedSources(options: CachedSourcesOptions): CachedSources {
  const logger = getLogger("pipeline/cached_sources");
  const newsCache = new TtlCache<Headline[]>({ ttlMs: options.ttlMs, now: options.now });
  const quoteCache = new TtlCache<QuoteBatch>({ ttlMs: options.ttlMs, now: options.now });

  return {
    newsFetcher: {
      async fetchNews(query, pageSize, callOptions) {
        const key = `${query}|${pageSize}`;
        if (newsCache.get(key)) logger.debug({ query }, "news cache hit");
        const headlines = await newsCache.getOrLoad(key, () =>
          options.newsFetcher.fetchNews(query, pageSize, callOptions)
        );
        return [...headlines];
      },
    },
    marketDataFetcher: {
      async fetchQuotes(tickers, range, callOptions) {
        const tickerList = normalizeTickers(tickers);
        const key = `${[...tickerList].sort().join(",")}|${range ? `${range.from}..${range.to}` : "latest"}`;
        if (quoteCache.get(key)) logger.debug({ tickers: tickerList }, "quote cache hit");
        const batch = await quoteCache.getOrLoad(key, () =>
          options.marketDataFetcher.fetchQuotes(tickerList, range, callOptions)
        );
        return { quotes: { ...batch.quotes }, errors: [...batch.errors] };
      },
    },
  };
}
