/**
 * News headlines from a NewsAPI-compatible search endpoint.
 *
 * Endpoint: GET {baseUrl}/everything?q=&pageSize=&sortBy=publishedAt&language=en&apiKey=
 * Results come back newest first; that order is kept and later used as
 * priority by the prompt composer.
 */
import { z } from "zod";
import { CancelledError, NewsFetchError } from "../domain/errors";
import type { Headline } from "../domain/types";
import { sleep as defaultSleep, Sleep } from "../util/async";
import {
  buildUrl,
  FetchLike,
  HttpStatusError,
  MalformedResponseError,
  requestJson,
} from "../util/http";
import { getLogger } from "../util/logger";

export const NEWS_PROVIDER_MAX_PAGE_SIZE = 100;

// NewsAPI replaces taken-down articles with this tombstone
const REMOVED_MARKER = "[Removed]";

const articleSchema = z.object({
  source: z
    .object({ id: z.string().nullish(), name: z.string().nullish() })
    .nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
});

const successSchema = z.object({
  status: z.literal("ok"),
  totalResults: z.number().optional(),
  articles: z.array(articleSchema),
});

const errorSchema = z.object({
  status: z.literal("error"),
  code: z.string().optional(),
  message: z.string().optional(),
});

export interface NewsFetcherOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Total attempts per call, including the first one */
  attempts?: number;
  /** Fixed wait between attempts */
  backoffMs?: number;
  fetchFn?: FetchLike;
  sleep?: Sleep;
}

export interface FetchNewsCallOptions {
  signal?: AbortSignal;
}

export interface NewsFetcher {
  fetchNews(
    query: string,
    pageSize: number,
    options?: FetchNewsCallOptions
  ): Promise<Headline[]>;
}

function toHeadline(article: z.infer<typeof articleSchema>): Headline | null {
  const title = (article.title ?? "").trim();
  if (!title || title === REMOVED_MARKER) return null;
  const published = article.publishedAt ? new Date(article.publishedAt) : null;
  return {
    title,
    source: (article.source?.name ?? "").trim() || "Unknown",
    url: (article.url ?? "").trim(),
    publishedAt:
      published && !Number.isNaN(published.getTime())
        ? published.toISOString()
        : "",
  };
}

function parseArticles(status: number, body: unknown): Headline[] {
  const parsed = successSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Unexpected news payload (HTTP ${status}): ${parsed.error.issues[0]?.message ?? "invalid"}`
    );
  }
  return parsed.data.articles
    .map(toHeadline)
    .filter((h): h is Headline => h !== null);
}

export function createNewsFetcher(options: NewsFetcherOptions): NewsFetcher {
  const logger = getLogger("news/news_fetcher");
  const baseUrl = options.baseUrl ?? "https://newsapi.org/v2";
  const timeoutMs = options.timeoutMs ?? 10_000;
  const attempts = Math.max(1, options.attempts ?? 1);
  const backoffMs = options.backoffMs ?? 500;
  const fetchFn: FetchLike = options.fetchFn ?? fetch;
  const wait = options.sleep ?? defaultSleep;

  async function attemptOnce(
    query: string,
    pageSize: number,
    signal?: AbortSignal
  ): Promise<Headline[]> {
    const url = buildUrl(baseUrl, "everything", {
      q: query,
      pageSize,
      sortBy: "publishedAt",
      language: "en",
      apiKey: options.apiKey,
    });
    const res = await requestJson(
      fetchFn,
      url,
      { method: "GET", headers: { Accept: "application/json" } },
      { timeoutMs, signal }
    );
    if (!res.ok) {
      const providerError = errorSchema.safeParse(res.body);
      const detail = providerError.success
        ? providerError.data.message ?? providerError.data.code
        : undefined;
      throw new HttpStatusError(res.status, detail ?? res.statusText, res.body);
    }
    return parseArticles(res.status, res.body);
  }

  return {
    async fetchNews(query, pageSize, callOptions = {}) {
      if (
        !Number.isInteger(pageSize) ||
        pageSize < 1 ||
        pageSize > NEWS_PROVIDER_MAX_PAGE_SIZE
      ) {
        throw new RangeError(
          `pageSize must be an integer between 1 and ${NEWS_PROVIDER_MAX_PAGE_SIZE}, got ${pageSize}`
        );
      }
      const { signal } = callOptions;
      let lastError: unknown;

      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          const headlines = await attemptOnce(query, pageSize, signal);
          logger.debug(
            { query, pageSize, count: headlines.length, attempt },
            "news fetched"
          );
          return headlines;
        } catch (err) {
          if (err instanceof CancelledError) throw err;
          lastError = err;
          const message = err instanceof Error ? err.message : String(err);
          if (attempt >= attempts) break;
          logger.warn(
            { query, attempt, delayMs: backoffMs, error: message },
            "news fetch retry"
          );
          await wait(backoffMs, signal);
        }
      }

      logger.error(
        {
          query,
          attempts,
          error: lastError instanceof Error ? lastError.message : String(lastError),
        },
        "news fetch failed"
      );
      throw new NewsFetchError(lastError);
    },
  };
}
