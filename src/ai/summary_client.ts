/**
 * Sends a composed prompt to the hosted model and wraps the answer in a Summary.
 *
 * Retry policy:
 * - transient (timeout, network failure, 408, 5xx): bounded retries with
 *   exponential backoff plus random jitter
 * - 401/403 -> SummaryAuthError, 402/429 -> SummaryQuotaError,
 *   other 4xx -> SummaryRejectedError; never retried
 * - malformed or empty answer -> SummaryUnavailableError; never retried
 */
import {
  CancelledError,
  PipelineError,
  SummaryAuthError,
  SummaryQuotaError,
  SummaryRejectedError,
  SummaryUnavailableError,
} from "../domain/errors";
import type { Prompt, Summary } from "../domain/types";
import { sleep as defaultSleep, Sleep } from "../util/async";
import {
  HttpStatusError,
  MalformedResponseError,
  TimeoutError,
  TransportError,
} from "../util/http";
import { getLogger } from "../util/logger";
import type { SummaryTransport } from "./transports/types";

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Extra random delay as a fraction of the computed delay, 0..1 */
  jitterRatio: number;
}

export const DEFAULT_RETRY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterRatio: 0.25,
};

export function computeBackoff(
  retryIndex: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const base = Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, retryIndex),
    policy.maxDelayMs
  );
  return Math.round(base + base * policy.jitterRatio * random());
}

type Classified =
  | { retryable: true }
  | { retryable: false; error: PipelineError };

function classify(err: unknown, attempts: number): Classified {
  if (err instanceof CancelledError) return { retryable: false, error: err };
  if (err instanceof HttpStatusError) {
    const { status } = err;
    if (status === 401 || status === 403) {
      return { retryable: false, error: new SummaryAuthError(status, err) };
    }
    if (status === 402 || status === 429) {
      return { retryable: false, error: new SummaryQuotaError(status, err) };
    }
    if (status === 408 || status >= 500) return { retryable: true };
    return { retryable: false, error: new SummaryRejectedError(status, err) };
  }
  if (err instanceof TimeoutError || err instanceof TransportError) {
    return { retryable: true };
  }
  return { retryable: false, error: new SummaryUnavailableError(err, attempts) };
}

export interface SummarizeCallOptions {
  signal?: AbortSignal;
}

export interface SummaryClient {
  summarize(
    prompt: Prompt,
    modelId: string,
    timeoutMs: number,
    options?: SummarizeCallOptions
  ): Promise<Summary>;
}

export interface SummaryClientOptions {
  transport: SummaryTransport;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export function createSummaryClient(options: SummaryClientOptions): SummaryClient {
  const logger = getLogger("ai/summary_client");
  const policy: RetryPolicy = { ...DEFAULT_RETRY, ...options.retry };
  const wait = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const { transport } = options;

  return {
    async summarize(prompt, modelId, timeoutMs, callOptions = {}) {
      const { signal } = callOptions;
      let lastCause: unknown;

      for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
        if (signal?.aborted) throw new CancelledError();
        const startTime = Date.now();
        try {
          const raw = await transport.generate({
            prompt: prompt.text,
            modelId,
            timeoutMs,
            signal,
          });
          const text = raw.trim();
          if (!text) throw new MalformedResponseError("Model returned an empty answer");

          logger.info(
            {
              transport: transport.name,
              modelId,
              attempt: attempt + 1,
              latencyMs: Date.now() - startTime,
              promptChars: prompt.text.length,
            },
            "summary generated"
          );
          return { text, modelId, generatedAt: now().toISOString(), prompt };
        } catch (err) {
          const verdict = classify(err, attempt + 1);
          const message = err instanceof Error ? err.message : String(err);
          if (!verdict.retryable) {
            logger.error(
              { transport: transport.name, modelId, attempt: attempt + 1, error: message },
              "summary request failed"
            );
            throw verdict.error;
          }
          lastCause = err;
          if (attempt >= policy.maxRetries) break;

          const delayMs = computeBackoff(attempt, policy, random);
          logger.warn(
            { transport: transport.name, modelId, attempt: attempt + 1, delayMs, error: message },
            "summary request retry"
          );
          await wait(delayMs, signal);
        }
      }

      throw new SummaryUnavailableError(lastCause, policy.maxRetries + 1);
    },
  };
}
