/**
 * Thin HTTP layer shared by the provider clients.
 *
 * Every call carries its own timeout and is linked to the caller's
 * AbortSignal. Failures are raised as typed errors so each component can
 * classify them (retryable or not) and wrap them in its own error kind.
 */
import { CancelledError } from "../domain/errors";

export type HttpResponse = Pick<
  Response,
  "ok" | "status" | "statusText" | "text"
>;

/** Injected fetch; the global `fetch` satisfies it. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<HttpResponse>;

export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, statusText: string, body?: unknown) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}

export interface HttpCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface JsonResponse {
  status: number;
  statusText: string;
  ok: boolean;
  /** Parsed JSON body, or undefined when the body was empty or not JSON */
  body: unknown;
}

export function buildUrl(
  base: string,
  path: string,
  params: Record<string, string | number | boolean | undefined> = {}
): string {
  const url = new URL(path, base.endsWith("/") ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Performs one HTTP request and reads the body as JSON, all under `timeoutMs`.
 * Non-2xx responses are returned, not thrown; callers decide what a status means.
 */
export async function requestJson(
  fetchFn: FetchLike,
  url: string,
  init: RequestInit,
  options: HttpCallOptions
): Promise<JsonResponse> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetchFn(url, { ...init, signal: controller.signal });
    const text = await res.text();
    return {
      status: res.status,
      statusText: res.statusText,
      ok: res.ok,
      body: parseJson(text),
    };
  } catch (err) {
    if (signal?.aborted) throw new CancelledError("Request cancelled", { cause: err });
    if (timedOut) throw new TimeoutError(timeoutMs);
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Network failure: ${message}`, { cause: err });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
