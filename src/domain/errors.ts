/**
 * Error taxonomy surfaced by the pipeline. Every error carries a stable
 * `kind` so callers (console, dashboard) can branch without instanceof chains.
 */

export type PipelineErrorKind =
  | "news_fetch"
  | "ticker_not_found"
  | "market_data_fetch"
  | "prompt_too_large"
  | "summary_auth"
  | "summary_quota"
  | "summary_rejected"
  | "summary_unavailable"
  | "cancelled"
  | "internal";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class NewsFetchError extends PipelineError {
  constructor(cause: unknown) {
    super("news_fetch", `News fetch failed: ${describe(cause)}`, { cause });
  }
}

export class TickerNotFoundError extends PipelineError {
  readonly ticker: string;

  constructor(ticker: string) {
    super("ticker_not_found", `Ticker not found: ${ticker}`);
    this.ticker = ticker;
  }
}

export class MarketDataFetchError extends PipelineError {
  readonly ticker: string | undefined;

  constructor(cause: unknown, ticker?: string) {
    const scope = ticker ? ` for ${ticker}` : "";
    super("market_data_fetch", `Market data fetch failed${scope}: ${describe(cause)}`, {
      cause,
    });
    this.ticker = ticker;
  }
}

export class PromptTooLargeError extends PipelineError {
  readonly length: number;
  readonly maxLength: number;

  constructor(length: number, maxLength: number) {
    super(
      "prompt_too_large",
      `Prompt needs ${length} characters even after truncation (max ${maxLength})`
    );
    this.length = length;
    this.maxLength = maxLength;
  }
}

export class SummaryAuthError extends PipelineError {
  readonly status: number;

  constructor(status: number, cause?: unknown) {
    super("summary_auth", `Inference endpoint rejected the credential (HTTP ${status})`, {
      cause,
    });
    this.status = status;
  }
}

export class SummaryQuotaError extends PipelineError {
  readonly status: number;

  constructor(status: number, cause?: unknown) {
    super("summary_quota", `Inference quota exhausted (HTTP ${status})`, { cause });
    this.status = status;
  }
}

export class SummaryRejectedError extends PipelineError {
  readonly status: number;

  constructor(status: number, cause?: unknown) {
    super("summary_rejected", `Inference request rejected (HTTP ${status})`, { cause });
    this.status = status;
  }
}

export class SummaryUnavailableError extends PipelineError {
  readonly lastCause: unknown;
  readonly attempts: number;

  constructor(lastCause: unknown, attempts: number) {
    super(
      "summary_unavailable",
      `Summary unavailable after ${attempts} attempt(s): ${describe(lastCause)}`,
      { cause: lastCause }
    );
    this.lastCause = lastCause;
    this.attempts = attempts;
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Operation cancelled", options?: ErrorOptions) {
    super("cancelled", message, options);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/**
 * Normalizes anything thrown into a PipelineError, keeping typed errors verbatim.
 */
export function toPipelineError(err: unknown): PipelineError {
  if (isPipelineError(err)) return err;
  return new PipelineError("internal", describe(err), { cause: err });
}
