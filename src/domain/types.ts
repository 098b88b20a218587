/**
 * Domain records flowing through the summary pipeline.
 * Timestamps are ISO8601 strings; records are never mutated once built.
 */

export interface Headline {
  readonly title: string;
  /** Provider/source name, e.g. "Reuters" */
  readonly source: string;
  readonly url: string;
  readonly publishedAt: string;
}

export interface PricePoint {
  readonly timestamp: string;
  readonly price: number;
}

export interface Quote {
  readonly ticker: string;
  readonly price: number;
  readonly changeAbsolute: number;
  readonly changePercent: number;
  /** Provider time of the latest price; may lag for delayed feeds */
  readonly asOf: string;
  readonly currency?: string;
  /** Daily closes, oldest first. Only present when a range was requested. */
  readonly series?: readonly PricePoint[];
}

/** Inclusive calendar range, YYYY-MM-DD */
export interface DateRange {
  readonly from: string;
  readonly to: string;
}

export type QuoteMap = Readonly<Record<string, Quote>>;

export interface Prompt {
  readonly text: string;
  readonly maxLength: number;
  readonly headlineCount: number;
  readonly quoteCount: number;
  readonly omittedHeadlines: number;
  readonly omittedQuotes: number;
}

export interface Summary {
  readonly text: string;
  readonly modelId: string;
  readonly generatedAt: string;
  /** The exact prompt this summary was generated from */
  readonly prompt: Prompt;
}
