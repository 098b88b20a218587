/**
 * Pure prompt assembly: headlines + quotes + template -> bounded Prompt.
 *
 * Records are rendered whole. When the text is over the limit, records are
 * dropped from the tail (lowest priority) one at a time: headlines first,
 * then quotes, always keeping at least one quote.
 */
import { PromptTooLargeError } from "../domain/errors";
import type { Headline, Prompt, Quote, QuoteMap } from "../domain/types";
import { MARKET_SUMMARY_TEMPLATE, NO_HEADLINES_TEXT } from "./prompts/market_summary";

export const DEFAULT_MAX_PROMPT_CHARS = 25_000;

export interface ComposeOptions {
  maxLength?: number;
}

function signed(value: number, digits = 2): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

export function formatHeadline(headline: Headline): string {
  const when = headline.publishedAt ? `${headline.publishedAt} | ` : "";
  return `- ${when}${headline.title} (${headline.source})`;
}

export function formatQuote(quote: Quote): string {
  const currency = quote.currency && quote.currency !== "USD" ? ` ${quote.currency}` : "";
  const lines = [
    `TICKER: ${quote.ticker}`,
    `Latest price: $${quote.price.toFixed(2)}${currency}`,
    `Change vs prior close: ${signed(quote.changeAbsolute)} (${signed(quote.changePercent)}%)`,
  ];
  if (quote.asOf) lines.push(`As of: ${quote.asOf}`);

  const series = quote.series ?? [];
  if (series.length >= 2) {
    const first = series[0].price;
    const last = series[series.length - 1].price;
    const pct = first !== 0 ? ((last - first) / first) * 100 : 0;
    const trend = pct > 0 ? "up" : pct < 0 ? "down" : "flat";
    lines.push(`Change over period: ${signed(pct)}% (${trend})`);
  }
  if (series.length > 0) {
    lines.push("Recent closes:");
    for (const point of series) {
      lines.push(`${point.timestamp.slice(0, 10)}: ${point.price.toFixed(2)}`);
    }
  }
  return lines.join("\n");
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

function render(
  template: string,
  headlines: readonly Headline[],
  omittedHeadlines: number,
  quotes: readonly Quote[],
  omittedQuotes: number,
  tickers: readonly string[]
): string {
  const headlineLines = headlines.map(formatHeadline);
  if (omittedHeadlines > 0) {
    headlineLines.push(`(${omittedHeadlines} older headline(s) omitted for length)`);
  }
  const quoteBlocks = quotes.map(formatQuote);
  if (omittedQuotes > 0) {
    quoteBlocks.push(`(${omittedQuotes} ticker(s) omitted for length)`);
  }
  return fill(template, {
    tickers: tickers.join(", "),
    headlines: headlineLines.length > 0 ? headlineLines.join("\n") : NO_HEADLINES_TEXT,
    quotes: quoteBlocks.join("\n\n"),
  });
}

export function compose(
  headlines: readonly Headline[],
  quotes: QuoteMap,
  template: string = MARKET_SUMMARY_TEMPLATE,
  options: ComposeOptions = {}
): Prompt {
  const maxLength = options.maxLength ?? DEFAULT_MAX_PROMPT_CHARS;
  const allQuotes = Object.values(quotes);
  if (allQuotes.length === 0) {
    throw new RangeError("A prompt needs at least one quote");
  }
  // The tickers line always names every requested ticker
  const tickers = allQuotes.map(q => q.ticker);

  let keptHeadlines = headlines.length;
  let keptQuotes = allQuotes.length;

  for (;;) {
    const text = render(
      template,
      headlines.slice(0, keptHeadlines),
      headlines.length - keptHeadlines,
      allQuotes.slice(0, keptQuotes),
      allQuotes.length - keptQuotes,
      tickers
    );
    if (text.length <= maxLength) {
      return {
        text,
        maxLength,
        headlineCount: keptHeadlines,
        quoteCount: keptQuotes,
        omittedHeadlines: headlines.length - keptHeadlines,
        omittedQuotes: allQuotes.length - keptQuotes,
      };
    }
    if (keptHeadlines > 0) {
      keptHeadlines--;
    } else if (keptQuotes > 1) {
      keptQuotes--;
    } else {
      throw new PromptTooLargeError(text.length, maxLength);
    }
  }
}
