import { PromptTooLargeError } from "@src/domain/errors";
import type { Headline, Quote } from "@src/domain/types";
import { compose, formatQuote } from "../prompt_composer";
import { NO_HEADLINES_TEXT } from "../prompts/market_summary";

const dow: Headline = {
  title: "Dow gains as investors await inflation report",
  source: "Reuters",
  url: "https://example.com/dow",
  publishedAt: "2024-06-11T13:45:00.000Z",
};

const aapl: Quote = {
  ticker: "AAPL",
  price: 192.22,
  changeAbsolute: 1.05,
  changePercent: 0.549249,
  asOf: "2024-06-11T20:00:00.000Z",
  currency: "USD",
};

function bareQuote(ticker: string, price: number): Quote {
  return { ticker, price, changeAbsolute: 0, changePercent: 0, asOf: "" };
}

const numbered: Headline[] = [1, 2, 3, 4].map(i => ({
  title: `Headline ${i}`,
  source: "S",
  url: `https://example.com/${i}`,
  publishedAt: "",
}));

const compactTemplate = "{{headlines}}\n{{quotes}}";

describe("compose", () => {
  it("fills the template with headline and quote records", () => {
    const prompt = compose([dow], { AAPL: aapl }, "T: {{tickers}}\nN:\n{{headlines}}\nQ:\n{{quotes}}");

    expect(prompt.text).toBe(
      [
        "T: AAPL",
        "N:",
        "- 2024-06-11T13:45:00.000Z | Dow gains as investors await inflation report (Reuters)",
        "Q:",
        "TICKER: AAPL",
        "Latest price: $192.22",
        "Change vs prior close: +1.05 (+0.55%)",
        "As of: 2024-06-11T20:00:00.000Z",
      ].join("\n")
    );
    expect(prompt).toMatchObject({
      headlineCount: 1,
      quoteCount: 1,
      omittedHeadlines: 0,
      omittedQuotes: 0,
      maxLength: 25_000,
    });
  });

  it("uses the default template when none is given", () => {
    const prompt = compose([dow], { AAPL: aapl });
    expect(prompt.text).toContain("implications for AAPL");
    expect(prompt.text).toContain("NEWS:\n- 2024-06-11T13:45:00.000Z | Dow gains");
    expect(prompt.text).toContain("STOCK DATA:\nTICKER: AAPL");
    expect(prompt.text.endsWith("Answer:")).toBe(true);
  });

  it("states that no headlines were found for an empty set", () => {
    const prompt = compose([], { AAPL: aapl }, compactTemplate);
    expect(prompt.text.startsWith(`${NO_HEADLINES_TEXT}\nTICKER: AAPL`)).toBe(true);
    expect(prompt.headlineCount).toBe(0);
  });

  it("is deterministic for identical inputs", () => {
    const quotes = { AAPL: aapl, MSFT: bareQuote("MSFT", 410) };
    const first = compose(numbered, quotes);
    const second = compose([...numbered], { ...quotes });
    expect(second.text).toBe(first.text);
  });

  it("drops whole headlines from the tail to fit the limit", () => {
    const prompt = compose(numbered, { AAA: bareQuote("AAA", 1) }, compactTemplate, {
      maxLength: 134,
    });

    expect(prompt.text).toBe(
      [
        "- Headline 1 (S)",
        "(3 older headline(s) omitted for length)",
        "TICKER: AAA",
        "Latest price: $1.00",
        "Change vs prior close: 0.00 (0.00%)",
      ].join("\n")
    );
    expect(prompt.text.length).toBeLessThanOrEqual(134);
    expect(prompt.headlineCount).toBe(1);
    expect(prompt.omittedHeadlines).toBe(3);
  });

  it("keeps everything when the full prompt fits", () => {
    const prompt = compose(numbered, { AAA: bareQuote("AAA", 1) }, compactTemplate, {
      maxLength: 135,
    });
    expect(prompt.text.length).toBe(135);
    expect(prompt.omittedHeadlines).toBe(0);
  });

  it("drops trailing quotes once headlines are gone, keeping the first", () => {
    const prompt = compose(
      [],
      { AAA: bareQuote("AAA", 1), BBB: bareQuote("BBB", 2) },
      compactTemplate,
      { maxLength: 150 }
    );
    expect(prompt.quoteCount).toBe(1);
    expect(prompt.omittedQuotes).toBe(1);
    expect(prompt.text).toContain("TICKER: AAA");
    expect(prompt.text).not.toContain("TICKER: BBB");
    expect(prompt.text.endsWith("(1 ticker(s) omitted for length)")).toBe(true);
  });

  it("fails with PromptTooLargeError when one record cannot fit", () => {
    const run = () =>
      compose(numbered, { AAA: bareQuote("AAA", 1) }, compactTemplate, { maxLength: 107 });
    expect(run).toThrow(PromptTooLargeError);
    expect(run).toThrow("Prompt needs 108 characters even after truncation (max 107)");
  });

  it("requires at least one quote", () => {
    expect(() => compose([dow], {})).toThrow(RangeError);
  });
});

describe("formatQuote", () => {
  it("renders negative moves, foreign currency and the period trend", () => {
    const text = formatQuote({
      ticker: "SAP.DE",
      price: 171.3,
      changeAbsolute: -2.5,
      changePercent: -1.3,
      asOf: "2024-06-05T15:30:00.000Z",
      currency: "EUR",
      series: [
        { timestamp: "2024-06-03T07:00:00.000Z", price: 100 },
        { timestamp: "2024-06-05T07:00:00.000Z", price: 110 },
      ],
    });
    expect(text).toBe(
      [
        "TICKER: SAP.DE",
        "Latest price: $171.30 EUR",
        "Change vs prior close: -2.50 (-1.30%)",
        "As of: 2024-06-05T15:30:00.000Z",
        "Change over period: +10.00% (up)",
        "Recent closes:",
        "2024-06-03: 100.00",
        "2024-06-05: 110.00",
      ].join("\n")
    );
  });
});
