/**
 * Default prompt template for the market summary.
 * Placeholders: {{tickers}}, {{headlines}}, {{quotes}}
 */
export const MARKET_SUMMARY_TEMPLATE = [
  "You are a concise financial assistant. Given the news and stock data below, write a short market summary (3-6 sentences) covering the overall market tone, the likely impact of notable headlines, and the implications for {{tickers}}.",
  "Then give one bullet list of 3 high-level, action-oriented takeaways for an investor.",
  "",
  "NEWS:",
  "{{headlines}}",
  "",
  "STOCK DATA:",
  "{{quotes}}",
  "",
  "Answer:",
].join("\n");

export const SUMMARY_SYSTEM_PROMPT =
  "You are a financial assistant that summarizes market trends.";

export const NO_HEADLINES_TEXT = "No significant headlines were found.";
