import { SummaryAuthError } from "@src/domain/errors";
import type { Orchestrator, RunOutcome, SummaryRequest } from "@src/pipeline/orchestrator";
import { runCli } from "../market_summary";

const request: SummaryRequest = {
  query: "stock market OR finance",
  tickers: ["AAPL"],
  modelId: "test-model",
};

function scripted(outcome: RunOutcome): Orchestrator {
  return {
    async run(_request, options = {}) {
      const { onStateChange } = options;
      onStateChange?.("FetchingNews", "Idle");
      onStateChange?.("FetchingMarket", "FetchingNews");
      onStateChange?.("Composing", "FetchingMarket");
      if (outcome.status === "Done") {
        onStateChange?.("Summarizing", "Composing");
        onStateChange?.("Done", "Summarizing");
      } else {
        onStateChange?.("Failed", "Composing");
      }
      return outcome;
    },
  };
}

function captureIo() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) },
  };
}

describe("runCli", () => {
  it("prints progress then the model's answer", async () => {
    const prompt = {
      text: "prompt",
      maxLength: 25_000,
      headlineCount: 0,
      quoteCount: 1,
      omittedHeadlines: 0,
      omittedQuotes: 0,
    };
    const { out, err, io } = captureIo();

    const code = await runCli(
      scripted({
        status: "Done",
        runId: "run-1",
        summary: {
          text: "The market saw broad gains today...",
          modelId: "test-model",
          generatedAt: "2024-06-11T21:00:00.000Z",
          prompt,
        },
        prompt,
        headlines: [],
        quotes: {},
        tickerErrors: [],
        warnings: [],
      }),
      request,
      io
    );

    expect(code).toBe(0);
    expect(out).toEqual([
      "Fetching latest finance news...",
      "Fetching stock market data...",
      "Generating AI summary...",
      "LLM Response:\nThe market saw broad gains today...",
    ]);
    expect(err).toEqual([]);
  });

  it("reports a failed run on stderr with exit code 1", async () => {
    const { out, err, io } = captureIo();

    const code = await runCli(
      scripted({ status: "Failed", runId: "run-2", error: new SummaryAuthError(401) }),
      request,
      io
    );

    expect(code).toBe(1);
    expect(out).toEqual(["Fetching latest finance news...", "Fetching stock market data..."]);
    expect(err).toEqual([
      "Error [summary_auth]: Inference endpoint rejected the credential (HTTP 401)",
    ]);
  });
});
