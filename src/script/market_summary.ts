#!/usr/bin/env node
/* eslint-disable no-console */
// Runs one fixed pipeline cycle and prints the model's market summary.
// Configuration comes from the environment; a local .env is loaded on import.
import "dotenv/config";
import { toPipelineError } from "../domain/errors";
import { loadPipelineConfig } from "../pipeline/config";
import { createPipeline } from "../pipeline/factory";
import type { Orchestrator, OrchestratorStatus, SummaryRequest } from "../pipeline/orchestrator";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

const PROGRESS: Partial<Record<OrchestratorStatus, string>> = {
  FetchingNews: "Fetching latest finance news...",
  FetchingMarket: "Fetching stock market data...",
  Summarizing: "Generating AI summary...",
};

/**
 * Executes one run and returns the process exit code.
 */
export async function runCli(
  orchestrator: Orchestrator,
  request: SummaryRequest,
  io: CliIo = consoleIo,
  signal?: AbortSignal
): Promise<number> {
  const outcome = await orchestrator.run(request, {
    signal,
    onStateChange: next => {
      const line = PROGRESS[next];
      if (line) io.out(line);
    },
  });

  if (outcome.status === "Failed") {
    io.err(`Error [${outcome.error.kind}]: ${outcome.error.message}`);
    return 1;
  }
  io.out(`LLM Response:\n${outcome.summary.text}`);
  return 0;
}

async function main(): Promise<number> {
  let pipeline: ReturnType<typeof createPipeline>;
  try {
    pipeline = createPipeline(loadPipelineConfig());
  } catch (err) {
    const error = toPipelineError(err);
    console.error(`Error [config]: ${error.message}`);
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  return runCli(pipeline.orchestrator, pipeline.request, consoleIo, controller.signal);
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error("Unhandled error:", err);
      process.exit(1);
    });
}
