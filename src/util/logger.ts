import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isProduction, isTest } from "./env";

/**
 * Centralized structured logger.
 * - Local/dev: pretty-printed logs for readability
 * - Production: JSON logs for log shipping
 * Logs are written to stderr so they never interleave with CLI output on stdout.
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "market-summary",
    stage: getStage(),
  },
  redact: {
    // Remove credentials from logs
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "*.authorization",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

function createRootLogger(): Logger {
  if (!isProduction() && !isTest()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }
  return pino(baseOptions, pino.destination(2));
}

const rootLogger: Logger = createRootLogger();

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger bound to a single pipeline run.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { runId: string; tickers?: readonly string[] }
): Logger {
  return getLogger(moduleName).child({
    runId: run.runId,
    tickers: run.tickers,
  });
}

export default rootLogger;
