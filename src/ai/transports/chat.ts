/**
 * Chat-completion backend through the AI SDK, against any OpenAI-compatible
 * router (Hugging Face router by default). SDK-level retries are disabled;
 * the SummaryClient owns the retry loop.
 */
import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText, type LanguageModel } from "ai";
import { CancelledError } from "../../domain/errors";
import { SUMMARY_SYSTEM_PROMPT } from "../../reporting/prompts/market_summary";
import { linkSignals } from "../../util/async";
import { HttpStatusError, TimeoutError, TransportError } from "../../util/http";
import type { GenerationParameters, SummaryTransport } from "./types";

export const DEFAULT_CHAT_BASE_URL = "https://router.huggingface.co/v1";

export type TextGenerator = (
  options: Parameters<typeof generateText>[0]
) => Promise<{ text: string }>;

export interface ChatTransportOptions extends GenerationParameters {
  token: string;
  baseUrl?: string;
  systemPrompt?: string;
  /** Override model resolution (e.g. another AI SDK provider) */
  resolveModel?: (modelId: string) => LanguageModel;
  generate?: TextGenerator;
}

export function createChatTransport(options: ChatTransportOptions): SummaryTransport {
  const resolveModel =
    options.resolveModel ??
    (() => {
      const provider = createOpenAI({
        apiKey: options.token,
        baseURL: options.baseUrl ?? DEFAULT_CHAT_BASE_URL,
      });
      return (modelId: string): LanguageModel => provider.chat(modelId);
    })();
  const runGeneration: TextGenerator = options.generate ?? generateText;

  return {
    name: "chat",
    async generate({ prompt, modelId, timeoutMs, signal }) {
      const { controller, dispose } = linkSignals(signal);
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);

      try {
        const { text } = await runGeneration({
          model: resolveModel(modelId),
          system: options.systemPrompt ?? SUMMARY_SYSTEM_PROMPT,
          prompt,
          maxOutputTokens: options.maxTokens,
          temperature: options.temperature,
          maxRetries: 0,
          abortSignal: controller.signal,
        });
        return text;
      } catch (err) {
        if (signal?.aborted) throw new CancelledError("Request cancelled", { cause: err });
        if (timedOut) throw new TimeoutError(timeoutMs);
        if (APICallError.isInstance(err)) {
          if (err.statusCode !== undefined) {
            throw new HttpStatusError(err.statusCode, err.message, err.responseBody);
          }
          throw new TransportError(err.message, { cause: err });
        }
        throw err;
      } finally {
        clearTimeout(timer);
        dispose();
      }
    },
  };
}
