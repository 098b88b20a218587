/**
 * Text-generation inference endpoint (Hugging Face style).
 *
 * POST {endpoint}/{modelId}
 *   { inputs, parameters: { max_new_tokens, temperature, return_full_text } }
 * Response: [{ generated_text }] or { generated_text }
 */
import { z } from "zod";
import {
  FetchLike,
  HttpStatusError,
  MalformedResponseError,
  requestJson,
} from "../../util/http";
import type { GenerationParameters, SummaryTransport } from "./types";

const generatedSchema = z.object({ generated_text: z.string() });
const responseSchema = z.union([
  z.array(generatedSchema).min(1),
  generatedSchema,
]);
const errorSchema = z.object({ error: z.string() });

export const DEFAULT_INFERENCE_ENDPOINT =
  "https://router.huggingface.co/hf-inference/models";

export interface InferenceTransportOptions extends GenerationParameters {
  token: string;
  endpoint?: string;
  fetchFn?: FetchLike;
}

export function createInferenceTransport(
  options: InferenceTransportOptions
): SummaryTransport {
  const endpoint = (options.endpoint ?? DEFAULT_INFERENCE_ENDPOINT).replace(/\/+$/, "");
  const fetchFn: FetchLike = options.fetchFn ?? fetch;

  return {
    name: "inference",
    async generate({ prompt, modelId, timeoutMs, signal }) {
      const res = await requestJson(
        fetchFn,
        `${endpoint}/${modelId}`,
        {
          method: "POST",
          headers: {
            Authorization: `Bearer ${options.token}`,
            "Content-Type": "application/json",
            Accept: "application/json",
          },
          body: JSON.stringify({
            inputs: prompt,
            parameters: {
              max_new_tokens: options.maxTokens,
              temperature: options.temperature,
              return_full_text: false,
            },
          }),
        },
        { timeoutMs, signal }
      );

      if (!res.ok) {
        const providerError = errorSchema.safeParse(res.body);
        throw new HttpStatusError(
          res.status,
          providerError.success ? providerError.data.error : res.statusText,
          res.body
        );
      }

      const parsed = responseSchema.safeParse(res.body);
      if (!parsed.success) {
        throw new MalformedResponseError("Inference response has no generated_text");
      }
      const data = parsed.data;
      return Array.isArray(data) ? data[0].generated_text : data.generated_text;
    },
  };
}
