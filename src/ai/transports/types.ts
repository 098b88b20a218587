/**
 * A transport performs exactly one generation request, with no retries.
 * Failures are thrown as the shared HTTP error types (HttpStatusError,
 * TimeoutError, TransportError, MalformedResponseError) or CancelledError
 * so the SummaryClient can classify them the same way for every backend.
 */
export interface GenerateRequest {
  prompt: string;
  modelId: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GenerationParameters {
  maxTokens: number;
  temperature: number;
}

export interface SummaryTransport {
  readonly name: string;
  generate(request: GenerateRequest): Promise<string>;
}
