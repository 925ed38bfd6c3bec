import type { ToolSchema } from "../tool/types";
import type { ChatResponse, Msg } from "../types";

export interface Model {
  id: string;
  provider: string;
  contextWindow: number;
  maxOutputTokens: number;
  inputCostPer1M?: number; // cost per 1M input tokens in USD
  outputCostPer1M?: number; // cost per 1M output tokens in USD
}

/** Pure, synchronous translation of message history into a provider request. */
export interface Formatter<TRequest> {
  format(msgs: readonly Msg[]): TRequest;
}

export interface CallOptions {
  /** Cuts retry back-off short. Requests already in flight still complete. */
  signal?: AbortSignal;
  /** Receives text as it is generated. The call still resolves to the whole response. */
  onTextDelta?: (delta: string) => void;
}

/** The only I/O the loop performs. Fails with ProviderError. */
export interface ChatModel<TRequest> {
  readonly modelId: string;
  call(request: TRequest, tools: readonly ToolSchema[], options?: CallOptions): Promise<ChatResponse>;
}

export interface ModelBackend<TRequest = unknown> {
  formatter: Formatter<TRequest>;
  model: ChatModel<TRequest>;
}

// Provider error classification
export type ProviderErrorType =
  | "rate_limit" // 429: retryable, respect retry-after
  | "overloaded" // 529: retryable
  | "context_overflow" // 400 with "context length": NOT retryable
  | "auth" // 401/403: NOT retryable, fatal
  | "network" // ECONNREFUSED, timeout: retryable
  | "malformed_response" // no usable content: NOT retryable
  | "unknown"; // everything else: NOT retryable

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly errorType: ProviderErrorType,
    public readonly isRetryable: boolean,
    public readonly retryAfterMs?: number,
    public readonly statusCode?: number,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "ProviderError";
  }
}
