export type { CallOptions, ChatModel, Formatter, Model, ModelBackend, ProviderErrorType } from "./types";
export { ProviderError } from "./types";
export type { ModelDefinition } from "./models";
export { calculateCost, DEFAULT_MODEL_ID, KNOWN_MODELS, resolveModel } from "./models";
export type { RetryConfig } from "./retry";
export { DEFAULT_RETRY_CONFIG, withRetry } from "./retry";
export { isNetworkError, parseRetryAfter } from "./classify";
export type { OpenAIChatModelOptions, OpenAIChatRequest } from "./openai";
export { classifyOpenAIError, OpenAIChatFormatter, OpenAIChatModel, parseOpenAICompletion } from "./openai";
export type { AnthropicChatModelOptions, AnthropicRequest } from "./anthropic";
export { AnthropicChatModel, AnthropicFormatter, classifyAnthropicError, parseAnthropicMessage } from "./anthropic";
