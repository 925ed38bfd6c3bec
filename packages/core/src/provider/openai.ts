import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { isRecord } from "../tool/schema";
import type { ToolSchema } from "../tool/types";
import type { ChatResponse, ContentBlock, Msg, StopReason, ToolOutputBlock } from "../types";
import { classifyApiError, classifyOtherError } from "./classify";
import { resolveModel } from "./models";
import type { CallOptions, ChatModel, Formatter, Model } from "./types";
import { ProviderError } from "./types";

export interface OpenAIChatRequest {
  messages: ChatCompletionMessageParam[];
}

const NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Chat Completions formatter: tool uses become `tool_calls`, tool results become `tool` messages. */
export class OpenAIChatFormatter implements Formatter<OpenAIChatRequest> {
  format(msgs: readonly Msg[]): OpenAIChatRequest {
    const messages: ChatCompletionMessageParam[] = [];

    for (const msg of msgs) {
      const parts: ChatCompletionContentPart[] = [];
      const toolCalls: ChatCompletionMessageToolCall[] = [];

      for (const block of msg.content) {
        switch (block.type) {
          case "text":
            parts.push({ type: "text", text: block.text });
            break;
          case "media":
            parts.push(
              block.kind === "image"
                ? { type: "image_url", image_url: { url: block.ref } }
                : { type: "text", text: `[${block.kind}: ${block.ref}]` },
            );
            break;
          case "tool_use":
            toolCalls.push({
              id: block.id,
              type: "function",
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            });
            break;
          case "tool_result":
            messages.push({ role: "tool", tool_call_id: block.id, content: outputToText(block.output) });
            break;
        }
      }

      if (parts.length === 0 && toolCalls.length === 0) continue;
      const name = NAME_PATTERN.test(msg.name) ? { name: msg.name } : {};

      if (msg.role === "system") {
        messages.push({ role: "system", content: joinText(parts), ...name });
      } else if (msg.role === "assistant") {
        messages.push({
          role: "assistant",
          content: parts.length > 0 ? joinText(parts) : null,
          ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
          ...name,
        });
      } else {
        // user, and stray non-result content in tool messages
        const textOnly = parts.every((part) => part.type === "text");
        messages.push({ role: "user", content: textOnly ? joinText(parts) : parts, ...name });
      }
    }

    return { messages };
  }
}

export interface OpenAIChatModelOptions {
  model: Model | string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
}

export class OpenAIChatModel implements ChatModel<OpenAIChatRequest> {
  private readonly client: OpenAI;
  private readonly model: Model;

  constructor(private readonly options: OpenAIChatModelOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    this.model = typeof options.model === "string" ? resolveModel(options.model) : options.model;
  }

  get modelId(): string {
    return this.model.id;
  }

  async call(request: OpenAIChatRequest, tools: readonly ToolSchema[], options: CallOptions = {}): Promise<ChatResponse> {
    const params = {
      model: this.model.id,
      messages: request.messages,
      ...(tools.length > 0 && { tools: convertToOpenAITools(tools) }),
      ...(this.options.maxTokens !== undefined && { max_tokens: this.options.maxTokens }),
      ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
    };

    try {
      if (options.onTextDelta) {
        const chunks = await this.client.chat.completions.create({
          ...params,
          stream: true,
          stream_options: { include_usage: true },
        });
        return await accumulateOpenAIStream(chunks, options.onTextDelta);
      }
      const completion = await this.client.chat.completions.create(params);
      return parseOpenAICompletion(completion);
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw classifyOpenAIError(err);
    }
  }
}

export function convertToOpenAITools(tools: readonly ToolSchema[]): ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: { ...t.parameters },
    },
  }));
}

/** Normalise a completion. Unparseable tool arguments become `{}` so the toolkit reports what is missing. */
export function parseOpenAICompletion(completion: ChatCompletion): ChatResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new ProviderError("OpenAI response contained no choices", "malformed_response", false);
  }

  const content: ContentBlock[] = [];
  if (choice.message.content) {
    content.push({ type: "text", text: choice.message.content });
  }
  for (const call of choice.message.tool_calls ?? []) {
    content.push({ type: "tool_use", id: call.id, name: call.function.name, input: parseArguments(call.function.arguments) });
  }

  return {
    content,
    usage: {
      inputTokens: completion.usage?.prompt_tokens ?? 0,
      outputTokens: completion.usage?.completion_tokens ?? 0,
    },
    stopReason: mapOpenAIStopReason(choice.finish_reason),
  };
}

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * Fold a streamed completion into one response, forwarding text deltas.
 * Tool call fragments are keyed by their `index`.
 */
export async function accumulateOpenAIStream(
  chunks: AsyncIterable<ChatCompletionChunk>,
  onTextDelta: (delta: string) => void,
): Promise<ChatResponse> {
  let text = "";
  let finishReason: string | null = null;
  let sawChoice = false;
  const calls = new Map<number, PartialToolCall>();
  const usage = { inputTokens: 0, outputTokens: 0 };

  for await (const chunk of chunks) {
    if (chunk.usage) {
      usage.inputTokens = chunk.usage.prompt_tokens;
      usage.outputTokens = chunk.usage.completion_tokens;
    }
    const choice = chunk.choices[0];
    if (!choice) continue;
    sawChoice = true;

    const delta = choice.delta;
    if (delta.content) {
      text += delta.content;
      onTextDelta(delta.content);
    }
    for (const fragment of delta.tool_calls ?? []) {
      const call = calls.get(fragment.index) ?? { id: "", name: "", arguments: "" };
      if (fragment.id) call.id = fragment.id;
      if (fragment.function?.name) call.name += fragment.function.name;
      if (fragment.function?.arguments) call.arguments += fragment.function.arguments;
      calls.set(fragment.index, call);
    }
    if (choice.finish_reason) finishReason = choice.finish_reason;
  }

  if (!sawChoice) {
    throw new ProviderError("OpenAI stream contained no choices", "malformed_response", false);
  }

  const content: ContentBlock[] = text ? [{ type: "text", text }] : [];
  for (const [, call] of [...calls].sort(([a], [b]) => a - b)) {
    content.push({ type: "tool_use", id: call.id, name: call.name, input: parseArguments(call.arguments) });
  }
  return { content, usage, stopReason: mapOpenAIStopReason(finishReason) };
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || "{}");
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function mapOpenAIStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "error";
    default:
      return "end_turn";
  }
}

export function classifyOpenAIError(err: unknown): ProviderError {
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError(err.message, "network", true, undefined, undefined, err);
  }
  if (err instanceof OpenAI.APIError) {
    return classifyApiError(err, isContextOverflow);
  }
  return classifyOtherError(err);
}

function isContextOverflow(message: string): boolean {
  const patterns = [/maximum context length/i, /context_length_exceeded/i, /too many tokens/i, /exceeds the model/i];
  return patterns.some((p) => p.test(message));
}

function joinText(parts: ChatCompletionContentPart[]): string {
  return parts.map((part) => (part.type === "text" ? part.text : "")).join("\n");
}

function outputToText(output: ToolOutputBlock[]): string {
  return output.map((block) => (block.type === "text" ? block.text : `[${block.kind}: ${block.ref}]`)).join("\n");
}
