import Anthropic from "@anthropic-ai/sdk";
import { isRecord } from "../tool/schema";
import type { ToolSchema } from "../tool/types";
import type { ChatResponse, ContentBlock, MediaBlock, Msg, StopReason, ToolOutputBlock } from "../types";
import { classifyApiError, classifyOtherError } from "./classify";
import { resolveModel } from "./models";
import type { CallOptions, ChatModel, Formatter, Model } from "./types";
import { ProviderError } from "./types";

export interface AnthropicRequest {
  system?: string;
  messages: Anthropic.MessageParam[];
}

type AnthropicImageType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";
type AnthropicTurn = { role: "user" | "assistant"; content: Anthropic.ContentBlockParam[] };

/**
 * Messages API formatter. System messages are lifted into `system`, tool
 * results travel in user turns, and consecutive turns of one role are merged.
 */
export class AnthropicFormatter implements Formatter<AnthropicRequest> {
  format(msgs: readonly Msg[]): AnthropicRequest {
    const system: string[] = [];
    const turns: AnthropicTurn[] = [];

    for (const msg of msgs) {
      if (msg.role === "system") {
        const text = msg.content.flatMap((block) => (block.type === "text" ? [block.text] : []));
        if (text.length > 0) system.push(text.join("\n"));
        continue;
      }

      const content = msg.content.map(convertContentBlock);
      if (content.length === 0) continue;
      const role = msg.role === "assistant" ? "assistant" : "user";

      const last = turns[turns.length - 1];
      if (last && last.role === role) {
        last.content.push(...content);
      } else {
        turns.push({ role, content });
      }
    }

    return {
      ...(system.length > 0 && { system: system.join("\n\n") }),
      messages: turns,
    };
  }
}

function convertContentBlock(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "media":
      return convertMedia(block);
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return {
        type: "tool_result",
        tool_use_id: block.id,
        content: block.output.map(convertToolOutput),
        is_error: block.isError,
      };
  }
}

function convertToolOutput(block: ToolOutputBlock): Anthropic.TextBlockParam | Anthropic.ImageBlockParam {
  if (block.type === "text") return { type: "text", text: block.text };
  return convertMedia(block);
}

// Only base64 data URLs of supported image types are sent as images
function convertMedia(block: MediaBlock): Anthropic.TextBlockParam | Anthropic.ImageBlockParam {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(block.ref);
  const mediaType = match?.[1];
  if (block.kind === "image" && match && mediaType !== undefined && isAnthropicImageType(mediaType)) {
    return { type: "image", source: { type: "base64", media_type: mediaType, data: match[2] } };
  }
  return { type: "text", text: `[${block.kind}: ${block.ref}]` };
}

function isAnthropicImageType(mediaType: string): mediaType is AnthropicImageType {
  return ["image/jpeg", "image/png", "image/gif", "image/webp"].includes(mediaType);
}

export interface AnthropicChatModelOptions {
  model: Model | string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
}

export class AnthropicChatModel implements ChatModel<AnthropicRequest> {
  private readonly client: Anthropic;
  private readonly model: Model;

  constructor(private readonly options: AnthropicChatModelOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, baseURL: options.baseUrl });
    this.model = typeof options.model === "string" ? resolveModel(options.model) : options.model;
  }

  get modelId(): string {
    return this.model.id;
  }

  async call(request: AnthropicRequest, tools: readonly ToolSchema[], options: CallOptions = {}): Promise<ChatResponse> {
    const params = {
      model: this.model.id,
      max_tokens: this.options.maxTokens ?? this.model.maxOutputTokens,
      messages: request.messages,
      ...(request.system !== undefined ? { system: request.system } : {}),
      ...(tools.length > 0 && { tools: convertTools(tools) }),
      ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
    };

    let message: Anthropic.Message;
    try {
      const { onTextDelta } = options;
      if (onTextDelta) {
        const stream = this.client.messages.stream(params);
        stream.on("text", (delta) => onTextDelta(delta));
        message = await stream.finalMessage();
      } else {
        message = await this.client.messages.create(params);
      }
    } catch (err) {
      throw classifyAnthropicError(err);
    }
    return parseAnthropicMessage(message);
  }
}

export function convertTools(tools: readonly ToolSchema[]): Anthropic.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: { ...t.parameters },
  }));
}

export function parseAnthropicMessage(message: Anthropic.Message): ChatResponse {
  const content: ContentBlock[] = [];
  for (const block of message.content) {
    if (block.type === "text") {
      content.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      content.push({ type: "tool_use", id: block.id, name: block.name, input: isRecord(block.input) ? block.input : {} });
    }
    // thinking and redacted blocks are not part of the conversation protocol
  }

  return {
    content,
    usage: { inputTokens: message.usage.input_tokens, outputTokens: message.usage.output_tokens },
    stopReason: mapStopReason(message.stop_reason),
  };
}

function mapStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    default:
      return "end_turn";
  }
}

export function classifyAnthropicError(err: unknown): ProviderError {
  if (err instanceof Anthropic.APIConnectionError) {
    return new ProviderError(err.message, "network", true, undefined, undefined, err);
  }
  if (err instanceof Anthropic.APIError) {
    return classifyApiError(err, (message) => /context length|prompt is too long|too many tokens/i.test(message));
  }
  return classifyOtherError(err);
}
