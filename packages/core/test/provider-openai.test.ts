import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionChunk } from "openai/resources/chat/completions";
import { describe, expect, it } from "vitest";
import { createMsg, mediaBlock, textBlock, toolResultBlock, toolUseBlock } from "../src/message";
import {
  accumulateOpenAIStream,
  classifyOpenAIError,
  convertToOpenAITools,
  OpenAIChatFormatter,
  parseOpenAICompletion,
} from "../src/provider/openai";
import { ProviderError } from "../src/provider/types";
import type { ToolSchema } from "../src/tool/types";

function completion(
  message: { content: string | null; tool_calls?: ChatCompletion.Choice["message"]["tool_calls"] },
  finishReason: ChatCompletion.Choice["finish_reason"],
): ChatCompletion {
  return {
    id: "chatcmpl-1",
    object: "chat.completion",
    created: 0,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        finish_reason: finishReason,
        logprobs: null,
        message: { role: "assistant", refusal: null, ...message },
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 },
  };
}

describe("OpenAIChatFormatter", () => {
  const formatter = new OpenAIChatFormatter();

  it("maps a tool-using conversation", () => {
    const request = formatter.format([
      createMsg({ name: "system", role: "system", content: "Be brief." }),
      createMsg({ name: "user", role: "user", content: "Weather in Paris?" }),
      createMsg({
        name: "assistant",
        role: "assistant",
        content: [textBlock("Let me check."), toolUseBlock("call-1", "get_weather", { city: "Paris" })],
      }),
      createMsg({ name: "tool", role: "tool", content: [toolResultBlock("call-1", "get_weather", "Sunny")] }),
    ]);

    expect(request.messages).toEqual([
      { role: "system", content: "Be brief.", name: "system" },
      { role: "user", content: "Weather in Paris?", name: "user" },
      {
        role: "assistant",
        content: "Let me check.",
        tool_calls: [{ id: "call-1", type: "function", function: { name: "get_weather", arguments: '{"city":"Paris"}' } }],
        name: "assistant",
      },
      { role: "tool", tool_call_id: "call-1", content: "Sunny" },
    ]);
  });

  it("sends null content for tool-only assistant turns", () => {
    const request = formatter.format([
      createMsg({ name: "assistant", role: "assistant", content: [toolUseBlock("call-1", "noop", {})] }),
    ]);
    expect(request.messages[0]).toMatchObject({ role: "assistant", content: null });
  });

  it("uses content parts for images and omits names the API refuses", () => {
    const request = formatter.format([
      createMsg({
        name: "Dr. Who",
        role: "user",
        content: [textBlock("What is this?"), mediaBlock("image", "https://example.com/cat.png"), mediaBlock("audio", "a.wav")],
      }),
    ]);
    expect(request.messages).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: "What is this?" },
          { type: "image_url", image_url: { url: "https://example.com/cat.png" } },
          { type: "text", text: "[audio: a.wav]" },
        ],
      },
    ]);
  });
});

describe("parseOpenAICompletion", () => {
  it("extracts text, tool calls and usage", () => {
    const response = parseOpenAICompletion(
      completion(
        {
          content: "Checking.",
          tool_calls: [{ id: "call-1", type: "function", function: { name: "get_weather", arguments: '{"city":"Paris"}' } }],
        },
        "tool_calls",
      ),
    );
    expect(response).toEqual({
      content: [
        { type: "text", text: "Checking." },
        { type: "tool_use", id: "call-1", name: "get_weather", input: { city: "Paris" } },
      ],
      usage: { inputTokens: 12, outputTokens: 7 },
      stopReason: "tool_use",
    });
  });

  it("turns unparseable arguments into an empty input", () => {
    const response = parseOpenAICompletion(
      completion({ content: null, tool_calls: [{ id: "c", type: "function", function: { name: "f", arguments: "{oops" } }] }, "tool_calls"),
    );
    expect(response.content).toEqual([{ type: "tool_use", id: "c", name: "f", input: {} }]);
  });

  it("maps length to max_tokens", () => {
    expect(parseOpenAICompletion(completion({ content: "cut" }, "length")).stopReason).toBe("max_tokens");
  });

  it("rejects a completion without choices", () => {
    const empty: ChatCompletion = { ...completion({ content: "x" }, "stop"), choices: [] };
    expect(() => parseOpenAICompletion(empty)).toThrow(ProviderError);
  });
});

describe("convertToOpenAITools", () => {
  it("wraps schemas as functions", () => {
    const schema: ToolSchema = {
      name: "get_weather",
      description: "Weather",
      parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
      required: ["city"],
    };
    expect(convertToOpenAITools([schema])).toEqual([
      {
        type: "function",
        function: {
          name: "get_weather",
          description: "Weather",
          parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
        },
      },
    ]);
  });
});

function chunk(
  delta: ChatCompletionChunk.Choice["delta"],
  finishReason: ChatCompletionChunk.Choice["finish_reason"] = null,
): ChatCompletionChunk {
  return {
    id: "chatcmpl-1",
    object: "chat.completion.chunk",
    created: 0,
    model: "gpt-4o-mini",
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

async function* streamOf(...chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  yield* chunks;
}

describe("accumulateOpenAIStream", () => {
  it("forwards text deltas and folds them into one response", async () => {
    const deltas: string[] = [];
    const response = await accumulateOpenAIStream(
      streamOf(
        chunk({ role: "assistant", content: "" }),
        chunk({ content: "Hello" }),
        chunk({ content: ", world" }),
        chunk({}, "stop"),
        {
          id: "chatcmpl-1",
          object: "chat.completion.chunk",
          created: 0,
          model: "gpt-4o-mini",
          choices: [],
          usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
        },
      ),
      (delta) => deltas.push(delta),
    );

    expect(deltas).toEqual(["Hello", ", world"]);
    expect(response).toEqual({
      content: [{ type: "text", text: "Hello, world" }],
      usage: { inputTokens: 12, outputTokens: 3 },
      stopReason: "end_turn",
    });
  });

  it("joins tool call fragments by index", async () => {
    const deltas: string[] = [];
    const response = await accumulateOpenAIStream(
      streamOf(
        chunk({ tool_calls: [{ index: 1, id: "call_b", type: "function", function: { name: "lookup", arguments: "" } }] }),
        chunk({ tool_calls: [{ index: 0, id: "call_a", type: "function", function: { name: "get_weather", arguments: '{"ci' } }] }),
        chunk({ tool_calls: [{ index: 0, function: { arguments: 'ty":"Oslo"}' } }] }),
        chunk({ tool_calls: [{ index: 1, function: { arguments: "not json" } }] }),
        chunk({}, "tool_calls"),
      ),
      (delta) => deltas.push(delta),
    );

    expect(deltas).toEqual([]);
    expect(response.content).toEqual([
      { type: "tool_use", id: "call_a", name: "get_weather", input: { city: "Oslo" } },
      { type: "tool_use", id: "call_b", name: "lookup", input: {} },
    ]);
    expect(response.stopReason).toBe("tool_use");
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it("rejects a stream without choices", async () => {
    await expect(accumulateOpenAIStream(streamOf(), () => undefined)).rejects.toMatchObject({
      errorType: "malformed_response",
      message: "OpenAI stream contained no choices",
    });
  });
});

describe("classifyOpenAIError", () => {
  it("classifies rate limits with retry-after", () => {
    const error = classifyOpenAIError(new OpenAI.APIError(429, undefined, "Rate limited", { "retry-after": "2" }));
    expect(error).toMatchObject({ errorType: "rate_limit", isRetryable: true, retryAfterMs: 2000, statusCode: 429 });
  });

  it("classifies context overflow", () => {
    const error = classifyOpenAIError(
      new OpenAI.APIError(400, undefined, "This model's maximum context length is 8192 tokens", {}),
    );
    expect(error).toMatchObject({ errorType: "context_overflow", isRetryable: false });
  });

  it("classifies auth failures", () => {
    expect(classifyOpenAIError(new OpenAI.APIError(401, undefined, "Invalid key", {})).errorType).toBe("auth");
  });

  it("classifies connection errors as retryable network failures", () => {
    const error = classifyOpenAIError(new OpenAI.APIConnectionError({ message: "Connection error." }));
    expect(error).toMatchObject({ errorType: "network", isRetryable: true });
  });

  it("classifies plain errors by message", () => {
    expect(classifyOpenAIError(new Error("connect ECONNREFUSED 127.0.0.1:443")).errorType).toBe("network");
    expect(classifyOpenAIError(new Error("weird")).errorType).toBe("unknown");
  });
});
