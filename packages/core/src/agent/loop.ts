import { ModelInvocationError, toSerializableError } from "../errors";
import { EventStream } from "../event-stream";
import { createMsg, generateMsgId, getToolUseBlocks, textBlock } from "../message";
import { calculateCost } from "../provider/models";
import { type CallOptions, ProviderError } from "../provider/types";
import { SteeringChannel } from "../steering/channel";
import { Toolkit, type ToolkitSnapshot } from "../tool/toolkit";
import type { ExecuteOptions } from "../tool/types";
import type { ChatResponse, Msg, ToolResultBlock, ToolUseBlock, Usage } from "../types";
import {
  type AgentEvent,
  DEFAULT_MAX_ITERATIONS,
  type LoopOutcome,
  type LoopStatus,
  type ReactLoopConfig,
  type ToolExecutionMode,
} from "./types";

/**
 * Drive a ReAct loop: reason, act on every tool use, repeat until the model
 * answers without tools, the iteration budget runs out, or the run is
 * cancelled. The stream resolves to the tagged outcome; model failures
 * reject it with ModelInvocationError.
 */
export function reactLoop<TRequest>(
  input: readonly Msg[],
  config: ReactLoopConfig<TRequest>,
): EventStream<AgentEvent, LoopOutcome> {
  const stream = new EventStream<AgentEvent, LoopOutcome>(
    (event) => event.type === "agent_end",
    (event) => {
      if (event.type === "agent_end") return event.outcome;
      throw new Error(`Unexpected completion event: ${event.type}`);
    },
  );

  runLoop(input, config, stream).catch((err: unknown) => {
    stream.push({ type: "error", error: toSerializableError(err), fatal: true });
    stream.error(err instanceof Error ? err : new Error(String(err)));
  });

  return stream;
}

async function runLoop<TRequest>(
  input: readonly Msg[],
  config: ReactLoopConfig<TRequest>,
  stream: EventStream<AgentEvent, LoopOutcome>,
): Promise<void> {
  const runId = `run-${generateMsgId()}`;
  const maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const steering = config.steering ?? new SteeringChannel();
  const toolkit: ToolkitSnapshot =
    config.toolkit instanceof Toolkit ? config.toolkit.snapshot() : (config.toolkit ?? new Toolkit().snapshot());
  const gate = config.confirmations;

  const appended: Msg[] = [];
  const usage: Usage = { inputTokens: 0, outputTokens: 0 };
  const dispatched = new Set<string>();
  let lastAssistant: Msg | undefined;
  let iterations = 0;

  const unsubscribers = [
    steering.onCancel((reason) => {
      stream.push({ type: "cancel_requested", reason });
      // A cancelled run stops waiting on its own confirmations
      gate?.denyAll("cancelled", (pending) => dispatched.has(pending.request.toolCallId));
    }),
    ...(gate
      ? [
          gate.onRequest((pending) => {
            if (!dispatched.has(pending.request.toolCallId)) return;
            stream.push({ type: "confirmation_requested", confirmationId: pending.id, request: pending.request });
          }),
        ]
      : []),
  ];

  // Memory may skip a message it already holds; only what it keeps is reported
  const append = async (msg: Msg) => {
    const kept = await config.memory.append(msg);
    for (const stored of kept) {
      appended.push(stored);
      stream.push({ type: "message_appended", message: stored });
    }
  };

  const finish = (status: LoopStatus) => {
    const outcome: LoopOutcome = {
      status,
      message: lastAssistant,
      messages: [...appended],
      iterations,
      usage: { ...usage },
      ...(status === "cancelled" && { reason: steering.reason }),
    };
    stream.push({ type: "agent_end", runId, outcome });
  };

  try {
    stream.push({ type: "agent_start", runId });
    for (const msg of input) await append(msg);

    // A cancel that lands before the run starts is honoured at the first safe point
    if (steering.isCancelled && steering.reason !== undefined) {
      stream.push({ type: "cancel_requested", reason: steering.reason });
    }

    while (iterations < maxIterations) {
      // Safe point: before reasoning
      if (steering.isCancelled) return finish("cancelled");

      for (const injected of steering.drain()) {
        await append(injected);
        stream.push({ type: "steering_injected", message: injected });
      }

      iterations++;
      stream.push({ type: "turn_start", iteration: iterations });

      const iteration = iterations;
      const response = await reason(config, toolkit, appended, {
        signal: steering.signal,
        ...(config.stream !== false && {
          onTextDelta: (delta: string) => stream.push({ type: "message_delta", iteration, delta }),
        }),
      });
      // Cancelled while the call was failing or backing off
      if (!response) return finish("cancelled");
      stream.push({ type: "model_response", iteration: iterations, response });

      usage.inputTokens += response.usage.inputTokens;
      usage.outputTokens += response.usage.outputTokens;
      stream.push({
        type: "usage",
        usage: response.usage,
        total: { ...usage },
        cost: config.modelInfo ? calculateCost(config.modelInfo, response.usage) : 0,
      });

      const assistant = toAssistantMsg(config.name, response, appended);
      await append(assistant);
      lastAssistant = assistant;

      const toolUses = getToolUseBlocks(assistant);
      if (toolUses.length === 0) {
        stream.push({ type: "turn_end", iteration: iterations, message: assistant, toolResults: [] });
        return finish("completed");
      }

      // Safe point: before acting. Pending uses still get results so none dangles.
      if (steering.isCancelled) {
        const results = toolUses.map((toolUse) => cancelledResult(toolUse, steering.reason));
        await append(createToolMsg(results));
        stream.push({ type: "turn_end", iteration: iterations, message: assistant, toolResults: results });
        return finish("cancelled");
      }

      for (const toolUse of toolUses) dispatched.add(toolUse.id);
      const results = await dispatchTools(toolUses, {
        toolkit,
        stream,
        steering,
        mode: config.toolExecution ?? "parallel",
        options: {
          signal: steering.signal,
          approve: gate ? gate.approver : undefined,
          maxResultLength: config.toolResultMaxLength ?? 0,
        },
      });

      await append(createToolMsg(results));
      stream.push({ type: "turn_end", iteration: iterations, message: assistant, toolResults: results });
    }

    if (steering.isCancelled) return finish("cancelled");
    return finish("max_iterations");
  } finally {
    for (const unsubscribe of unsubscribers) unsubscribe();
  }
}

/**
 * One reasoning step. Failures are not retried here. Resolves undefined when
 * the call fails after the run was cancelled.
 */
async function reason<TRequest>(
  config: ReactLoopConfig<TRequest>,
  toolkit: ToolkitSnapshot,
  appended: readonly Msg[],
  options: CallOptions,
): Promise<ChatResponse | undefined> {
  const { formatter, model } = config.backend;
  let response: ChatResponse;
  try {
    const history = await config.memory.list();
    const context = config.systemPrompt
      ? [createMsg({ name: "system", role: "system", content: config.systemPrompt }), ...history]
      : history;
    response = await model.call(formatter.format(context), toolkit.listSchemas(), options);
  } catch (err) {
    if (options.signal?.aborted) return undefined;
    const detail = err instanceof Error ? err.message : String(err);
    throw new ModelInvocationError(`Model call failed: ${detail}`, { cause: err, messages: [...appended] });
  }

  if (response.content.length === 0) {
    throw new ModelInvocationError("Model returned an empty response", {
      cause: new ProviderError("Model returned no content blocks", "malformed_response", false),
      messages: [...appended],
    });
  }
  return response;
}

function toAssistantMsg(name: string, response: ChatResponse, appended: readonly Msg[]): Msg {
  try {
    return createMsg({
      name,
      role: "assistant",
      content: response.content,
      metadata: { stopReason: response.stopReason, usage: { ...response.usage } },
    });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ModelInvocationError(`Model returned malformed content: ${detail}`, {
      cause: new ProviderError(detail, "malformed_response", false, undefined, undefined, err instanceof Error ? err : undefined),
      messages: [...appended],
    });
  }
}

interface DispatchContext {
  toolkit: ToolkitSnapshot;
  stream: EventStream<AgentEvent, LoopOutcome>;
  steering: SteeringChannel;
  mode: ToolExecutionMode;
  options: ExecuteOptions;
}

/** Results come back in response order whatever the execution mode. */
async function dispatchTools(toolUses: ToolUseBlock[], ctx: DispatchContext): Promise<ToolResultBlock[]> {
  const runOne = async (toolUse: ToolUseBlock): Promise<ToolResultBlock> => {
    ctx.stream.push({ type: "tool_start", toolCallId: toolUse.id, toolName: toolUse.name, input: toolUse.input });
    const startedAt = Date.now();
    const execution = await ctx.toolkit.invoke(toolUse, ctx.options);
    ctx.stream.push({
      type: "tool_end",
      toolCallId: toolUse.id,
      toolName: toolUse.name,
      result: execution.result,
      isError: execution.result.isError,
      durationMs: Date.now() - startedAt,
      ...(execution.metadata !== undefined && { metadata: execution.metadata }),
    });
    return execution.result;
  };

  if (ctx.mode === "parallel") {
    return Promise.all(toolUses.map(runOne));
  }

  const results: ToolResultBlock[] = [];
  for (const toolUse of toolUses) {
    // Safe point between sequential calls
    results.push(ctx.steering.isCancelled ? cancelledResult(toolUse, ctx.steering.reason) : await runOne(toolUse));
  }
  return results;
}

function cancelledResult(toolUse: ToolUseBlock, reason: string | undefined): ToolResultBlock {
  return {
    type: "tool_result",
    id: toolUse.id,
    name: toolUse.name,
    output: [textBlock(`Error: Cancelled before execution${reason ? ` (${reason})` : ""}`)],
    isError: true,
  };
}

function createToolMsg(results: ToolResultBlock[]): Msg {
  return createMsg({ name: "tool", role: "tool", content: results });
}
