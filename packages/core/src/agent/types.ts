import type { SerializableError } from "../errors";
import type { Memory } from "../memory/types";
import type { Model, ModelBackend } from "../provider/types";
import type { ConfirmationGate } from "../steering/confirmation";
import type { SteeringChannel } from "../steering/channel";
import type { Toolkit, ToolkitSnapshot } from "../tool/toolkit";
import type { ApprovalRequest } from "../tool/types";
import type { ChatResponse, Msg, ToolResultBlock, Usage } from "../types";

export type ToolExecutionMode = "parallel" | "sequential";

export type LoopStatus = "completed" | "cancelled" | "max_iterations";

/** Tagged result of one loop run. */
export interface LoopOutcome {
  status: LoopStatus;
  /** Final answer, or the best partial assistant message when the run did not complete. */
  message: Msg | undefined;
  /** Every message appended to memory during the run, in order. */
  messages: Msg[];
  iterations: number;
  usage: Usage;
  /** Cancellation reason. */
  reason?: string;
}

export type AgentEvent =
  // Lifecycle
  | { type: "agent_start"; runId: string }
  | { type: "agent_end"; runId: string; outcome: LoopOutcome }
  // Iteration
  | { type: "turn_start"; iteration: number }
  | { type: "turn_end"; iteration: number; message: Msg; toolResults: ToolResultBlock[] }
  // Memory
  | { type: "message_appended"; message: Msg }
  | { type: "model_response"; iteration: number; response: ChatResponse }
  // Streaming
  | { type: "message_delta"; iteration: number; delta: string }
  // Tool execution
  | { type: "tool_start"; toolCallId: string; toolName: string; input: Record<string, unknown> }
  | {
      type: "tool_end";
      toolCallId: string;
      toolName: string;
      result: ToolResultBlock;
      isError: boolean;
      durationMs: number;
      metadata?: Record<string, unknown>;
    }
  // Steering
  | { type: "confirmation_requested"; confirmationId: string; request: ApprovalRequest }
  | { type: "steering_injected"; message: Msg }
  | { type: "cancel_requested"; reason: string }
  // Usage
  | { type: "usage"; usage: Usage; total: Usage; cost: number }
  // Error
  | { type: "error"; error: SerializableError; fatal: boolean };

export interface ReactLoopConfig<TRequest> {
  /** Name on the assistant messages this run produces. */
  name: string;
  systemPrompt: string;
  backend: ModelBackend<TRequest>;
  memory: Memory;
  /** A live toolkit is snapshotted when the run starts. */
  toolkit?: Toolkit | ToolkitSnapshot;
  maxIterations?: number; // default: 10
  toolExecution?: ToolExecutionMode; // default: "parallel"
  toolResultMaxLength?: number; // default: 0 (unlimited)
  /** Ask the model for incremental text, surfaced as `message_delta`. Default: true */
  stream?: boolean;
  steering?: SteeringChannel;
  confirmations?: ConfirmationGate;
  /** Pricing for the `usage` event's cost. */
  modelInfo?: Model;
}

export const DEFAULT_MAX_ITERATIONS = 10;
