import type { LoopOutcome } from "./agent/types";
import type { Msg } from "./types";

export type TetherErrorCode =
  | "message_validation"
  | "schema_derivation"
  | "tool_execution"
  | "model_invocation"
  | "max_iterations"
  | "cancelled"
  | "config";

export class TetherError extends Error {
  constructor(
    message: string,
    public readonly code: TetherErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TetherError";
  }
}

/** A Msg or content block failed validation. */
export class MessageValidationError extends TetherError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "message_validation");
    this.name = "MessageValidationError";
  }
}

/** Registration-time failure: the tool's parameters or doc block cannot be turned into a schema. */
export class SchemaDerivationError extends TetherError {
  constructor(
    public readonly toolName: string,
    message: string,
  ) {
    super(`Cannot derive schema for tool "${toolName}": ${message}`, "schema_derivation");
    this.name = "SchemaDerivationError";
  }
}

/** Raised around a failing tool callable. The toolkit converts it to an error result. */
export class ToolExecutionError extends TetherError {
  constructor(
    public readonly toolName: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), "tool_execution", { cause });
    this.name = "ToolExecutionError";
  }
}

export class ModelInvocationError extends TetherError {
  /** Messages appended to memory during the run before the model call failed. */
  public readonly messages: readonly Msg[];

  constructor(message: string, options: { cause?: unknown; messages: readonly Msg[] }) {
    super(message, "model_invocation", { cause: options.cause });
    this.name = "ModelInvocationError";
    this.messages = options.messages;
  }
}

export class MaxIterationsExceededError extends TetherError {
  constructor(public readonly outcome: LoopOutcome) {
    super(`Reached the iteration limit (${outcome.iterations}) without a final answer`, "max_iterations");
    this.name = "MaxIterationsExceededError";
  }
}

export class CancelledError extends TetherError {
  constructor(public readonly outcome: LoopOutcome) {
    super(outcome.reason ? `Run cancelled: ${outcome.reason}` : "Run cancelled", "cancelled");
    this.name = "CancelledError";
  }
}

export class ConfigError extends TetherError {
  constructor(message: string) {
    super(message, "config");
    this.name = "ConfigError";
  }
}

// Errors cross the core/consumer boundary inside events in this shape
export interface SerializableError {
  message: string;
  name: string;
  code?: string;
  stack?: string;
}

export function toSerializableError(err: unknown): SerializableError {
  if (err instanceof TetherError) {
    return { message: err.message, name: err.name, code: err.code, stack: err.stack };
  }
  if (err instanceof Error) {
    return { message: err.message, name: err.name, stack: err.stack };
  }
  return { message: String(err), name: "Error" };
}
