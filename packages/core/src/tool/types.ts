import type { z } from "zod";
import type { ToolOutputBlock } from "../types";

export type ToolParameters<TShape extends z.ZodRawShape = z.ZodRawShape> = z.ZodObject<TShape, z.UnknownKeysParam>;

export type ToolArgs<TShape extends z.ZodRawShape> = z.output<ToolParameters<TShape>>;

/** Hint for auto-truncation of long text output. Default: "tail" */
export type TruncateDirection = "head" | "tail" | "head_tail";

export interface ToolContext {
  toolCallId: string;
  /** Fires when the surrounding run is cancelled. Tools may observe it cooperatively. */
  signal: AbortSignal;
}

/**
 * A callable with declared, typed and documented parameters.
 *
 * `doc` is a structured documentation block: a summary paragraph followed by
 * `@param <name> [-] <description>` lines. An optional `{type}` after the tag
 * is ignored; the type always comes from `parameters`.
 */
export interface ToolDefinition<TShape extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  /** Overrides the doc summary. */
  description?: string;
  doc?: string;
  parameters: ToolParameters<TShape>;
  requiresConfirmation?: boolean;
  truncateDirection?: TruncateDirection;
  execute(args: ToolArgs<TShape>, ctx: ToolContext): unknown;
}

/** Structured tool return value. Anything else is coerced to a text block. */
export interface ToolResponse {
  content: ToolOutputBlock[];
  metadata?: Record<string, unknown>;
  isError?: boolean;
}

export interface JsonObjectSchema {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required: string[];
  additionalProperties?: unknown;
}

export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonObjectSchema;
  readonly required: readonly string[];
}

export interface ApprovalRequest {
  toolCallId: string;
  toolName: string;
  input: Record<string, unknown>;
  description: string;
}

// "once" proceeds this time, "always" also remembers the tool, "reject" denies
export type ApprovalResponse = { decision: "once" | "always" } | { decision: "reject"; reason: string };

export type Approver = (request: ApprovalRequest) => Promise<ApprovalResponse>;

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Consulted for tools registered with `requiresConfirmation`. */
  approve?: Approver;
  /** Maximum characters kept per text block. 0 = unlimited. */
  maxResultLength?: number;
}

/** Identity helper that infers the parameter shape for `execute`. */
export function defineTool<TShape extends z.ZodRawShape>(tool: ToolDefinition<TShape>): ToolDefinition<TShape> {
  return tool;
}
