import { z } from "zod";
import { ToolExecutionError } from "../errors";
import { textBlock, ToolOutputBlockSchema } from "../message";
import type { ToolOutputBlock, ToolResultBlock, ToolUseBlock } from "../types";
import { truncateText } from "./truncation";
import type { ExecuteOptions, ToolContext, ToolSchema, ToolResponse, TruncateDirection } from "./types";

export type PreparedCall = { ok: true; invoke(ctx: ToolContext): unknown } | { ok: false; message: string };

/** What the toolkit stores per tool name: a schema plus a way to validate and invoke. */
export interface ToolEntry {
  readonly schema: ToolSchema;
  readonly requiresConfirmation: boolean;
  readonly truncateDirection: TruncateDirection;
  /** Validate raw input and bind it to the underlying callable. */
  prepare(input: Record<string, unknown>): PreparedCall;
}

export interface ToolExecutionResult {
  result: ToolResultBlock;
  metadata?: Record<string, unknown>;
  truncated: boolean;
}

const ToolResponseSchema = z.object({
  content: z.array(ToolOutputBlockSchema),
  metadata: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

/**
 * Run one tool use against a registry. Never rejects: every failure mode
 * becomes an `isError` result the model can read and correct.
 */
export async function executeToolUse(
  registry: ReadonlyMap<string, ToolEntry>,
  toolUse: ToolUseBlock,
  options: ExecuteOptions = {},
): Promise<ToolExecutionResult> {
  try {
    return await runToolUse(registry, toolUse, options);
  } catch (err) {
    // Validation hooks (refinements, transforms) can throw too
    return failure(toolUse, `Error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

async function runToolUse(
  registry: ReadonlyMap<string, ToolEntry>,
  toolUse: ToolUseBlock,
  options: ExecuteOptions,
): Promise<ToolExecutionResult> {
  const entry = registry.get(toolUse.name);
  if (!entry) {
    return failure(toolUse, `Error: Unknown tool "${toolUse.name}"`);
  }

  const input = toolUse.input;
  const missing = entry.schema.required.filter((key) => input[key] === undefined);
  if (missing.length > 0) {
    return failure(toolUse, `Error: Missing required parameter(s) for "${toolUse.name}": ${missing.join(", ")}`);
  }

  const prepared = entry.prepare(input);
  if (!prepared.ok) {
    return failure(toolUse, `Error: Invalid arguments for "${toolUse.name}":\n${prepared.message}`);
  }

  if (entry.requiresConfirmation) {
    const denial = await requestApproval(entry, toolUse, options);
    if (denial !== undefined) {
      return failure(toolUse, `Denied: ${denial}`, { denied: true });
    }
  }

  const ctx: ToolContext = {
    toolCallId: toolUse.id,
    signal: options.signal ?? new AbortController().signal,
  };

  let raw: unknown;
  try {
    raw = await prepared.invoke(ctx);
  } catch (err) {
    const error = new ToolExecutionError(toolUse.name, err);
    return failure(toolUse, `Error: ${error.message}`, { errorName: err instanceof Error ? err.name : typeof err });
  }

  const response = normalizeOutput(raw);
  let truncated = false;
  const maxLength = options.maxResultLength ?? 0;
  const output = response.content.map((block): ToolOutputBlock => {
    if (block.type !== "text" || maxLength <= 0) return block;
    const result = truncateText(block.text, maxLength, entry.truncateDirection);
    truncated ||= result.truncated;
    return result.truncated ? textBlock(result.output) : block;
  });

  return {
    result: { type: "tool_result", id: toolUse.id, name: toolUse.name, output, isError: response.isError ?? false },
    metadata: truncated ? { ...response.metadata, truncated: true } : response.metadata,
    truncated,
  };
}

/** Resolves to a denial reason, or undefined when the call may proceed. */
async function requestApproval(
  entry: ToolEntry,
  toolUse: ToolUseBlock,
  options: ExecuteOptions,
): Promise<string | undefined> {
  if (!options.approve) return "no approver configured";
  try {
    const response = await options.approve({
      toolCallId: toolUse.id,
      toolName: toolUse.name,
      input: toolUse.input,
      description: entry.schema.description,
    });
    return response.decision === "reject" ? response.reason : undefined;
  } catch (err) {
    return `approval failed: ${err instanceof Error ? err.message : String(err)}`;
  }
}

/**
 * Coerce whatever a tool returned into output blocks. A ToolResponse keeps
 * its blocks, a string becomes one text block, anything else is serialised.
 */
export function normalizeOutput(raw: unknown): ToolResponse {
  const structured = ToolResponseSchema.safeParse(raw);
  if (structured.success) {
    const { content, metadata, isError } = structured.data;
    return { content: content.length > 0 ? content : [textBlock("")], metadata, isError };
  }
  if (typeof raw === "string") return { content: [textBlock(raw)] };
  if (raw === undefined || raw === null) return { content: [textBlock("")] };
  return { content: [textBlock(stringify(raw))] };
}

function stringify(value: unknown): string {
  if (typeof value !== "object") return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular structures
    return String(value);
  }
}

function failure(toolUse: ToolUseBlock, message: string, metadata?: Record<string, unknown>): ToolExecutionResult {
  return {
    result: { type: "tool_result", id: toolUse.id, name: toolUse.name, output: [textBlock(message)], isError: true },
    metadata: { ...metadata, error: true },
    truncated: false,
  };
}
