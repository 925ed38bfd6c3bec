import type { z } from "zod";
import type { ToolResultBlock, ToolUseBlock } from "../types";
import { executeToolUse, type ToolEntry, type ToolExecutionResult } from "./executor";
import { createMcpEntries, type McpClient, type McpRegistrationOptions } from "./mcp";
import { deriveToolSchema } from "./schema";
import type { ExecuteOptions, ToolDefinition, ToolSchema } from "./types";

/**
 * Immutable view of a toolkit at one point in time. A loop run holds one so
 * that concurrent register/remove calls never affect calls in flight.
 */
export class ToolkitSnapshot {
  constructor(private readonly entries: ReadonlyMap<string, ToolEntry>) {}

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  listSchemas(): ToolSchema[] {
    return [...this.entries.values()].map((entry) => entry.schema);
  }

  requiresConfirmation(name: string): boolean {
    return this.entries.get(name)?.requiresConfirmation ?? false;
  }

  execute(toolUse: ToolUseBlock, options?: ExecuteOptions): Promise<ToolResultBlock> {
    return this.invoke(toolUse, options).then((execution) => execution.result);
  }

  /** Like execute, with metadata the tool attached to its response. */
  invoke(toolUse: ToolUseBlock, options?: ExecuteOptions): Promise<ToolExecutionResult> {
    return executeToolUse(this.entries, toolUse, options);
  }
}

/**
 * Name-keyed tool registry. Every mutation builds a new map and swaps it in
 * whole, so a snapshot never observes a half-applied change.
 */
export class Toolkit {
  private entries: ReadonlyMap<string, ToolEntry> = new Map();

  /**
   * Derive the tool's schema and insert it. A tool with an existing name
   * replaces the old entry in its original position.
   * @throws SchemaDerivationError before the registry changes.
   */
  register<TShape extends z.ZodRawShape>(tool: ToolDefinition<TShape>): ToolSchema {
    const schema = deriveToolSchema(tool);
    const entry: ToolEntry = {
      schema,
      requiresConfirmation: tool.requiresConfirmation ?? false,
      truncateDirection: tool.truncateDirection ?? "tail",
      prepare: (input) => {
        const parsed = tool.parameters.safeParse(input);
        if (!parsed.success) {
          return {
            ok: false,
            message: parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("\n"),
          };
        }
        return { ok: true, invoke: (ctx) => tool.execute(parsed.data, ctx) };
      },
    };
    this.swap((draft) => draft.set(schema.name, entry));
    return schema;
  }

  /** Wrap every tool of a remote MCP server as a local entry. */
  async registerMcpClient(client: McpClient, options?: McpRegistrationOptions): Promise<ToolSchema[]> {
    const entries = await createMcpEntries(client, options);
    this.swap((draft) => {
      for (const entry of entries) draft.set(entry.schema.name, entry);
    });
    return entries.map((entry) => entry.schema);
  }

  /** No-op when the name is not registered. */
  remove(name: string): boolean {
    if (!this.entries.has(name)) return false;
    this.swap((draft) => draft.delete(name));
    return true;
  }

  clear(): void {
    this.entries = new Map();
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  getSchema(name: string): ToolSchema | undefined {
    return this.entries.get(name)?.schema;
  }

  /** Schemas in registration order. */
  listSchemas(): ToolSchema[] {
    return this.snapshot().listSchemas();
  }

  snapshot(): ToolkitSnapshot {
    return new ToolkitSnapshot(this.entries);
  }

  execute(toolUse: ToolUseBlock, options?: ExecuteOptions): Promise<ToolResultBlock> {
    return this.snapshot().execute(toolUse, options);
  }

  private swap(mutate: (draft: Map<string, ToolEntry>) => void): void {
    const draft = new Map(this.entries);
    mutate(draft);
    this.entries = draft;
  }
}
