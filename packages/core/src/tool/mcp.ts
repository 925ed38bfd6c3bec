import { SchemaDerivationError } from "../errors";
import { mediaBlock, textBlock } from "../message";
import type { ToolOutputBlock } from "../types";
import type { ToolEntry } from "./executor";
import { isRecord, TOOL_NAME_PATTERN } from "./schema";
import type { JsonObjectSchema, ToolResponse, ToolSchema } from "./types";

/** Tool descriptor as listed by a remote MCP server. */
export interface McpToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export type McpContent =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string }
  | { type: "audio"; data: string; mimeType: string }
  | { type: "resource"; resource: { uri: string; text?: string; mimeType?: string } };

export interface McpCallResult {
  content: McpContent[];
  isError?: boolean;
}

/** Transport-agnostic MCP collaborator. No transport ships with this package. */
export interface McpClient {
  readonly name: string;
  listRemoteTools(): Promise<McpToolDescriptor[]>;
  invokeRemoteTool(name: string, input: Record<string, unknown>, options?: { signal?: AbortSignal }): Promise<McpCallResult>;
}

export interface McpRegistrationOptions {
  /** Register only these remote tools. Default: all of them. */
  names?: string[];
  requiresConfirmation?: boolean;
}

export async function createMcpEntries(client: McpClient, options: McpRegistrationOptions = {}): Promise<ToolEntry[]> {
  const descriptors = await client.listRemoteTools();
  const wanted = options.names ? new Set(options.names) : undefined;

  return descriptors
    .filter((descriptor) => !wanted || wanted.has(descriptor.name))
    .map((descriptor): ToolEntry => {
      const schema = remoteToolSchema(descriptor);
      return {
        schema,
        requiresConfirmation: options.requiresConfirmation ?? false,
        truncateDirection: "tail",
        // Input is checked for required keys only; the server owns full validation
        prepare: (input) => ({
          ok: true,
          invoke: async (ctx) =>
            mcpResultToResponse(await client.invokeRemoteTool(descriptor.name, input, { signal: ctx.signal })),
        }),
      };
    });
}

export function remoteToolSchema(descriptor: McpToolDescriptor): ToolSchema {
  if (!TOOL_NAME_PATTERN.test(descriptor.name)) {
    throw new SchemaDerivationError(descriptor.name, `name must match ${TOOL_NAME_PATTERN}`);
  }
  const { inputSchema } = descriptor;
  const properties: JsonObjectSchema["properties"] = {};
  if (isRecord(inputSchema.properties)) {
    for (const [key, value] of Object.entries(inputSchema.properties)) {
      properties[key] = isRecord(value) ? value : {};
    }
  }
  const required = Array.isArray(inputSchema.required)
    ? inputSchema.required.filter((key): key is string => typeof key === "string")
    : [];

  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description ?? "",
    parameters: Object.freeze({ type: "object" as const, properties, required }),
    required: Object.freeze([...required]),
  });
}

export function mcpResultToResponse(result: McpCallResult): ToolResponse {
  const content: ToolOutputBlock[] = [];
  for (const item of result.content) {
    switch (item.type) {
      case "text":
        content.push(textBlock(item.text));
        break;
      case "image":
        content.push(mediaBlock("image", `data:${item.mimeType};base64,${item.data}`));
        break;
      case "audio":
        content.push(mediaBlock("audio", `data:${item.mimeType};base64,${item.data}`));
        break;
      case "resource":
        if (item.resource.text !== undefined) content.push(textBlock(item.resource.text));
        break;
    }
  }
  return { content, isError: result.isError };
}
