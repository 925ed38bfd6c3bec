export type {
  ApprovalRequest,
  ApprovalResponse,
  Approver,
  ExecuteOptions,
  JsonObjectSchema,
  ToolArgs,
  ToolContext,
  ToolDefinition,
  ToolParameters,
  ToolResponse,
  ToolSchema,
  TruncateDirection,
} from "./types";
export { defineTool } from "./types";
export type { ParsedToolDoc } from "./doc";
export { parseToolDoc } from "./doc";
export { deriveToolSchema, TOOL_NAME_PATTERN } from "./schema";
export type { PreparedCall, ToolEntry, ToolExecutionResult } from "./executor";
export { executeToolUse, normalizeOutput } from "./executor";
export type { McpCallResult, McpClient, McpContent, McpRegistrationOptions, McpToolDescriptor } from "./mcp";
export { mcpResultToResponse, remoteToolSchema } from "./mcp";
export { Toolkit, ToolkitSnapshot } from "./toolkit";
export type { TruncationResult } from "./truncation";
export { truncateHead, truncateHeadTail, truncateTail, truncateText } from "./truncation";
