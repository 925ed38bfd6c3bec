// Types
export type {
  ChatResponse,
  ContentBlock,
  ContentBlockType,
  MediaBlock,
  MediaKind,
  Msg,
  Role,
  StopReason,
  TextBlock,
  ToolOutputBlock,
  ToolResultBlock,
  ToolUseBlock,
  Usage,
} from "./types";
export { ROLES } from "./types";
// Errors
export type { SerializableError, TetherErrorCode } from "./errors";
export {
  CancelledError,
  ConfigError,
  MaxIterationsExceededError,
  MessageValidationError,
  ModelInvocationError,
  SchemaDerivationError,
  TetherError,
  ToolExecutionError,
  toSerializableError,
} from "./errors";
// Messages
export type { MsgInit, MsgJSON } from "./message";
export {
  ContentBlockSchema,
  createMsg,
  generateMsgId,
  getContentBlocks,
  getTextContent,
  getToolUseBlocks,
  hasContentBlocks,
  mediaBlock,
  MsgSchema,
  msgFromJSON,
  msgToJSON,
  textBlock,
  ToolOutputBlockSchema,
  toolResultBlock,
  toolUseBlock,
} from "./message";
// EventStream
export { EventStream } from "./event-stream";
// Memory
export type { InMemoryMemoryOptions, Memory, MemorySnapshot } from "./memory/index";
export { InMemoryMemory } from "./memory/index";
// Tools
export type {
  ApprovalRequest,
  ApprovalResponse,
  Approver,
  ExecuteOptions,
  JsonObjectSchema,
  McpCallResult,
  McpClient,
  McpContent,
  McpRegistrationOptions,
  McpToolDescriptor,
  ParsedToolDoc,
  ToolArgs,
  ToolContext,
  ToolDefinition,
  ToolExecutionResult,
  ToolParameters,
  ToolResponse,
  ToolSchema,
  TruncateDirection,
  TruncationResult,
} from "./tool/index";
export {
  defineTool,
  deriveToolSchema,
  mcpResultToResponse,
  parseToolDoc,
  TOOL_NAME_PATTERN,
  Toolkit,
  ToolkitSnapshot,
  truncateText,
} from "./tool/index";
// Provider
export type {
  AnthropicChatModelOptions,
  AnthropicRequest,
  CallOptions,
  ChatModel,
  Formatter,
  Model,
  ModelBackend,
  ModelDefinition,
  OpenAIChatModelOptions,
  OpenAIChatRequest,
  ProviderErrorType,
  RetryConfig,
} from "./provider/index";
export {
  AnthropicChatModel,
  AnthropicFormatter,
  calculateCost,
  DEFAULT_MODEL_ID,
  DEFAULT_RETRY_CONFIG,
  KNOWN_MODELS,
  OpenAIChatFormatter,
  OpenAIChatModel,
  ProviderError,
  resolveModel,
  withRetry,
} from "./provider/index";
// Steering
export type {
  AskHuman,
  ConfirmationGateOptions,
  ConfirmationPolicy,
  ConfirmWithHuman,
  HumanToolOptions,
  PendingConfirmation,
  PolicyDecision,
} from "./steering/index";
export {
  ConfirmationGate,
  createAskHumanTool,
  createConfirmationTool,
  DEFAULT_CANCEL_REASON,
  SteeringChannel,
} from "./steering/index";
// Agent
export type {
  AgentEvent,
  AgentInput,
  LoopOutcome,
  LoopStatus,
  ReActAgentOptions,
  ReactLoopConfig,
  ToolExecutionMode,
} from "./agent/index";
export { DEFAULT_MAX_ITERATIONS, ReActAgent, reactLoop } from "./agent/index";
// Config
export type { LoadConfigOptions, TetherConfig } from "./config/index";
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadTetherConfig, mergeConfig, TetherConfigSchema } from "./config/index";
// Trace
export type { TraceLoggerOptions, TraceRecord, TraceVerbosity } from "./trace";
export { formatTraceLine, TraceLogger } from "./trace";
