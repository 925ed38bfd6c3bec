// Content blocks
export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | MediaBlock;
export type ContentBlockType = ContentBlock["type"];

export interface TextBlock {
  type: "text";
  text: string;
}

export type MediaKind = "image" | "audio" | "video";

/** Reference to binary content. `ref` is a URL or a `data:` URL. */
export interface MediaBlock {
  type: "media";
  kind: MediaKind;
  ref: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/** Blocks a tool may return. */
export type ToolOutputBlock = TextBlock | MediaBlock;

export interface ToolResultBlock {
  type: "tool_result";
  /** Matches the `id` of the ToolUseBlock this result answers. */
  id: string;
  name: string;
  output: ToolOutputBlock[];
  isError: boolean;
}

export type Role = "user" | "assistant" | "system" | "tool";

export const ROLES = ["user", "assistant", "system", "tool"] as const satisfies readonly Role[];

// Messages are frozen by createMsg and never mutated afterwards
export interface Msg {
  readonly id: string;
  readonly name: string;
  readonly role: Role;
  readonly content: readonly ContentBlock[];
  readonly timestamp: number;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "error";

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: ContentBlock[];
  usage: Usage;
  stopReason: StopReason;
}
