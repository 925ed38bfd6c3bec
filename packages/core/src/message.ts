import { randomUUID } from "node:crypto";
import { z } from "zod";
import { MessageValidationError } from "./errors";
import type {
  ContentBlock,
  ContentBlockType,
  MediaBlock,
  MediaKind,
  Msg,
  Role,
  TextBlock,
  ToolOutputBlock,
  ToolResultBlock,
  ToolUseBlock,
} from "./types";
import { ROLES } from "./types";

const TextBlockSchema = z.object({ type: z.literal("text"), text: z.string() });

const MediaBlockSchema = z.object({
  type: z.literal("media"),
  kind: z.enum(["image", "audio", "video"]),
  ref: z.string().min(1, "media ref must not be empty"),
});

const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string().min(1, "tool_use id must not be empty"),
  name: z.string().min(1, "tool_use name must not be empty"),
  input: z.record(z.unknown()),
});

export const ToolOutputBlockSchema = z.discriminatedUnion("type", [TextBlockSchema, MediaBlockSchema]);

const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  id: z.string().min(1, "tool_result id must not be empty"),
  name: z.string(),
  output: z.array(ToolOutputBlockSchema),
  isError: z.boolean(),
});

export const ContentBlockSchema = z.discriminatedUnion("type", [
  TextBlockSchema,
  ToolUseBlockSchema,
  ToolResultBlockSchema,
  MediaBlockSchema,
]);

export const MsgSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  role: z.enum(ROLES),
  content: z.array(ContentBlockSchema).min(1, "content must not be empty"),
  timestamp: z.number().int().nonnegative(),
  metadata: z.record(z.unknown()).optional(),
});

/** Plain, mutable form of a Msg, as produced by msgToJSON. */
export type MsgJSON = z.infer<typeof MsgSchema>;

export interface MsgInit {
  name: string;
  role: Role;
  /** A string becomes a single text block. */
  content: string | readonly ContentBlock[];
  metadata?: Record<string, unknown>;
  id?: string;
  timestamp?: number;
}

export function generateMsgId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}

/**
 * Build a validated, deeply frozen Msg.
 * @throws MessageValidationError when role, content or block shapes are invalid.
 */
export function createMsg(init: MsgInit): Msg {
  const content = typeof init.content === "string" ? [textBlock(init.content)] : init.content;
  return parseMsg({
    id: init.id ?? generateMsgId(),
    name: init.name,
    role: init.role,
    content,
    timestamp: init.timestamp ?? Date.now(),
    ...(init.metadata !== undefined && { metadata: init.metadata }),
  });
}

export function msgToJSON(msg: Msg): MsgJSON {
  return structuredClone({
    id: msg.id,
    name: msg.name,
    role: msg.role,
    content: [...msg.content],
    timestamp: msg.timestamp,
    ...(msg.metadata !== undefined && { metadata: { ...msg.metadata } }),
  });
}

export function msgFromJSON(value: unknown): Msg {
  return parseMsg(value);
}

function parseMsg(value: unknown): Msg {
  const result = MsgSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new MessageValidationError(`Invalid message: ${issues.join("; ")}`, issues);
  }
  return deepFreeze(result.data);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// --- Accessors ---

/** Concatenate all text blocks in order. `undefined` when the message carries no text. */
export function getTextContent(msg: Msg, separator = "\n"): string | undefined {
  const texts = getContentBlocks(msg, "text").map((block) => block.text);
  return texts.length > 0 ? texts.join(separator) : undefined;
}

export function getToolUseBlocks(msg: Msg): ToolUseBlock[] {
  return getContentBlocks(msg, "tool_use");
}

export function getContentBlocks(msg: Msg): ContentBlock[];
export function getContentBlocks<K extends ContentBlockType>(msg: Msg, type: K): Extract<ContentBlock, { type: K }>[];
export function getContentBlocks(msg: Msg, type?: ContentBlockType): ContentBlock[] {
  if (type === undefined) return [...msg.content];
  return msg.content.filter((block) => block.type === type);
}

export function hasContentBlocks(msg: Msg, type?: ContentBlockType): boolean {
  if (type === undefined) return msg.content.length > 0;
  return msg.content.some((block) => block.type === type);
}

// --- Block constructors ---

export function textBlock(text: string): TextBlock {
  return { type: "text", text };
}

export function mediaBlock(kind: MediaKind, ref: string): MediaBlock {
  return { type: "media", kind, ref };
}

export function toolUseBlock(id: string, name: string, input: Record<string, unknown>): ToolUseBlock {
  return { type: "tool_use", id, name, input };
}

export function toolResultBlock(
  id: string,
  name: string,
  output: string | ToolOutputBlock[],
  isError = false,
): ToolResultBlock {
  return {
    type: "tool_result",
    id,
    name,
    output: typeof output === "string" ? [textBlock(output)] : output,
    isError,
  };
}
