import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { SchemaDerivationError } from "../errors";
import { parseToolDoc } from "./doc";
import type { JsonObjectSchema, ToolDefinition, ToolSchema } from "./types";

export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Derive a frozen ToolSchema from a tool definition.
 *
 * Phase 1 extracts each parameter's type and required-ness from the zod
 * shape. Phase 2 binds descriptions from the doc block; a `.describe()` on
 * the parameter wins over the doc.
 */
export function deriveToolSchema<TShape extends z.ZodRawShape>(tool: ToolDefinition<TShape>): ToolSchema {
  if (!TOOL_NAME_PATTERN.test(tool.name)) {
    throw new SchemaDerivationError(tool.name, `name must match ${TOOL_NAME_PATTERN}`);
  }

  // Phase 1: structure
  const shape: z.ZodRawShape = tool.parameters.shape;
  const required: string[] = [];
  for (const [key, type] of Object.entries(shape)) {
    const unresolved = unresolvableTypeName(unwrapParameter(type));
    if (unresolved) {
      throw new SchemaDerivationError(tool.name, `parameter "${key}" has no resolvable type (${unresolved})`);
    }
    if (!type.isOptional()) required.push(key);
  }

  // Phase 2: descriptions
  const doc = tool.doc ? parseToolDoc(tool.doc) : { summary: "", params: [] };
  const docDescriptions = new Map<string, string>();
  for (const param of doc.params) {
    if (!(param.name in shape)) {
      throw new SchemaDerivationError(tool.name, `doc describes unknown parameter "${param.name}"`);
    }
    if (docDescriptions.has(param.name)) {
      throw new SchemaDerivationError(tool.name, `doc describes parameter "${param.name}" more than once`);
    }
    docDescriptions.set(param.name, param.description);
  }

  const generated: unknown = zodToJsonSchema(tool.parameters, { $refStrategy: "none" });
  const generatedProperties: Record<string, unknown> =
    isRecord(generated) && isRecord(generated.properties) ? generated.properties : {};

  const properties: JsonObjectSchema["properties"] = {};
  for (const key of Object.keys(shape)) {
    const generatedProperty = generatedProperties[key];
    const property: Record<string, unknown> = isRecord(generatedProperty) ? { ...generatedProperty } : {};
    const docDescription = docDescriptions.get(key);
    if (property.description === undefined && docDescription) {
      property.description = docDescription;
    }
    properties[key] = Object.freeze(property);
  }

  const parameters: JsonObjectSchema = { type: "object", properties: Object.freeze(properties), required };
  if (isRecord(generated) && generated.additionalProperties !== undefined) {
    parameters.additionalProperties = generated.additionalProperties;
  }

  return Object.freeze({
    name: tool.name,
    description: tool.description ?? doc.summary,
    parameters: Object.freeze(parameters),
    required: Object.freeze([...required]),
  });
}

/** Strip wrappers that do not change the JSON type of a parameter. */
function unwrapParameter(type: z.ZodTypeAny): z.ZodTypeAny {
  let current = type;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded || current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else {
      return current;
    }
  }
}

function unresolvableTypeName(type: z.ZodTypeAny): string | undefined {
  if (type instanceof z.ZodAny) return "any";
  if (type instanceof z.ZodUnknown) return "unknown";
  if (type instanceof z.ZodNever) return "never";
  if (type instanceof z.ZodVoid) return "void";
  if (type instanceof z.ZodUndefined) return "undefined";
  if (type instanceof z.ZodFunction) return "function";
  if (type instanceof z.ZodPromise) return "promise";
  if (type instanceof z.ZodSymbol) return "symbol";
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
