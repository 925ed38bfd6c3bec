import type { Usage } from "../types";
import type { Model } from "./types";

export interface ModelDefinition extends Model {
  aliases?: string[];
}

export const KNOWN_MODELS: ModelDefinition[] = [
  // OpenAI
  {
    id: "gpt-4o-mini",
    provider: "openai",
    contextWindow: 128_000,
    maxOutputTokens: 16_384,
    inputCostPer1M: 0.15,
    outputCostPer1M: 0.6,
    aliases: ["4o-mini", "mini"],
  },
  {
    id: "gpt-4o",
    provider: "openai",
    contextWindow: 128_000,
    maxOutputTokens: 16_384,
    inputCostPer1M: 2.5,
    outputCostPer1M: 10.0,
    aliases: ["4o"],
  },
  {
    id: "gpt-4.1",
    provider: "openai",
    contextWindow: 1_047_576,
    maxOutputTokens: 32_768,
    inputCostPer1M: 2.0,
    outputCostPer1M: 8.0,
    aliases: ["4.1"],
  },
  // Anthropic
  {
    id: "claude-sonnet-4-20250514",
    provider: "anthropic",
    contextWindow: 200_000,
    maxOutputTokens: 16_384,
    inputCostPer1M: 3.0,
    outputCostPer1M: 15.0,
    aliases: ["claude-sonnet", "sonnet"],
  },
  {
    id: "claude-3-5-haiku-20241022",
    provider: "anthropic",
    contextWindow: 200_000,
    maxOutputTokens: 8_192,
    inputCostPer1M: 0.8,
    outputCostPer1M: 4.0,
    aliases: ["claude-haiku", "haiku"],
  },
];

export const DEFAULT_MODEL_ID = "gpt-4o-mini";

/**
 * Resolve a model ID or alias to a full Model.
 * For unknown models, infer provider from ID prefix.
 */
export function resolveModel(modelId: string): Model {
  const exact = KNOWN_MODELS.find((m) => m.id === modelId);
  if (exact) return exact;

  const aliased = KNOWN_MODELS.find((m) => m.aliases?.includes(modelId));
  if (aliased) return aliased;

  if (modelId.startsWith("claude-")) {
    return { id: modelId, provider: "anthropic", contextWindow: 200_000, maxOutputTokens: 8_192 };
  }
  // OpenAI-compatible servers take arbitrary model names
  return { id: modelId, provider: "openai", contextWindow: 128_000, maxOutputTokens: 16_384 };
}

/** USD cost of one call. Models without pricing cost 0. */
export function calculateCost(model: Model, usage: Usage): number {
  const inputCost = (usage.inputTokens / 1_000_000) * (model.inputCostPer1M ?? 0);
  const outputCost = (usage.outputTokens / 1_000_000) * (model.outputCostPer1M ?? 0);
  return inputCost + outputCost;
}
