import { z } from "zod";
import { DEFAULT_MAX_ITERATIONS } from "../agent/types";
import { DEFAULT_MODEL_ID } from "../provider/models";

export const ModelId = z.string().min(1).describe("Model identifier or alias, e.g. 'gpt-4o-mini' or 'sonnet'");

const ProviderSettings = z
  .object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
  })
  .strict();

export const TetherConfigSchema = z
  .object({
    $schema: z.string().optional(),

    model: ModelId.optional(),
    provider: z
      .object({
        openai: ProviderSettings.optional(),
        anthropic: ProviderSettings.optional(),
      })
      .strict()
      .optional(),
    systemPrompt: z.string().optional(),

    // Loop behaviour
    agent: z
      .object({
        maxIterations: z.number().int().positive().optional(),
        toolResultMaxLength: z.number().int().nonnegative().optional(), // 0 = unlimited
        toolExecution: z.enum(["parallel", "sequential"]).optional(),
        maxRetries: z.number().int().positive().optional(),
        stream: z.boolean().optional(),
      })
      .strict()
      .optional(),

    // Diagnostics
    trace: z.boolean().optional(),
    traceFile: z.string().optional(),
  })
  .strict();

export type TetherConfig = z.infer<typeof TetherConfigSchema>;

export const DEFAULT_CONFIG: TetherConfig = {
  model: DEFAULT_MODEL_ID,
  agent: {
    maxIterations: DEFAULT_MAX_ITERATIONS,
    toolResultMaxLength: 0,
    toolExecution: "parallel",
    maxRetries: 3,
    stream: true,
  },
  trace: false,
};
