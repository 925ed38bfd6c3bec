import type { LoadConfigOptions, Model, ModelBackend, TetherConfig } from "@tether/core";
import {
  AnthropicChatModel,
  AnthropicFormatter,
  ConfigError,
  DEFAULT_MODEL_ID,
  loadTetherConfig,
  OpenAIChatFormatter,
  OpenAIChatModel,
  resolveModel,
  withRetry,
} from "@tether/core";

export interface AppConfig {
  model: Model;
  backend: ModelBackend;
  systemPrompt: string;
  tether: TetherConfig;
  sources: string[];
}

export interface LoadAppConfigOptions extends LoadConfigOptions {
  /** Called before each retry of a failed model call. */
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
}

const BASE_SYSTEM_PROMPT = [
  "You are a helpful assistant. Answer the user's request, calling tools when they help.",
  "When information is missing and a human is available, ask them with the ask_human tool.",
].join("\n");

export async function loadConfig(cwd: string = process.cwd(), options: LoadAppConfigOptions = {}): Promise<AppConfig> {
  const { config, sources } = await loadTetherConfig(cwd, options);

  const model = resolveModel(config.model ?? DEFAULT_MODEL_ID);
  const backend = createBackend(model, config, options.onRetry);

  const basePrompt = config.systemPrompt ?? BASE_SYSTEM_PROMPT;
  const contextLines = [`Current working directory: ${cwd}`, `Date: ${new Date().toISOString().split("T")[0]}`];

  return { model, backend, systemPrompt: [basePrompt, ...contextLines].join("\n"), tether: config, sources };
}

/** Provider backend for a resolved model, with retries from `agent.maxRetries`. */
export function createBackend(
  model: Model,
  config: TetherConfig,
  onRetry?: (attempt: number, delayMs: number, error: Error) => void,
): ModelBackend {
  const retry = { maxAttempts: (config.agent?.maxRetries ?? 3) + 1, onRetry };

  if (model.provider === "anthropic") {
    const settings = config.provider?.anthropic;
    if (!settings?.apiKey) {
      throw new ConfigError(
        "ANTHROPIC_API_KEY environment variable is required for Anthropic models.\n" +
          "Get your API key at https://console.anthropic.com/settings/keys",
      );
    }
    return {
      formatter: new AnthropicFormatter(),
      model: withRetry(new AnthropicChatModel({ model, apiKey: settings.apiKey, baseUrl: settings.baseUrl }), retry),
    };
  }

  const settings = config.provider?.openai;
  if (!settings?.apiKey) {
    throw new ConfigError(
      "OPENAI_API_KEY environment variable is required for OpenAI models.\n" +
        "Get your API key at https://platform.openai.com/api-keys",
    );
  }
  return {
    formatter: new OpenAIChatFormatter(),
    model: withRetry(new OpenAIChatModel({ model, apiKey: settings.apiKey, baseUrl: settings.baseUrl }), retry),
  };
}
