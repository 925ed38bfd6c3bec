import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { type ParseError, parse as parseJsonc, printParseErrorCode } from "jsonc-parser";
import { ConfigError } from "../errors";
import { DEFAULT_CONFIG, type TetherConfig, TetherConfigSchema } from "./schema";

export const CONFIG_FILE_NAME = "tether.jsonc";

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Directory holding the global config. Default: ~/.config/tether */
  globalDir?: string;
}

/** Load and merge config from all sources (global < project < env) */
export async function loadTetherConfig(
  cwd: string,
  options: LoadConfigOptions = {},
): Promise<{ config: TetherConfig; sources: string[] }> {
  const env = options.env ?? process.env;
  const sources: string[] = [];

  // Layer 1: Global config
  const globalPath = join(options.globalDir ?? join(homedir(), ".config", "tether"), CONFIG_FILE_NAME);
  const globalConfig = await loadConfigFile(globalPath, env);
  if (globalConfig) sources.push(globalPath);

  // Layer 2: Project config
  const projectPath = join(cwd, CONFIG_FILE_NAME);
  const projectConfig = await loadConfigFile(projectPath, env);
  if (projectConfig) sources.push(projectPath);

  let merged: TetherConfig = mergeConfig({}, DEFAULT_CONFIG);
  if (globalConfig) merged = mergeConfig(merged, globalConfig);
  if (projectConfig) merged = mergeConfig(merged, projectConfig);

  // Layer 3: Environment variable overrides
  merged = applyEnvOverrides(merged, env);

  return { config: merged, sources };
}

/**
 * Parse a JSONC file and validate it. Missing files yield null; unreadable
 * or invalid ones are reported with console.warn and skipped.
 */
async function loadConfigFile(path: string, env: Record<string, string | undefined>): Promise<TetherConfig | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    console.warn(`Config warning: ${path}\n${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const details = errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`).join("\n");
    console.warn(`Config warning: ${path}\n${details}`);
    return null;
  }

  const result = TetherConfigSchema.safeParse(substituteTemplates(parsed, env));
  if (!result.success) {
    console.warn(`Config warning: ${path}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

/** Shallow merge with one level of nesting for object-valued keys. */
export function mergeConfig(base: TetherConfig, override: TetherConfig): TetherConfig {
  return {
    ...base,
    ...override,
    provider:
      base.provider || override.provider
        ? {
            openai: mergeSection(base.provider?.openai, override.provider?.openai),
            anthropic: mergeSection(base.provider?.anthropic, override.provider?.anthropic),
          }
        : undefined,
    agent: mergeSection(base.agent, override.agent),
  };
}

function mergeSection<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
  if (!base) return override ? { ...override } : undefined;
  if (!override) return { ...base };
  const merged: T = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}

/** Environment variable overrides (Layer 3) */
export function applyEnvOverrides(config: TetherConfig, env: Record<string, string | undefined>): TetherConfig {
  const result: TetherConfig = { ...config };
  if (env.OPENAI_API_KEY) {
    result.provider = { ...result.provider, openai: { ...result.provider?.openai, apiKey: env.OPENAI_API_KEY } };
  }
  if (env.ANTHROPIC_API_KEY) {
    result.provider = { ...result.provider, anthropic: { ...result.provider?.anthropic, apiKey: env.ANTHROPIC_API_KEY } };
  }
  if (env.TETHER_MODEL) {
    result.model = env.TETHER_MODEL;
  }
  if (env.TETHER_MAX_ITERATIONS) {
    const maxIterations = Number(env.TETHER_MAX_ITERATIONS);
    if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
      throw new ConfigError(`TETHER_MAX_ITERATIONS must be a positive integer, got "${env.TETHER_MAX_ITERATIONS}"`);
    }
    result.agent = { ...result.agent, maxIterations };
  }
  if (env.TETHER_TRACE !== undefined && env.TETHER_TRACE !== "") {
    result.trace = !["0", "false", "off", "no"].includes(env.TETHER_TRACE.toLowerCase());
  }
  if (env.TETHER_TRACE_FILE) {
    result.traceFile = env.TETHER_TRACE_FILE;
  }
  return result;
}

/** Template substitution: {env:VAR_NAME} → env[VAR_NAME] */
export function substituteTemplates(obj: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\{env:([^}]+)\}/g, (_, varName: string) => env[varName] ?? "");
  }
  if (Array.isArray(obj)) return obj.map((item) => substituteTemplates(item, env));
  if (typeof obj === "object" && obj !== null) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = substituteTemplates(v, env);
    }
    return result;
  }
  return obj;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
