import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AnthropicFormatter, ConfigError, OpenAIChatFormatter, resolveModel } from "@tether/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createBackend, loadConfig } from "../src/config";

describe("createBackend", () => {
  it("requires an OpenAI key for OpenAI models", () => {
    expect(() => createBackend(resolveModel("gpt-4o-mini"), {})).toThrow(ConfigError);
    expect(() => createBackend(resolveModel("gpt-4o-mini"), {})).toThrow(/OPENAI_API_KEY/);
  });

  it("requires an Anthropic key for Anthropic models", () => {
    expect(() => createBackend(resolveModel("sonnet"), { provider: { openai: { apiKey: "test-key" } } })).toThrow(
      /ANTHROPIC_API_KEY/,
    );
  });

  it("picks the formatter that matches the provider", () => {
    const openai = createBackend(resolveModel("gpt-4o"), { provider: { openai: { apiKey: "test-key" } } });
    expect(openai.formatter).toBeInstanceOf(OpenAIChatFormatter);
    expect(openai.model.modelId).toBe("gpt-4o");

    const anthropic = createBackend(resolveModel("sonnet"), { provider: { anthropic: { apiKey: "test-key" } } });
    expect(anthropic.formatter).toBeInstanceOf(AnthropicFormatter);
    expect(anthropic.model.modelId).toBe("claude-sonnet-4-20250514");
  });
});

describe("loadConfig", () => {
  let root: string;
  let globalDir: string;
  let projectDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tether-cli-"));
    globalDir = join(root, "global");
    projectDir = join(root, "project");
    await Promise.all([mkdir(globalDir), mkdir(projectDir)]);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves the default model and appends context to the system prompt", async () => {
    const config = await loadConfig(projectDir, { env: { OPENAI_API_KEY: "test-key" }, globalDir });
    expect(config.model.id).toBe("gpt-4o-mini");
    expect(config.sources).toEqual([]);
    const lines = config.systemPrompt.split("\n");
    expect(lines).toContain(`Current working directory: ${projectDir}`);
    expect(lines[lines.length - 1]).toMatch(/^Date: \d{4}-\d{2}-\d{2}$/);
  });

  it("uses the configured model and system prompt", async () => {
    await writeFile(join(projectDir, "tether.jsonc"), JSON.stringify({ model: "haiku", systemPrompt: "Be brief." }));
    const config = await loadConfig(projectDir, { env: { ANTHROPIC_API_KEY: "test-key" }, globalDir });
    expect(config.model.id).toBe("claude-3-5-haiku-20241022");
    expect(config.systemPrompt.split("\n")[0]).toBe("Be brief.");
    expect(config.sources).toEqual([join(projectDir, "tether.jsonc")]);
  });

  it("fails without a key for the chosen provider", async () => {
    await expect(loadConfig(projectDir, { env: {}, globalDir })).rejects.toThrow(/OPENAI_API_KEY/);
  });
});
