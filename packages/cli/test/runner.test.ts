import type { Msg, ToolResultBlock } from "@tether/core";
import { ConfirmationGate, defineTool, ReActAgent, Toolkit, TraceLogger } from "@tether/core";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  type ScriptStep,
  scriptedBackend,
  streamedTextResponse,
  textResponse,
  toolCallResponse,
} from "../../core/test/helpers/scripted-model";
import { EXIT_ERROR, EXIT_INCOMPLETE, EXIT_OK, NonInteractiveRunner, type Prompter } from "../src/runner";
import { buildToolkit } from "../src/tools";

interface Harness {
  runner: NonInteractiveRunner;
  model: ReturnType<typeof scriptedBackend>["model"];
  stdout: string[];
  stderr: string[];
  trace: string[];
}

function setup(
  steps: ScriptStep[],
  options: { toolkit?: Toolkit; prompter?: Prompter; maxIterations?: number; gate?: ConfirmationGate } = {},
): Harness {
  const { backend, model } = scriptedBackend(steps);
  const agent = new ReActAgent<unknown>({
    name: "tether",
    systemPrompt: "You are a test assistant.",
    backend,
    toolkit: options.toolkit ?? buildToolkit({ now: () => new Date("2024-03-01T12:00:00Z") }),
    maxIterations: options.maxIterations,
    confirmations: options.gate,
  });
  const stdout: string[] = [];
  const stderr: string[] = [];
  const trace: string[] = [];
  const runner = new NonInteractiveRunner(agent, {
    trace: new TraceLogger({ stderr: "progress", write: (line) => trace.push(line) }),
    prompter: options.prompter,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
  });
  return { runner, model, stdout, stderr, trace };
}

function guardedToolkit(execute: (path: string) => string): Toolkit {
  const toolkit = new Toolkit();
  toolkit.register(
    defineTool({
      name: "delete_file",
      doc: "Delete a file.\n@param path - File path",
      parameters: z.object({ path: z.string() }),
      requiresConfirmation: true,
      execute: ({ path }) => execute(path),
    }),
  );
  return toolkit;
}

function lastToolResult(msgs: readonly Msg[]): ToolResultBlock | undefined {
  const last = msgs[msgs.length - 1];
  return last?.content.find((block): block is ToolResultBlock => block.type === "tool_result");
}

describe("NonInteractiveRunner", () => {
  it("prints the final answer and exits 0", async () => {
    const h = setup([textResponse("Paris.")]);
    const code = await h.runner.run("What is the capital of France?");
    expect(code).toBe(EXIT_OK);
    expect(h.stdout).toEqual(["Paris.\n"]);
    expect(h.stderr).toEqual([]);
    expect(h.trace).toEqual(["[usage] 10in/5out\n"]);
  });

  it("writes streamed text as it arrives without repeating the answer", async () => {
    const h = setup([streamedTextResponse("Par", "is.")]);
    const code = await h.runner.run("What is the capital of France?");
    expect(code).toBe(EXIT_OK);
    expect(h.stdout).toEqual(["Par", "is.", "\n"]);
  });

  it("ends each streamed turn on its own line", async () => {
    const h = setup([
      (_request, options) => {
        options.onTextDelta?.("Checking the clock.");
        const call = toolCallResponse({ id: "call_1", name: "get_current_time", input: {} });
        return { ...call, content: [{ type: "text", text: "Checking the clock." }, ...call.content] };
      },
      textResponse("It is noon UTC."),
    ]);
    const code = await h.runner.run("What time is it?");
    expect(code).toBe(EXIT_OK);
    expect(h.stdout).toEqual(["Checking the clock.", "\n", "It is noon UTC.\n"]);
  });

  it("runs tools and reports progress", async () => {
    const h = setup([
      toolCallResponse({ id: "call_1", name: "get_current_time", input: {} }),
      textResponse("It is noon UTC."),
    ]);
    const code = await h.runner.run("What time is it?");
    expect(code).toBe(EXIT_OK);
    expect(h.stdout).toEqual(["It is noon UTC.\n"]);
    expect(h.trace).toEqual([
      "[usage] 10in/5out\n",
      "[tool:get_current_time] Running...\n",
      expect.stringMatching(/^\[tool:get_current_time\] Done \(1 lines, \d+ms\)\n$/),
      "[usage] 10in/5out\n",
    ]);
  });

  it("exits 2 when the iteration limit is reached", async () => {
    const h = setup([toolCallResponse({ id: "call_1", name: "get_current_time", input: {} })], { maxIterations: 1 });
    const code = await h.runner.run("What time is it?");
    expect(code).toBe(EXIT_INCOMPLETE);
    expect(h.stdout).toEqual([]);
    expect(h.stderr).toEqual(["[stopped] No final answer after 1 iterations\n"]);
  });

  it("exits 1 on a model failure, reported once through the trace", async () => {
    const h = setup([new Error("upstream down")]);
    const code = await h.runner.run("hello");
    expect(code).toBe(EXIT_ERROR);
    expect(h.stderr).toEqual([]);
    expect(h.trace).toEqual(["[error] Model call failed: upstream down\n"]);
  });

  describe("confirmations", () => {
    const steps = (): ScriptStep[] => [
      toolCallResponse({ id: "call_1", name: "delete_file", input: { path: "a.txt" } }),
      textResponse("Done."),
    ];

    it("asks on the prompter and runs the tool when approved", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const prompter = vi.fn<Prompter>(async () => "y");
      const h = setup(steps(), { toolkit: guardedToolkit(execute), prompter });

      expect(await h.runner.run("delete a.txt")).toBe(EXIT_OK);
      expect(prompter).toHaveBeenCalledWith('Allow delete_file {"path":"a.txt"}? [y]es / [a]lways / [N]o: ');
      expect(execute).toHaveBeenCalledWith("a.txt");
      expect(lastToolResult(h.model.requests[1]?.msgs ?? [])?.output).toEqual([{ type: "text", text: "deleted a.txt" }]);
    });

    it("denies when the answer is anything but yes", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const h = setup(steps(), { toolkit: guardedToolkit(execute), prompter: async () => "" });

      expect(await h.runner.run("delete a.txt")).toBe(EXIT_OK);
      expect(execute).not.toHaveBeenCalled();
      expect(lastToolResult(h.model.requests[1]?.msgs ?? [])?.output).toEqual([
        { type: "text", text: "Denied: denied by user" },
      ]);
    });

    it("denies without a prompter", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const h = setup(steps(), { toolkit: guardedToolkit(execute) });

      expect(await h.runner.run("delete a.txt")).toBe(EXIT_OK);
      expect(execute).not.toHaveBeenCalled();
      expect(lastToolResult(h.model.requests[1]?.msgs ?? [])?.output).toEqual([
        { type: "text", text: "Denied: no terminal available to confirm" },
      ]);
    });

    it("remembers an always answer for later calls", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const prompter = vi.fn<Prompter>(async () => "always");
      const h = setup(
        [
          toolCallResponse({ id: "call_1", name: "delete_file", input: { path: "a.txt" } }),
          toolCallResponse({ id: "call_2", name: "delete_file", input: { path: "b.txt" } }),
          textResponse("Done."),
        ],
        { toolkit: guardedToolkit(execute), prompter },
      );

      expect(await h.runner.run("delete both")).toBe(EXIT_OK);
      expect(prompter).toHaveBeenCalledTimes(1);
      expect(execute.mock.calls).toEqual([["a.txt"], ["b.txt"]]);
    });

    it("denies when the prompter fails", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const h = setup(steps(), {
        toolkit: guardedToolkit(execute),
        prompter: async () => {
          throw new Error("terminal closed");
        },
      });

      expect(await h.runner.run("delete a.txt")).toBe(EXIT_OK);
      expect(lastToolResult(h.model.requests[1]?.msgs ?? [])?.output).toEqual([
        { type: "text", text: "Denied: confirmation failed: terminal closed" },
      ]);
    });

    it("skips the prompt when the gate policy approves", async () => {
      const execute = vi.fn((path: string) => `deleted ${path}`);
      const prompter = vi.fn<Prompter>(async () => "n");
      const h = setup(steps(), {
        toolkit: guardedToolkit(execute),
        prompter,
        gate: new ConfirmationGate({ policy: () => "approve" }),
      });

      expect(await h.runner.run("delete a.txt")).toBe(EXIT_OK);
      expect(prompter).not.toHaveBeenCalled();
      expect(execute).toHaveBeenCalledWith("a.txt");
    });
  });
});
