import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ReActAgent } from "../src/agent/agent";
import { CancelledError, MaxIterationsExceededError, ModelInvocationError } from "../src/errors";
import { createMsg, getTextContent } from "../src/message";
import { ProviderError } from "../src/provider/types";
import { Toolkit } from "../src/tool/toolkit";
import { defineTool } from "../src/tool/types";
import { scriptedBackend, textResponse, toolCallResponse } from "./helpers/scripted-model";

function echoToolkit(): Toolkit {
  const toolkit = new Toolkit();
  toolkit.register(defineTool({ name: "echo", parameters: z.object({}), execute: () => "echo" }));
  return toolkit;
}

describe("ReActAgent", () => {
  it("replies with the final assistant message", async () => {
    const { backend } = scriptedBackend([textResponse("Hello there.")]);
    const agent = new ReActAgent({ name: "helper", backend });

    const reply = await agent.reply("Hi");
    expect(reply.name).toBe("helper");
    expect(reply.role).toBe("assistant");
    expect(getTextContent(reply)).toBe("Hello there.");
    expect(agent.memory.size()).toBe(2);
    expect(agent.isRunning).toBe(false);
  });

  it("keeps memory across runs", async () => {
    const { backend, model } = scriptedBackend([textResponse("First."), textResponse("Second.")]);
    const agent = new ReActAgent({ name: "helper", systemPrompt: "Be brief.", backend });

    await agent.reply("one");
    await agent.reply("two");
    expect(model.requests[1]?.msgs.map((m) => getTextContent(m))).toEqual([
      "Be brief.",
      "one",
      "First.",
      "two",
    ]);
  });

  it("observes without calling the model", async () => {
    const { backend, model } = scriptedBackend([]);
    const agent = new ReActAgent({ name: "helper", backend });
    await agent.observe(createMsg({ name: "other", role: "assistant", content: "noted" }));
    expect(agent.memory.size()).toBe(1);
    expect(model.callCount).toBe(0);
  });

  it("reasons over existing memory when run without input", async () => {
    const { backend, model } = scriptedBackend([textResponse("ok")]);
    const agent = new ReActAgent({ name: "helper", backend });
    await agent.observe("context");
    await agent.reply();
    expect(model.requests[0]?.msgs.map((m) => getTextContent(m))).toEqual(["context"]);
  });

  it("throws MaxIterationsExceededError carrying the outcome", async () => {
    const { backend } = scriptedBackend([
      toolCallResponse({ id: "1", name: "echo", input: {} }),
      toolCallResponse({ id: "2", name: "echo", input: {} }),
    ]);
    const agent = new ReActAgent({ name: "helper", backend, toolkit: echoToolkit(), maxIterations: 2 });

    const error = await agent.reply("loop").then(
      () => undefined,
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(MaxIterationsExceededError);
    if (error instanceof MaxIterationsExceededError) {
      expect(error.message).toBe("Reached the iteration limit (2) without a final answer");
      expect(error.outcome.status).toBe("max_iterations");
      expect(error.outcome.messages).toHaveLength(5);
    }
  });

  it("throws CancelledError when interrupted", async () => {
    const agent: ReActAgent = new ReActAgent({
      name: "helper",
      backend: scriptedBackend([
        () => {
          expect(agent.interrupt("stop")).toBe(true);
          expect(agent.interrupt("again")).toBe(false);
          return toolCallResponse({ id: "1", name: "echo", input: {} });
        },
      ]).backend,
      toolkit: echoToolkit(),
    });

    await expect(agent.reply("go")).rejects.toThrow(CancelledError);
    expect(agent.isRunning).toBe(false);
    expect(agent.interrupt()).toBe(false);
  });

  it("propagates model failures and releases the agent", async () => {
    const { backend } = scriptedBackend([new ProviderError("bad key", "auth", false), textResponse("recovered")]);
    const agent = new ReActAgent({ name: "helper", backend });

    await expect(agent.reply("hi")).rejects.toThrow(ModelInvocationError);
    expect(agent.isRunning).toBe(false);
    expect(getTextContent(await agent.reply("again"))).toBe("recovered");
  });

  it("refuses a second concurrent run", async () => {
    const { backend } = scriptedBackend([textResponse("done")]);
    const agent = new ReActAgent({ name: "helper", backend });
    const stream = agent.run("first");
    expect(agent.isRunning).toBe(true);
    expect(() => agent.run("second")).toThrow('Agent "helper" is already running');
    await stream.result();
    expect(agent.isRunning).toBe(false);
  });

  it("delivers messages injected while idle to the next run", async () => {
    const { backend, model } = scriptedBackend([textResponse("ok")]);
    const agent = new ReActAgent({ name: "helper", backend });
    agent.inject("remember the budget");
    await agent.reply("plan a trip");
    expect(model.requests[0]?.msgs.map((m) => getTextContent(m))).toEqual(["plan a trip", "remember the budget"]);
  });

  it("starts each run with a fresh steering channel", async () => {
    const agent: ReActAgent = new ReActAgent({
      name: "helper",
      backend: scriptedBackend([
        () => {
          agent.interrupt("first run");
          return toolCallResponse({ id: "1", name: "echo", input: {} });
        },
        textResponse("ok"),
      ]).backend,
      toolkit: echoToolkit(),
    });

    await expect(agent.reply("go")).rejects.toThrow("Run cancelled: first run");
    expect(agent.steering.isCancelled).toBe(false);
    expect(getTextContent(await agent.reply("next"))).toBe("ok");
  });
});
