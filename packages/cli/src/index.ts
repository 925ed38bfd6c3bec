#!/usr/bin/env -S npx tsx
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { ConfirmationGate, ReActAgent, TraceLogger } from "@tether/core";
import { loadConfig } from "./config";
import { EXIT_ERROR, NonInteractiveRunner, type Prompter } from "./runner";
import { buildToolkit } from "./tools";

const VERSION = "0.1.0";

async function main(): Promise<number> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      prompt: { type: "string", short: "p" },
      "max-iterations": { type: "string" },
      trace: { type: "boolean" },
      yes: { type: "boolean", short: "y" },
      version: { type: "boolean", short: "v" },
    },
  });

  if (values.version) {
    console.log(`tether ${VERSION}`);
    return 0;
  }

  let maxIterationsFlag: number | undefined;
  if (values["max-iterations"] !== undefined) {
    maxIterationsFlag = Number(values["max-iterations"]);
    if (!Number.isInteger(maxIterationsFlag) || maxIterationsFlag <= 0) {
      console.error(`Error: --max-iterations must be a positive integer, got "${values["max-iterations"]}"`);
      return EXIT_ERROR;
    }
  }

  let prompt: string;
  if (values.prompt !== undefined) {
    prompt = values.prompt.trim();
    if (!prompt) {
      console.error("Error: --prompt requires a non-empty string");
      return EXIT_ERROR;
    }
  } else if (!process.stdin.isTTY) {
    prompt = await readStdin();
    if (!prompt) {
      console.error("Error: stdin was empty");
      return EXIT_ERROR;
    }
  } else {
    console.error('Usage: tether -p "<prompt>"  (or pipe the prompt on stdin)');
    return EXIT_ERROR;
  }

  const isTTY = process.stderr.isTTY === true;
  const config = await loadConfig(process.cwd(), {
    onRetry: (attempt, delayMs, error) => {
      process.stderr.write(`[retry] attempt ${attempt} in ${delayMs}ms: ${error.message}\n`);
    },
  });
  const settings = config.tether;
  const trace = new TraceLogger({
    stderr: values.trace || settings.trace ? "trace" : "progress",
    file: settings.traceFile,
    color: isTTY,
  });

  const onSigint = () => {
    // A second Ctrl-C exits immediately
    if (!agent.interrupt("interrupted by user")) process.exit(130);
  };

  // Confirmations and ask_human need a terminal that is not carrying the prompt
  const prompter = process.stdin.isTTY ? createTerminalPrompter(onSigint) : undefined;
  const agent = new ReActAgent({
    name: "tether",
    systemPrompt: config.systemPrompt,
    backend: config.backend,
    toolkit: buildToolkit({ ask: prompter && ((question, signal) => prompter.ask(`${question}\n> `, signal)) }),
    maxIterations: maxIterationsFlag ?? settings.agent?.maxIterations,
    toolExecution: settings.agent?.toolExecution,
    toolResultMaxLength: settings.agent?.toolResultMaxLength,
    stream: settings.agent?.stream,
    confirmations: new ConfirmationGate(values.yes ? { policy: () => "approve" } : {}),
    modelInfo: config.model,
  });

  process.on("SIGINT", onSigint);

  try {
    const runner = new NonInteractiveRunner(agent, { trace, prompter: prompter?.ask });
    return await runner.run(prompt);
  } finally {
    process.off("SIGINT", onSigint);
    prompter?.close();
  }
}

/** Serialises questions on the terminal; stdout stays reserved for the answer. */
function createTerminalPrompter(onSigint: () => void): { ask: Prompter; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  // readline swallows Ctrl-C while it owns the terminal
  rl.on("SIGINT", onSigint);
  let queue: Promise<unknown> = Promise.resolve();
  const ask: Prompter = (question, signal) => {
    const next = queue.then(() => (signal ? rl.question(question, { signal }) : rl.question(question)));
    queue = next.catch(() => undefined);
    return next;
  };
  return { ask, close: () => rl.close() };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8").trim();
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`\x1b[31mError:\x1b[0m ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_ERROR);
  },
);
