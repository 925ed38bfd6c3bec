import { appendFileSync, writeFileSync } from "node:fs";
import type { AgentEvent } from "./agent/types";

/**
 * Event logger for agent runs.
 *
 * - `stderr: "progress"` writes tool, usage and error lines only.
 * - `stderr: "trace"` writes a line for every event that has one.
 * - `file` receives every event as a JSONL record `{seq, ts, event}`.
 *
 * Usage:
 *   TETHER_TRACE=1 TETHER_TRACE_FILE=/tmp/run.jsonl tether -p "..."
 */
export type TraceVerbosity = "progress" | "trace";

export interface TraceLoggerOptions {
  stderr?: TraceVerbosity | false;
  file?: string;
  /** Dim lines with ANSI escapes */
  color?: boolean;
  /** Line sink. Default: process.stderr */
  write?: (line: string) => void;
}

export interface TraceRecord {
  seq: number;
  ts: number;
  event: AgentEvent;
}

const PROGRESS_EVENTS = new Set<AgentEvent["type"]>(["tool_start", "tool_end", "usage", "error"]);

export class TraceLogger {
  private seq = 0;
  private file: string | undefined;
  private readonly write: (line: string) => void;

  constructor(private readonly options: TraceLoggerOptions = {}) {
    this.write = options.write ?? ((line) => process.stderr.write(line));
    this.file = options.file;
    if (this.file) {
      // Truncate / create the file at startup
      try {
        writeFileSync(this.file, "");
      } catch (err) {
        this.disableFile(err);
      }
    }
  }

  get fileEnabled(): boolean {
    return this.file !== undefined;
  }

  log(event: AgentEvent): void {
    const verbosity = this.options.stderr;
    if (verbosity && (verbosity === "trace" || PROGRESS_EVENTS.has(event.type))) {
      const line = formatTraceLine(event);
      if (line !== undefined) {
        this.write(this.options.color ? `\x1b[2m${line}\x1b[0m\n` : `${line}\n`);
      }
    }

    if (this.file) {
      const record: TraceRecord = { seq: ++this.seq, ts: Date.now(), event };
      try {
        appendFileSync(this.file, `${JSON.stringify(record)}\n`);
      } catch (err) {
        this.disableFile(err);
      }
    }
  }

  private disableFile(err: unknown): void {
    console.warn(`Trace file disabled: ${this.file}: ${err instanceof Error ? err.message : String(err)}`);
    this.file = undefined;
  }
}

/** One human-readable line per event, or undefined for events with nothing to say. */
export function formatTraceLine(event: AgentEvent): string | undefined {
  switch (event.type) {
    case "agent_start":
      return `[run] ${event.runId} started`;
    case "agent_end": {
      const n = event.outcome.iterations;
      return `[run] ${event.outcome.status} after ${n} iteration${n === 1 ? "" : "s"}`;
    }
    case "turn_start":
      return `[turn] ${event.iteration}`;
    case "tool_start":
      return `[tool:${event.toolName}] Running...`;
    case "tool_end": {
      const text = event.result.output.map((block) => (block.type === "text" ? block.text : "")).join("\n");
      const lines = text ? text.split("\n").length : 0;
      return `[tool:${event.toolName}] ${event.isError ? "Failed" : "Done"} (${lines} lines, ${event.durationMs}ms)`;
    }
    case "usage": {
      const costStr = event.cost > 0 ? ` ($${event.cost.toFixed(4)})` : "";
      return `[usage] ${event.usage.inputTokens}in/${event.usage.outputTokens}out${costStr}`;
    }
    case "confirmation_requested":
      return `[confirm] ${event.request.toolName} awaiting approval (${event.confirmationId})`;
    case "steering_injected":
      return `[steering] message from ${event.message.name}`;
    case "cancel_requested":
      return `[cancel] ${event.reason}`;
    case "error":
      return `[error] ${event.error.message}`;
    default:
      return undefined;
  }
}
