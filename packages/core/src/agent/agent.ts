import { CancelledError, MaxIterationsExceededError } from "../errors";
import type { EventStream } from "../event-stream";
import { InMemoryMemory } from "../memory/in-memory";
import type { Memory } from "../memory/types";
import { createMsg } from "../message";
import type { Model, ModelBackend } from "../provider/types";
import { SteeringChannel } from "../steering/channel";
import { ConfirmationGate } from "../steering/confirmation";
import { Toolkit } from "../tool/toolkit";
import type { Msg } from "../types";
import { reactLoop } from "./loop";
import type { AgentEvent, LoopOutcome, ToolExecutionMode } from "./types";

export interface ReActAgentOptions<TRequest> {
  name: string;
  systemPrompt?: string;
  backend: ModelBackend<TRequest>;
  toolkit?: Toolkit;
  memory?: Memory;
  maxIterations?: number;
  toolExecution?: ToolExecutionMode;
  toolResultMaxLength?: number;
  stream?: boolean;
  confirmations?: ConfirmationGate;
  modelInfo?: Model;
}

/** Accepted by run/reply: a Msg, several, or plain text sent as the user. */
export type AgentInput = Msg | readonly Msg[] | string;

export class ReActAgent<TRequest = unknown> {
  readonly name: string;
  readonly memory: Memory;
  readonly toolkit: Toolkit;
  readonly confirmations: ConfirmationGate;
  private activeSteering: SteeringChannel | undefined;
  private nextSteering = new SteeringChannel();

  constructor(private readonly options: ReActAgentOptions<TRequest>) {
    this.name = options.name;
    this.memory = options.memory ?? new InMemoryMemory();
    this.toolkit = options.toolkit ?? new Toolkit();
    this.confirmations = options.confirmations ?? new ConfirmationGate();
  }

  get isRunning(): boolean {
    return this.activeSteering !== undefined;
  }

  /** Channel of the active run, or of the next one while idle. */
  get steering(): SteeringChannel {
    return this.activeSteering ?? this.nextSteering;
  }

  /**
   * Start a run. With no input the model reasons over the current memory.
   * @throws Error when a run is already active.
   */
  run(input?: AgentInput): EventStream<AgentEvent, LoopOutcome> {
    if (this.activeSteering) {
      throw new Error(`Agent "${this.name}" is already running`);
    }
    const steering = this.nextSteering;
    this.nextSteering = new SteeringChannel();
    this.activeSteering = steering;

    const stream = reactLoop(this.toMsgs(input), {
      name: this.name,
      systemPrompt: this.options.systemPrompt ?? "",
      backend: this.options.backend,
      memory: this.memory,
      toolkit: this.toolkit,
      maxIterations: this.options.maxIterations,
      toolExecution: this.options.toolExecution,
      toolResultMaxLength: this.options.toolResultMaxLength,
      stream: this.options.stream,
      steering,
      confirmations: this.confirmations,
      modelInfo: this.options.modelInfo,
    });

    const release = () => {
      if (this.activeSteering === steering) this.activeSteering = undefined;
    };
    stream.subscribe((event) => {
      if (event.type === "agent_end" || (event.type === "error" && event.fatal)) release();
    });
    // A run cancelled before it started ends synchronously
    if (stream.done) release();
    return stream;
  }

  /**
   * Run to completion and return the final answer.
   * Rejects with MaxIterationsExceededError or CancelledError (both carrying
   * the outcome) or with ModelInvocationError.
   */
  async reply(input?: AgentInput): Promise<Msg> {
    const outcome = await this.run(input).result();
    if (outcome.status === "completed" && outcome.message) return outcome.message;
    if (outcome.status === "max_iterations") throw new MaxIterationsExceededError(outcome);
    throw new CancelledError(outcome);
  }

  /** Append to memory without replying. */
  async observe(input: AgentInput): Promise<void> {
    const msgs = this.toMsgs(input);
    if (msgs.length > 0) await this.memory.append(...msgs);
  }

  /** Request cancellation of the active run. False when idle or already cancelled. */
  interrupt(reason?: string): boolean {
    return this.activeSteering?.cancel(reason) ?? false;
  }

  /** Queue a message for the next reasoning step of the active (or next) run. */
  inject(input: Msg | string): void {
    this.steering.inject(typeof input === "string" ? createMsg({ name: "user", role: "user", content: input }) : input);
  }

  private toMsgs(input: AgentInput | undefined): Msg[] {
    if (input === undefined) return [];
    if (typeof input === "string") return [createMsg({ name: "user", role: "user", content: input })];
    if (isMsgList(input)) return [...input];
    return [input];
  }
}

function isMsgList(input: Msg | readonly Msg[]): input is readonly Msg[] {
  return Array.isArray(input);
}
