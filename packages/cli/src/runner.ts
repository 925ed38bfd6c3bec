import type { AgentEvent, ConfirmationGate, PendingConfirmation, ReActAgent, TraceLogger } from "@tether/core";
import { getTextContent } from "@tether/core";

/** Reads one answer from the operator. Resolves undefined when nothing can be read. */
export type Prompter = (question: string, signal?: AbortSignal) => Promise<string | undefined>;

export interface RunnerOptions {
  trace: TraceLogger;
  /** Terminal prompt for confirmations. Without one, confirmations are denied. */
  prompter?: Prompter;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INCOMPLETE = 2;

/** Runs one prompt to completion: model text on stdout as it streams, progress on stderr. */
export class NonInteractiveRunner {
  private readonly stdout: (text: string) => void;
  private readonly stderr: (text: string) => void;
  private fatalReported = false;
  private streamedTurn = false;
  private readonly streamedIds = new Set<string>();

  constructor(
    private readonly agent: ReActAgent,
    private readonly options: RunnerOptions,
  ) {
    this.stdout = options.stdout ?? ((text) => process.stdout.write(text));
    this.stderr = options.stderr ?? ((text) => process.stderr.write(text));
  }

  async run(prompt: string): Promise<number> {
    const unsubscribe = this.agent.confirmations.onRequest((pending) => {
      this.confirm(this.agent.confirmations, pending).catch((err: unknown) => {
        this.agent.confirmations.deny(pending.id, `confirmation failed: ${errorMessage(err)}`);
      });
    });

    try {
      const stream = this.agent.run(prompt);
      for await (const event of stream) {
        this.handleEvent(event);
      }
      const outcome = await stream.result();

      // A streamed answer is already on stdout
      const final = outcome.message;
      const answer = final && !this.streamedIds.has(final.id) ? getTextContent(final) : undefined;
      if (answer !== undefined) this.stdout(`${answer}\n`);

      switch (outcome.status) {
        case "completed":
          return EXIT_OK;
        case "max_iterations":
          this.stderr(`[stopped] No final answer after ${outcome.iterations} iterations\n`);
          return EXIT_INCOMPLETE;
        case "cancelled":
          this.stderr(`[cancelled] ${outcome.reason ?? "cancelled"}\n`);
          return EXIT_INCOMPLETE;
      }
    } catch (err) {
      if (!this.fatalReported) this.stderr(`[error] ${errorMessage(err)}\n`);
      return EXIT_ERROR;
    } finally {
      unsubscribe();
    }
  }

  private handleEvent(event: AgentEvent): void {
    this.options.trace.log(event);
    switch (event.type) {
      case "turn_start":
        this.streamedTurn = false;
        break;
      case "message_delta":
        this.stdout(event.delta);
        this.streamedTurn = true;
        break;
      case "turn_end":
        if (this.streamedTurn) {
          this.stdout("\n");
          this.streamedIds.add(event.message.id);
        }
        break;
      case "error":
        if (event.fatal) this.fatalReported = true;
        break;
    }
  }

  private async confirm(gate: ConfirmationGate, pending: PendingConfirmation): Promise<void> {
    const { prompter } = this.options;
    if (!prompter) {
      gate.deny(pending.id, "no terminal available to confirm");
      return;
    }

    const { toolName, input } = pending.request;
    const answer = await prompter(`Allow ${toolName} ${JSON.stringify(input)}? [y]es / [a]lways / [N]o: `);
    const choice = answer?.trim().toLowerCase() ?? "";
    if (choice === "y" || choice === "yes") {
      gate.approve(pending.id);
    } else if (choice === "a" || choice === "always") {
      gate.approve(pending.id, { always: true });
    } else {
      gate.deny(pending.id, "denied by user");
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
