import type { Msg } from "../types";

export const DEFAULT_CANCEL_REASON = "cancelled by user";

/**
 * Interrupt channel of one loop run. Injected messages are spliced into
 * memory before the next reasoning step; a cancel takes effect at the next
 * safe point, after in-flight model and tool calls finish.
 */
export class SteeringChannel {
  private readonly controller = new AbortController();
  private queue: Msg[] = [];
  private cancelReason: string | undefined;
  private cancelListeners: Array<(reason: string) => void> = [];

  inject(msg: Msg): void {
    this.queue.push(msg);
  }

  /** Returns false when the channel was already cancelled. */
  cancel(reason: string = DEFAULT_CANCEL_REASON): boolean {
    if (this.cancelReason !== undefined) return false;
    this.cancelReason = reason;
    this.controller.abort(reason);
    for (const listener of this.cancelListeners) listener(reason);
    return true;
  }

  /** Take every queued message, oldest first. */
  drain(): Msg[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  onCancel(listener: (reason: string) => void): () => void {
    this.cancelListeners.push(listener);
    return () => {
      this.cancelListeners = this.cancelListeners.filter((l) => l !== listener);
    };
  }

  /** Aborted on cancel. Handed to tools for cooperative cancellation. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.cancelReason !== undefined;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  get pendingCount(): number {
    return this.queue.length;
  }
}
