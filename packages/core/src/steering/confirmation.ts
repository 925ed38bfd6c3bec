import type { ApprovalRequest, ApprovalResponse, Approver } from "../tool/types";

export type PolicyDecision = "approve" | "deny" | "ask";

/** Decides synchronously where it can; "ask" leaves the request pending. */
export type ConfirmationPolicy = (request: ApprovalRequest) => PolicyDecision;

export interface PendingConfirmation {
  id: string;
  request: ApprovalRequest;
  requestedAt: number;
}

export interface ConfirmationGateOptions {
  policy?: ConfirmationPolicy;
}

interface Waiter {
  pending: PendingConfirmation;
  resolve: (response: ApprovalResponse) => void;
}

/**
 * Tool-level steering: a call to a tool that requires confirmation suspends
 * here until someone approves or denies it.
 */
export class ConfirmationGate {
  private readonly waiters = new Map<string, Waiter>();
  private readonly alwaysAllowed = new Set<string>();
  private listeners: Array<(pending: PendingConfirmation) => void> = [];
  private counter = 0;

  constructor(private readonly options: ConfirmationGateOptions = {}) {}

  /** Bound form for ExecuteOptions.approve */
  readonly approver: Approver = (request) => this.request(request);

  request(request: ApprovalRequest): Promise<ApprovalResponse> {
    if (this.alwaysAllowed.has(request.toolName)) {
      return Promise.resolve({ decision: "always" });
    }

    const decision = this.options.policy?.(request) ?? "ask";
    if (decision === "approve") return Promise.resolve({ decision: "once" });
    if (decision === "deny") return Promise.resolve({ decision: "reject", reason: "denied by policy" });

    const pending: PendingConfirmation = {
      id: `confirm-${++this.counter}`,
      request,
      requestedAt: Date.now(),
    };
    return new Promise<ApprovalResponse>((resolve) => {
      this.waiters.set(pending.id, { pending, resolve });
      for (const listener of this.listeners) listener(pending);
    });
  }

  /** `always` approves every later call to the same tool without asking. */
  approve(id: string, options: { always?: boolean } = {}): boolean {
    const waiter = this.take(id);
    if (!waiter) return false;
    if (options.always) {
      this.alwaysAllowed.add(waiter.pending.request.toolName);
      waiter.resolve({ decision: "always" });
    } else {
      waiter.resolve({ decision: "once" });
    }
    return true;
  }

  deny(id: string, reason = "denied by user"): boolean {
    const waiter = this.take(id);
    if (!waiter) return false;
    waiter.resolve({ decision: "reject", reason });
    return true;
  }

  /** Deny every pending request matching `filter` (all when omitted). */
  denyAll(reason: string, filter?: (pending: PendingConfirmation) => boolean): number {
    let count = 0;
    for (const { pending } of [...this.waiters.values()]) {
      if (filter && !filter(pending)) continue;
      if (this.deny(pending.id, reason)) count++;
    }
    return count;
  }

  pending(): PendingConfirmation[] {
    return [...this.waiters.values()].map((waiter) => waiter.pending);
  }

  isAlwaysAllowed(toolName: string): boolean {
    return this.alwaysAllowed.has(toolName);
  }

  /** Forget every "always" decision. */
  reset(): void {
    this.alwaysAllowed.clear();
  }

  onRequest(listener: (pending: PendingConfirmation) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private take(id: string): Waiter | undefined {
    const waiter = this.waiters.get(id);
    if (waiter) this.waiters.delete(id);
    return waiter;
  }
}
