import { msgFromJSON, msgToJSON, type MsgJSON } from "../message";
import type { Msg } from "../types";
import type { Memory } from "./types";

export interface InMemoryMemoryOptions {
  /** Keep messages whose id is already stored. Default: false (duplicates are skipped). */
  allowDuplicates?: boolean;
}

export interface MemorySnapshot {
  messages: MsgJSON[];
}

export class InMemoryMemory implements Memory {
  private messages: Msg[] = [];
  private readonly ids = new Set<string>();
  private readonly allowDuplicates: boolean;

  constructor(options: InMemoryMemoryOptions = {}) {
    this.allowDuplicates = options.allowDuplicates ?? false;
  }

  append(...msgs: Msg[]): Msg[] {
    const kept: Msg[] = [];
    for (const msg of msgs) {
      if (!this.allowDuplicates && this.ids.has(msg.id)) continue;
      this.ids.add(msg.id);
      this.messages.push(msg);
      kept.push(msg);
    }
    return kept;
  }

  list(): readonly Msg[] {
    return [...this.messages];
  }

  size(): number {
    return this.messages.length;
  }

  clear(): void {
    this.messages = [];
    this.ids.clear();
  }

  /** Remove messages by position. Out-of-range indices are ignored. */
  delete(...indices: number[]): number {
    const doomed = new Set(indices.filter((i) => Number.isInteger(i) && i >= 0 && i < this.messages.length));
    if (doomed.size === 0) return 0;
    this.messages = this.messages.filter((_, i) => !doomed.has(i));
    this.ids.clear();
    for (const msg of this.messages) this.ids.add(msg.id);
    return doomed.size;
  }

  toJSON(): MemorySnapshot {
    return { messages: this.messages.map(msgToJSON) };
  }

  /** Replace the contents with a snapshot produced by toJSON(). */
  load(snapshot: MemorySnapshot): void {
    const restored = snapshot.messages.map((value) => msgFromJSON(value));
    this.clear();
    this.append(...restored);
  }
}
