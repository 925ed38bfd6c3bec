import type { Msg } from "../types";

/**
 * Ordered conversation store. Append order is the order the loop observes.
 * Implementations may be asynchronous (e.g. buffered persistence); the loop
 * awaits every call.
 */
export interface Memory {
  /** Resolves to the messages actually stored, in order. */
  append(...msgs: Msg[]): readonly Msg[] | Promise<readonly Msg[]>;
  list(): readonly Msg[] | Promise<readonly Msg[]>;
  size(): number | Promise<number>;
  clear(): void | Promise<void>;
}
