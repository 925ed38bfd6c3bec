export type { Memory } from "./types";
export type { InMemoryMemoryOptions, MemorySnapshot } from "./in-memory";
export { InMemoryMemory } from "./in-memory";
