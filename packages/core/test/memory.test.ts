import { describe, expect, it } from "vitest";
import { InMemoryMemory } from "../src/memory/in-memory";
import { createMsg } from "../src/message";

const msg = (id: string, text = id) => createMsg({ id, name: "user", role: "user", content: text });

describe("InMemoryMemory", () => {
  it("keeps append order", () => {
    const memory = new InMemoryMemory();
    memory.append(msg("a"));
    memory.append(msg("b"), msg("c"));
    expect(memory.list().map((m) => m.id)).toEqual(["a", "b", "c"]);
    expect(memory.size()).toBe(3);
  });

  it("skips messages whose id is already stored", () => {
    const memory = new InMemoryMemory();
    const first = msg("a");
    memory.append(first, first, msg("b"));
    expect(memory.list().map((m) => m.id)).toEqual(["a", "b"]);
  });

  it("keeps duplicates when allowed", () => {
    const memory = new InMemoryMemory({ allowDuplicates: true });
    const first = msg("a");
    memory.append(first, first);
    expect(memory.size()).toBe(2);
  });

  it("returns a copy from list()", () => {
    const memory = new InMemoryMemory();
    memory.append(msg("a"));
    const listed = memory.list();
    memory.append(msg("b"));
    expect(listed).toHaveLength(1);
  });

  it("deletes by index and ignores out-of-range positions", () => {
    const memory = new InMemoryMemory();
    memory.append(msg("a"), msg("b"), msg("c"));
    expect(memory.delete(0, 2, 7, -1)).toBe(2);
    expect(memory.list().map((m) => m.id)).toEqual(["b"]);
    // a deleted id may be appended again
    memory.append(msg("a"));
    expect(memory.list().map((m) => m.id)).toEqual(["b", "a"]);
  });

  it("clears", () => {
    const memory = new InMemoryMemory();
    memory.append(msg("a"));
    memory.clear();
    expect(memory.size()).toBe(0);
    memory.append(msg("a"));
    expect(memory.size()).toBe(1);
  });

  it("restores a snapshot", () => {
    const memory = new InMemoryMemory();
    memory.append(msg("a", "first"), msg("b", "second"));
    const snapshot = structuredClone(memory.toJSON());

    const restored = new InMemoryMemory();
    restored.append(msg("z"));
    restored.load(snapshot);
    expect(restored.list()).toEqual(memory.list());
  });
});
