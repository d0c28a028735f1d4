import { describe, it, expect } from "vitest";
import { z } from "zod";
import { DocumentSlot } from "../../src/core/store/DocumentSlot.js";
import { quarantineName } from "../../src/core/store/DocumentStore.js";
import { MemoryDocumentStore } from "../../src/core/store/MemoryDocumentStore.js";

const CounterSchema = z.record(z.string(), z.number().int());

function createSlot(store: MemoryDocumentStore) {
  return new DocumentSlot<z.infer<typeof CounterSchema>>(store, { name: "counters", schema: CounterSchema, empty: () => ({}) });
}

describe("quarantineName", () => {
  it("stamps the second and tells same-second copies apart", () => {
    const now = Date.parse("2026-01-01T00:00:00.900Z");
    const first = quarantineName("warnings", now);
    const second = quarantineName("warnings", now);

    expect(first).toMatch(/^warnings\.bak\.1767225600\.[\w-]{6}$/);
    expect(second).toMatch(/^warnings\.bak\.1767225600\.[\w-]{6}$/);
    expect(first).not.toBe(second);
  });
});

describe("DocumentSlot", () => {
  it("creates the empty document when nothing is stored", async () => {
    const store = new MemoryDocumentStore();
    const slot = createSlot(store);

    await expect(slot.load()).resolves.toEqual({ status: "missing" });
    expect(slot.value).toEqual({});
    expect(store.getRaw("counters")).toBe("{}");
  });

  it("loads what was saved", async () => {
    const store = new MemoryDocumentStore();
    const writer = createSlot(store);
    writer.value.a = 1;
    writer.value.b = 2;
    await writer.save();

    const reader = createSlot(store);
    await expect(reader.load()).resolves.toEqual({ status: "loaded" });
    expect(reader.value).toEqual({ a: 1, b: 2 });
  });

  it("quarantines unparseable content and starts empty", async () => {
    const store = new MemoryDocumentStore(() => Date.parse("2026-01-01T00:00:00.000Z"));
    store.setRaw("counters", "{ not json");
    const slot = createSlot(store);

    const outcome = await slot.load();

    if (outcome.status !== "quarantined") throw new Error(`expected quarantined, got ${outcome.status}`);
    expect(outcome.backup).toMatch(/^counters\.bak\.1767225600\.[\w-]{6}$/);
    expect(store.getRaw(outcome.backup ?? "")).toBe("{ not json");
    expect(slot.value).toEqual({});
    expect(store.getRaw("counters")).toBe("{}");
  });

  it("quarantines content that fails validation", async () => {
    const store = new MemoryDocumentStore();
    store.setRaw("counters", JSON.stringify({ a: "one" }));
    const slot = createSlot(store);

    const outcome = await slot.load();

    expect(outcome.status).toBe("quarantined");
    expect(outcome.status === "quarantined" && outcome.reason).toContain("a:");
    expect(slot.value).toEqual({});
  });

  it("replace swaps the in-memory value without saving", async () => {
    const store = new MemoryDocumentStore();
    const slot = createSlot(store);
    await slot.load();

    slot.replace({ c: 3 });

    expect(slot.value).toEqual({ c: 3 });
    expect(store.getRaw("counters")).toBe("{}");
  });
});
