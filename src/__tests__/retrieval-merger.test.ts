import { describe, it, expect } from "vitest";
import { mergeCandidates } from "../retrieval-merger";
import { StaticIndex, candidate } from "./helpers";

describe("mergeCandidates", () => {
  it("concatenates base then delta without re-ranking", async () => {
    const log: string[] = [];
    const base = new StaticIndex([candidate("b1", 0.6), candidate("b2", 0.55)], log, "base");
    const delta = new StaticIndex([candidate("d1", 0.95)], log, "delta");

    const merged = await mergeCandidates(base, delta, "how do I scale?", 5);

    expect(merged.map((c) => c.chunk.text)).toEqual(["b1", "b2", "d1"]);
    expect(log).toEqual(["base", "delta"]);
    expect(base.searches).toEqual([{ query: "how do I scale?", k: 5 }]);
    expect(delta.searches).toEqual([{ query: "how do I scale?", k: 5 }]);
  });

  it("applies k per index, so the merged set can hold 2k entries", async () => {
    const base = new StaticIndex([candidate("b1", 0.9), candidate("b2", 0.8), candidate("b3", 0.7)]);
    const delta = new StaticIndex([candidate("d1", 0.9), candidate("d2", 0.8), candidate("d3", 0.7)]);
    const merged = await mergeCandidates(base, delta, "q", 2);
    expect(merged.map((c) => c.chunk.text)).toEqual(["b1", "b2", "d1", "d2"]);
  });

  it("keeps a chunk found in both indexes twice", async () => {
    const same = candidate("shared", 0.8, "id-1");
    const merged = await mergeCandidates(new StaticIndex([same]), new StaticIndex([same]), "q", 3);
    expect(merged).toHaveLength(2);
    expect(merged[0].chunk.id).toBe("id-1");
    expect(merged[1].chunk.id).toBe("id-1");
  });

  it("returns base results alone when there is no delta index", async () => {
    const merged = await mergeCandidates(new StaticIndex([candidate("b1", 0.7)]), undefined, "q", 3);
    expect(merged.map((c) => c.chunk.text)).toEqual(["b1"]);
  });
});
