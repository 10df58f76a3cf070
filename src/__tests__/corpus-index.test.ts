import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { VectorCorpusIndex, loadCorpusIndex } from "../corpus-index";
import { Embeddings } from "../embeddings";
import { INDEX_FILE, Persistence } from "../persistence";
import { FakeEmbedder, makeTempDir } from "./helpers";

describe("Embeddings.cosine", () => {
  it("scores identical directions ~1 and orthogonal ones 0", () => {
    expect(Embeddings.cosine(Float32Array.from([1, 2]), Float32Array.from([2, 4]))).toBeCloseTo(1, 6);
    expect(Embeddings.cosine(Float32Array.from([1, 0]), Float32Array.from([0, 3]))).toBe(0);
  });
});

describe("VectorCorpusIndex", () => {
  let dir: string;
  const persistence = new Persistence();

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function sampleIndex(embedder = new FakeEmbedder()) {
    return VectorCorpusIndex.fromChunks(
      [
        { id: "1", text: "pods run containers", metadata: {} },
        { id: "2", text: "services expose pods", metadata: { kind: "svc" } },
        { id: "3", text: "helm charts package apps", metadata: {} },
      ],
      { dir: path.join(dir, "k8s-1-dot-2"), embedder, persistence },
    );
  }

  it("returns up to k candidates best first", async () => {
    const index = await sampleIndex();
    const hits = await index.search("helm charts", 2);
    expect(hits).toHaveLength(2);
    expect(hits[0].chunk.id).toBe("3");
    expect(hits[0].score).toBeGreaterThan(hits[1].score ?? 0);
    expect(hits[1].score).toBe(0);
  });

  it("returns fewer than k when the corpus is small", async () => {
    const index = await sampleIndex();
    expect(await index.search("pods", 10)).toHaveLength(3);
  });

  it("duplicates on re-insert of the same id", async () => {
    const index = await sampleIndex();
    await index.insert({ id: "1", text: "pods run containers", metadata: {} });
    expect(index.size()).toBe(4);
  });

  it("persists and loads back", async () => {
    const embedder = new FakeEmbedder();
    const index = await sampleIndex(embedder);
    await index.persist();

    const result = await loadCorpusIndex(path.join(dir, "k8s-1-dot-2"), embedder, persistence);
    expect(result.status).toBe("loaded");
    if (result.status !== "loaded") return;
    expect(result.index.size()).toBe(3);
    const hits = await result.index.search("services", 1);
    expect(hits[0].chunk).toEqual({ id: "2", text: "services expose pods", metadata: { kind: "svc" } });
  });

  it("reports a missing index as not-found", async () => {
    const result = await loadCorpusIndex(path.join(dir, "absent"), new FakeEmbedder(), persistence);
    expect(result).toEqual({ status: "not-found" });
  });

  it("reports an unreadable index as failed", async () => {
    const bad = path.join(dir, "bad");
    await fs.mkdir(bad);
    await fs.writeFile(path.join(bad, INDEX_FILE), "{not json");
    const result = await loadCorpusIndex(bad, new FakeEmbedder(), persistence);
    expect(result.status).toBe("failed");
  });
});
