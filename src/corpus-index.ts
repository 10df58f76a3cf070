import { Embeddings, type Embedder } from "./embeddings";
import { Persistence, type LoadResult } from "./persistence";
import type { Chunk, EmbeddedChunk, RetrievedCandidate } from "./types";

/** Retrieval surface the merger and registry depend on. */
export interface CorpusIndex {
  /** Up to `k` candidates, best first; fewer when the corpus is smaller. */
  search(query: string, k: number): Promise<RetrievedCandidate[]>;
  /** Embed and append. Re-inserting an id adds a second copy. */
  insert(chunk: Chunk): Promise<void>;
  persist(): Promise<void>;
  size(): number;
}

export interface VectorCorpusIndexOptions {
  /** Directory the index persists into. */
  dir: string;
  embedder: Embedder;
  persistence: Persistence;
  chunks?: EmbeddedChunk[];
}

/**
 * In-memory embedded collection for one slug. Search embeds the query once
 * and scans every chunk with cosine similarity.
 */
export class VectorCorpusIndex implements CorpusIndex {
  private readonly dir: string;
  private readonly embedder: Embedder;
  private readonly persistence: Persistence;
  private readonly chunks: EmbeddedChunk[];

  public constructor(opts: VectorCorpusIndexOptions) {
    this.dir = opts.dir;
    this.embedder = opts.embedder;
    this.persistence = opts.persistence;
    this.chunks = opts.chunks ? [...opts.chunks] : [];
  }

  /** Build an index by embedding every chunk in order. */
  public static async fromChunks(
    chunks: readonly Chunk[],
    opts: Omit<VectorCorpusIndexOptions, "chunks">,
  ): Promise<VectorCorpusIndex> {
    const index = new VectorCorpusIndex(opts);
    for (const c of chunks) await index.insert(c);
    return index;
  }

  public size(): number {
    return this.chunks.length;
  }

  public async search(query: string, k: number): Promise<RetrievedCandidate[]> {
    if (this.chunks.length === 0 || k <= 0) return [];
    const q = await this.embedder.embed(query);
    const scored = this.chunks.map((c) => ({ c, s: Embeddings.cosine(c.emb, q) }));
    scored.sort((a, b) => b.s - a.s); // descending score
    return scored.slice(0, k).map(({ c, s }) => ({
      chunk: { id: c.id, text: c.text, metadata: c.metadata },
      score: s,
    }));
  }

  public async insert(chunk: Chunk): Promise<void> {
    const emb = await this.embedder.embed(chunk.text);
    this.chunks.push({ ...chunk, emb });
  }

  public async persist(): Promise<void> {
    await this.persistence.save(this.dir, this.chunks, this.embedder.getModelName());
  }
}

export type IndexLoadResult =
  | { status: "loaded"; index: VectorCorpusIndex }
  | Exclude<LoadResult, { status: "loaded" }>;

/** Load the index persisted in `dir`, reporting absence and corruption distinctly. */
export async function loadCorpusIndex(
  dir: string,
  embedder: Embedder,
  persistence: Persistence,
): Promise<IndexLoadResult> {
  const result = await persistence.load(dir);
  if (result.status !== "loaded") return result;
  if (result.modelName && result.modelName !== embedder.getModelName()) {
    console.error(
      `[RAG] Index at ${dir} was embedded with ${result.modelName}, querying with ${embedder.getModelName()}`,
    );
  }
  return {
    status: "loaded",
    index: new VectorCorpusIndex({ dir, embedder, persistence, chunks: result.chunks }),
  };
}
