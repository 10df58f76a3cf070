import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CorpusIndex } from "../corpus-index";
import type { Embedder } from "../embeddings";
import type { Generator } from "../generation";
import type { Chunk, RetrievedCandidate } from "../types";

/**
 * Bag-of-words embedder: every distinct lowercase token gets its own
 * dimension, so texts sharing no token score exactly 0 and identical token
 * sets score ~1.
 */
export class FakeEmbedder implements Embedder {
  private readonly vocab = new Map<string, number>();
  public calls = 0;
  public failWith: Error | null = null;

  public constructor(private readonly dims = 512) {}

  public getModelName(): string {
    return "fake-bow";
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    const v = new Float32Array(this.dims);
    for (const tok of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let i = this.vocab.get(tok);
      if (i === undefined) {
        i = this.vocab.size % this.dims;
        this.vocab.set(tok, i);
      }
      v[i] += 1;
    }
    return v;
  }
}

/** Records prompts; answers with a fixed string or throws a configured error. */
export class FakeGenerator implements Generator {
  public readonly prompts: { prompt: string; temperature: number }[] = [];
  public failWith: Error | null = null;

  public constructor(private readonly reply = "generated answer") {}

  public async generate(prompt: string, temperature: number): Promise<string> {
    this.prompts.push({ prompt, temperature });
    if (this.failWith) throw this.failWith;
    return this.reply;
  }
}

/** Index returning canned candidates; logs every search. */
export class StaticIndex implements CorpusIndex {
  public readonly searches: { query: string; k: number }[] = [];
  public readonly inserted: Chunk[] = [];

  public constructor(
    private readonly hits: RetrievedCandidate[],
    private readonly log?: string[],
    private readonly name = "static",
  ) {}

  public async search(query: string, k: number): Promise<RetrievedCandidate[]> {
    this.searches.push({ query, k });
    this.log?.push(this.name);
    return this.hits.slice(0, k);
  }

  public async insert(chunk: Chunk): Promise<void> {
    this.inserted.push(chunk);
  }

  public async persist(): Promise<void> {}

  public size(): number {
    return this.hits.length + this.inserted.length;
  }
}

export function candidate(text: string, score?: number, id = text): RetrievedCandidate {
  return score === undefined ? { chunk: { id, text, metadata: {} } } : { chunk: { id, text, metadata: {} }, score };
}

export async function makeTempDir(prefix = "rag-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
