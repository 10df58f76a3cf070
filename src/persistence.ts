import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { IndexLoadError, StorageWriteFailure } from "./errors";
import type { EmbeddedChunk } from "./types";

/** File name of a persisted index inside its slug directory. */
export const INDEX_FILE = "index.json";

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const storedChunkSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: metadataSchema.default({}),
  // f32 little-endian, base64
  emb: z.string(),
});

const storedIndexSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    modelName: z.string().optional(),
    savedAt: z.string().optional(),
  }),
  chunks: z.array(z.unknown()),
});

/**
 * Outcome of a load attempt. A missing directory is a normal `not-found`;
 * anything present but unreadable is `failed`.
 */
export type LoadResult =
  | { status: "loaded"; chunks: EmbeddedChunk[]; modelName?: string }
  | { status: "not-found" }
  | { status: "failed"; error: IndexLoadError };

function encodeEmbedding(emb: Float32Array): string {
  return Buffer.from(emb.buffer, emb.byteOffset, emb.byteLength).toString("base64");
}

function decodeEmbedding(raw: string): Float32Array | null {
  const buf = Buffer.from(raw, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy so the array owns an aligned buffer
  return new Float32Array(new Float32Array(buf.buffer, buf.byteOffset, buf.byteLength / 4));
}

/**
 * Reads and writes one embedded-chunk collection per directory.
 * Malformed entries inside an otherwise valid file are dropped with a warning.
 */
export class Persistence {
  public constructor(private readonly verbose = false) {}

  public async load(dir: string): Promise<LoadResult> {
    const file = path.join(dir, INDEX_FILE);
    if (!fsSync.existsSync(file)) return { status: "not-found" };
    try {
      const raw = await fs.readFile(file, "utf8");
      const parsed = storedIndexSchema.parse(JSON.parse(raw));
      const chunks: EmbeddedChunk[] = [];
      let dropped = 0;
      for (const entry of parsed.chunks) {
        const c = storedChunkSchema.safeParse(entry);
        const emb = c.success ? decodeEmbedding(c.data.emb) : null;
        if (!c.success || !emb) {
          dropped++;
          continue;
        }
        chunks.push({ id: c.data.id, text: c.data.text, metadata: c.data.metadata, emb });
      }
      if (dropped) console.error(`[RAG] Dropped ${dropped} malformed chunk(s) from ${file}`);
      if (this.verbose) console.error(`[RAG][verbose] Loaded ${chunks.length} chunks from ${file}`);
      return { status: "loaded", chunks, modelName: parsed.meta.modelName };
    } catch (e) {
      return { status: "failed", error: new IndexLoadError(dir, e) };
    }
  }

  /** @throws {StorageWriteFailure} when the directory or file cannot be written. */
  public async save(dir: string, chunks: readonly EmbeddedChunk[], modelName: string): Promise<void> {
    const file = path.join(dir, INDEX_FILE);
    const out = {
      version: 1,
      meta: {
        modelName,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      chunks: chunks.map((c) => ({
        id: c.id,
        text: c.text,
        metadata: c.metadata,
        emb: encodeEmbedding(c.emb),
      })),
    };
    try {
      await fs.mkdir(dir, { recursive: true });
      // write-then-rename so a crash never leaves a truncated index behind
      const tmp = `${file}.tmp`;
      const handle = await fs.open(tmp, "w");
      try {
        await handle.writeFile(JSON.stringify(out));
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, file);
    } catch (e) {
      throw new StorageWriteFailure(`Failed to persist index to ${dir}`, e);
    }
    if (this.verbose) console.error(`[RAG][verbose] Persisted ${chunks.length} chunks to ${file}`);
  }
}
