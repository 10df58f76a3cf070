import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { PDFParse } from "pdf-parse";
import { VectorCorpusIndex } from "./corpus-index";
import type { Embedder } from "./embeddings";
import { describeError } from "./errors";
import { INDEX_FILE, type Persistence } from "./persistence";
import { resolveSlug, validateSlugParts } from "./slug";
import type { Chunk } from "./types";

/** Text-bearing files picked up from the data tree. */
const DEFAULT_EXTENSIONS = ["md", "mdx", "txt", "rst", "adoc", "html", "yaml", "yml", "json", "pdf"];

export interface CorpusBuildOptions {
  /** `<dataRoot>/<project>/<version>/**` holds the source documents. */
  dataRoot: string;
  storageRoot: string;
  embedder: Embedder;
  persistence: Persistence;
  chunkSize?: number;
  chunkOverlap?: number;
  extensions?: string[];
  verbose?: boolean;
}

export interface CorpusBuildResult {
  built: string[];
  failed: { slug: string; error: string }[];
}

/**
 * Split text into (roughly) fixed-size overlapping chunks. The final chunk
 * may be shorter. Overlap must be < size for forward progress.
 */
export function splitChunks(text: string, size = 800, overlap = 120): string[] {
  const out: string[] = [];
  let i = 0;
  while (i < text.length) {
    out.push(text.slice(i, i + size));
    i += Math.max(1, size - overlap);
  }
  return out;
}

async function readDocumentText(abs: string): Promise<string> {
  if (path.extname(abs).toLowerCase() !== ".pdf") return fs.readFile(abs, "utf8");
  const parser = new PDFParse({ data: await fs.readFile(abs) });
  try {
    return (await parser.getText()).text;
  } finally {
    await parser.destroy();
  }
}

/** True when no slug directory under the storage root holds a persisted index. */
export function storageIsEmpty(storageRoot: string): boolean {
  if (!fsSync.existsSync(storageRoot)) return true;
  return !fsSync
    .readdirSync(storageRoot, { withFileTypes: true })
    .some((d) => d.isDirectory() && fsSync.existsSync(path.join(storageRoot, d.name, INDEX_FILE)));
}

/**
 * Build and persist one base index per `<project>/<version>` directory of the
 * data tree. A failing project/version is logged and skipped.
 */
export async function buildBaseIndexes(opts: CorpusBuildOptions): Promise<CorpusBuildResult> {
  const result: CorpusBuildResult = { built: [], failed: [] };
  if (!fsSync.existsSync(opts.dataRoot)) {
    console.error(`[RAG] Data root ${opts.dataRoot} does not exist. No base indexes built.`);
    return result;
  }
  const chunkSize = opts.chunkSize ?? 800;
  let chunkOverlap = opts.chunkOverlap ?? 120;
  if (chunkOverlap >= chunkSize) {
    const fallback = Math.max(0, Math.floor(chunkSize * 0.15));
    console.error(
      `[RAG] Provided chunkOverlap (=${chunkOverlap}) >= chunkSize (=${chunkSize}). Using fallback overlap ${fallback}.`,
    );
    chunkOverlap = fallback;
  }
  const patterns = (opts.extensions ?? DEFAULT_EXTENSIONS).map((ext) => `**/*.${ext}`);

  const projects = await fs.readdir(opts.dataRoot, { withFileTypes: true });
  for (const p of projects.filter((d) => d.isDirectory())) {
    const projectDir = path.join(opts.dataRoot, p.name);
    const versions = await fs.readdir(projectDir, { withFileTypes: true });
    for (const v of versions.filter((d) => d.isDirectory())) {
      const slug = resolveSlug(p.name, v.name);
      const versionDir = path.join(projectDir, v.name);
      try {
        validateSlugParts(p.name, v.name);
        const files = (await fg(patterns, { cwd: versionDir, dot: false, caseSensitiveMatch: false })).sort();
        const chunks: Chunk[] = [];
        for (const rel of files) {
          const text = await readDocumentText(path.join(versionDir, rel));
          splitChunks(text, chunkSize, chunkOverlap).forEach((t, idx) => {
            chunks.push({ id: `${rel}#${idx}`, text: t, metadata: { path: rel, chunk: idx } });
          });
        }
        if (!chunks.length) {
          console.error(`[RAG] Warning: no documents found in ${versionDir}`);
          continue;
        }
        console.error(`[RAG] Building index for ${p.name}/${v.name} -> ${slug} (${files.length} files, ${chunks.length} chunks)`);
        const index = await VectorCorpusIndex.fromChunks(chunks, {
          dir: path.join(opts.storageRoot, slug),
          embedder: opts.embedder,
          persistence: opts.persistence,
        });
        await index.persist();
        result.built.push(slug);
        if (opts.verbose) console.error(`[RAG][verbose] Index saved for ${slug}`);
      } catch (e) {
        console.error(`[RAG] Error building index for ${slug}: ${describeError(e)}`);
        result.failed.push({ slug, error: describeError(e) });
      }
    }
  }
  return result;
}
