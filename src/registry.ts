import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { VectorCorpusIndex, loadCorpusIndex, type CorpusIndex } from "./corpus-index";
import type { Embedder } from "./embeddings";
import { describeError } from "./errors";
import type { InjectionRecorder, LogGroup } from "./injection-recorder";
import { KeyedQueue } from "./keyed-queue";
import type { Persistence } from "./persistence";
import { resolveSlug, validateSlugParts } from "./slug";
import type { Chunk } from "./types";

export type CorpusKind = "base" | "delta";

export interface SlugLoadOutcome {
  slug: string;
  corpus: CorpusKind;
  outcome: "loaded" | "rebuilt" | "failed";
  chunks?: number;
  error?: string;
}

/** Per-slug results of {@link IndexRegistry.bootstrap}. */
export interface StartupReport {
  entries: SlugLoadOutcome[];
  /** Slugs with at least one failed corpus. */
  degraded: string[];
}

export interface IndexRegistryOptions {
  storageRoot: string;
  deltaRoot: string;
  embedder: Embedder;
  persistence: Persistence;
  recorder: InjectionRecorder;
}

async function listDirs(root: string): Promise<string[]> {
  if (!fsSync.existsSync(root)) return [];
  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
}

/**
 * Slug -> base/delta index mapping shared by every request. A slug is in the
 * base map only if its index loaded. Mutations and reads on one slug are
 * serialized through {@link withSlugLock}.
 */
export class IndexRegistry {
  private readonly base = new Map<string, CorpusIndex>();
  private readonly delta = new Map<string, CorpusIndex>();
  private readonly locks = new KeyedQueue();
  private readonly opts: IndexRegistryOptions;

  public constructor(opts: IndexRegistryOptions) {
    this.opts = opts;
  }

  public getBase(slug: string): CorpusIndex | undefined {
    return this.base.get(slug);
  }

  public getDelta(slug: string): CorpusIndex | undefined {
    return this.delta.get(slug);
  }

  /** Register an already-built base index (corpus build, tests). */
  public setBase(slug: string, index: CorpusIndex): void {
    this.base.set(slug, index);
  }

  public counts(): { base: number; delta: number } {
    return { base: this.base.size, delta: this.delta.size };
  }

  /** Run `task` with exclusive access to one slug's indexes. */
  public withSlugLock<T>(slug: string, task: () => Promise<T>): Promise<T> {
    return this.locks.run(slug, task);
  }

  /**
   * Insert into the slug's delta index, creating it on first use, then
   * persist. Callers hold the slug lock and have already recorded the chunk.
   */
  public async appendToDelta(slug: string, chunk: Chunk): Promise<CorpusIndex> {
    let index = this.delta.get(slug);
    const created = !index;
    if (!index) index = this.newIndex(path.join(this.opts.deltaRoot, slug));
    await index.insert(chunk);
    await index.persist();
    if (created) this.delta.set(slug, index);
    return index;
  }

  /**
   * Load every persisted base index, then every delta index (persisted, or
   * rebuilt from injection logs when missing or unreadable). A failure for
   * one slug is reported and skipped.
   */
  public async bootstrap(): Promise<StartupReport> {
    const entries: SlugLoadOutcome[] = [];

    for (const slug of await listDirs(this.opts.storageRoot)) {
      entries.push(await this.loadBase(slug));
    }

    const groups = new Map<string, LogGroup>();
    for (const g of await this.opts.recorder.listLogGroups()) {
      try {
        validateSlugParts(g.project, g.version);
      } catch (e) {
        console.error(`[RAG] Warning: skipping injection log ${g.project}/${g.version}: ${describeError(e)}`);
        continue;
      }
      groups.set(resolveSlug(g.project, g.version), g);
    }
    const deltaSlugs = new Set([...(await listDirs(this.opts.deltaRoot)), ...groups.keys()]);
    for (const slug of [...deltaSlugs].sort()) {
      const outcome = await this.loadDelta(slug, groups.get(slug));
      if (outcome) entries.push(outcome);
    }

    const degraded = [...new Set(entries.filter((e) => e.outcome === "failed").map((e) => e.slug))];
    const { base, delta } = this.counts();
    console.error(`[RAG] Registry initialized with ${base} base indexes and ${delta} delta indexes`);
    if (degraded.length) console.error(`[RAG] Degraded slugs: ${degraded.join(", ")}`);
    return { entries, degraded };
  }

  private newIndex(dir: string): VectorCorpusIndex {
    return new VectorCorpusIndex({
      dir,
      embedder: this.opts.embedder,
      persistence: this.opts.persistence,
    });
  }

  private async loadBase(slug: string): Promise<SlugLoadOutcome> {
    const dir = path.join(this.opts.storageRoot, slug);
    const result = await loadCorpusIndex(dir, this.opts.embedder, this.opts.persistence);
    if (result.status === "loaded") {
      this.base.set(slug, result.index);
      console.error(`[RAG] Loaded base index: ${slug} (${result.index.size()} chunks)`);
      return { slug, corpus: "base", outcome: "loaded", chunks: result.index.size() };
    }
    const error = result.status === "failed" ? describeError(result.error.cause) : "no index file";
    console.error(`[RAG] Warning: could not load base index ${slug}: ${error}`);
    return { slug, corpus: "base", outcome: "failed", error };
  }

  private async loadDelta(slug: string, group: LogGroup | undefined): Promise<SlugLoadOutcome | null> {
    const dir = path.join(this.opts.deltaRoot, slug);
    const result = await loadCorpusIndex(dir, this.opts.embedder, this.opts.persistence);
    if (result.status === "loaded") {
      this.delta.set(slug, result.index);
      console.error(`[RAG] Loaded delta index: ${slug} (${result.index.size()} chunks)`);
      return { slug, corpus: "delta", outcome: "loaded", chunks: result.index.size() };
    }
    if (result.status === "failed") {
      console.error(`[RAG] Warning: could not load delta index ${slug}: ${describeError(result.error.cause)}`);
    }
    if (!group) {
      return result.status === "failed"
        ? { slug, corpus: "delta", outcome: "failed", error: describeError(result.error.cause) }
        : null;
    }
    try {
      const chunks = await this.opts.recorder.reconstructDelta(group.project, group.version);
      if (!chunks.length) return null;
      console.error(`[RAG] Building delta index for ${slug} from ${chunks.length} injected records`);
      const index = this.newIndex(dir);
      for (const c of chunks) await index.insert(c);
      await index.persist();
      this.delta.set(slug, index);
      return { slug, corpus: "delta", outcome: "rebuilt", chunks: index.size() };
    } catch (e) {
      console.error(`[RAG] Warning: could not rebuild delta index ${slug}: ${describeError(e)}`);
      return { slug, corpus: "delta", outcome: "failed", error: describeError(e) };
    }
  }
}
