import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { StorageWriteFailure, describeError } from "./errors";
import { denormalizeVersion, normalizeVersion } from "./slug";
import type { Chunk, InjectionRecord, Metadata } from "./types";

const recordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string(),
  text: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

/** A project/version pair that has an injection log directory. */
export interface LogGroup {
  project: string;
  version: string;
}

export interface InjectionRecorderOptions {
  root: string;
  /** Clock used for record timestamps and day-file selection. */
  now?: () => Date;
}

function dayStamp(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

/**
 * Append-only JSONL log of injected content, one file per day under
 * `<root>/<project>/<normalized version>/`. The log is the ground truth for
 * the delta corpus: a record is flushed before its chunk becomes searchable,
 * and the delta index can always be rebuilt from it.
 */
export class InjectionRecorder {
  private readonly root: string;
  private readonly now: () => Date;

  public constructor(opts: InjectionRecorderOptions) {
    this.root = opts.root;
    this.now = opts.now ?? (() => new Date());
  }

  public groupDir(project: string, version: string): string {
    return path.join(this.root, project, normalizeVersion(version));
  }

  /**
   * Durably append one record and return its id (used as the chunk id).
   *
   * @throws {StorageWriteFailure} if the directory, write or flush fails.
   */
  public async record(
    project: string,
    version: string,
    text: string,
    metadata: Metadata = {},
  ): Promise<InjectionRecord> {
    const at = this.now();
    const rec: InjectionRecord = {
      id: randomUUID(),
      timestamp: at.toISOString(),
      text,
      metadata,
    };
    const dir = this.groupDir(project, version);
    const file = path.join(dir, `${dayStamp(at)}.jsonl`);
    try {
      await fs.mkdir(dir, { recursive: true });
      const handle = await fs.open(file, "a");
      try {
        await handle.write(JSON.stringify(rec) + "\n");
        await handle.datasync();
      } finally {
        await handle.close();
      }
    } catch (e) {
      throw new StorageWriteFailure(`Failed to append injection record to ${file}`, e);
    }
    return rec;
  }

  /**
   * Rebuild the delta corpus for one project/version from its log files.
   * Files are read in name (day) order, lines in append order. Unparseable
   * lines are skipped with a warning.
   */
  public async reconstructDelta(project: string, version: string): Promise<Chunk[]> {
    const dir = this.groupDir(project, version);
    if (!fsSync.existsSync(dir)) return [];
    const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".jsonl")).sort();
    const chunks: Chunk[] = [];
    for (const f of files) {
      const file = path.join(dir, f);
      const lines = (await fs.readFile(file, "utf8")).split("\n");
      lines.forEach((line, i) => {
        if (!line.trim()) return;
        const rec = parseRecord(line);
        if ("error" in rec) {
          console.error(`[RAG] Skipping injection record ${file}:${i + 1}: ${rec.error}`);
          return;
        }
        chunks.push({ id: rec.id, text: rec.text, metadata: rec.metadata });
      });
    }
    return chunks;
  }

  /** Every project/version that has a log directory. */
  public async listLogGroups(): Promise<LogGroup[]> {
    if (!fsSync.existsSync(this.root)) return [];
    const out: LogGroup[] = [];
    for (const p of await fs.readdir(this.root, { withFileTypes: true })) {
      if (!p.isDirectory()) continue;
      for (const v of await fs.readdir(path.join(this.root, p.name), { withFileTypes: true })) {
        if (v.isDirectory()) out.push({ project: p.name, version: denormalizeVersion(v.name) });
      }
    }
    return out;
  }
}

function parseRecord(line: string): InjectionRecord | { error: string } {
  try {
    const parsed = recordSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : { error: parsed.error.issues[0]?.message ?? "invalid" };
  } catch (e) {
    return { error: describeError(e) };
  }
}
