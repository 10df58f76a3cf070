import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { StorageWriteFailure } from "./errors";
import type { Thread, ThreadMessage } from "./types";

const threadSchema = z.array(
  z.object({ role: z.enum(["user", "assistant"]), content: z.string() }),
);

/**
 * Conversation history keyed by thread id, persisted as one JSON file per
 * thread under `<stateRoot>/threads/` and mirrored in memory.
 */
export class ThreadStore {
  private readonly dir: string;
  private readonly cache = new Map<string, Thread>();

  public constructor(stateRoot: string) {
    this.dir = path.join(stateRoot, "threads");
  }

  private fileFor(threadId: string): string {
    // thread ids are opaque; keep them to one path segment
    return path.join(this.dir, `${encodeURIComponent(threadId)}.json`);
  }

  /** Persisted history for a thread, or an empty thread. */
  public async load(threadId: string): Promise<Thread> {
    const file = this.fileFor(threadId);
    if (!fsSync.existsSync(file)) return [];
    const raw = await fs.readFile(file, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = undefined;
    }
    const parsed = threadSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[RAG] Ignoring malformed thread history at ${file}`);
      return [];
    }
    return parsed.data;
  }

  /** In-memory copy of the last written history, if any. */
  public cached(threadId: string): Thread | undefined {
    return this.cache.get(threadId);
  }

  /** Append one user/assistant exchange, persist, and refresh the cache. */
  public async append(threadId: string, userText: string, assistantText: string): Promise<Thread> {
    const exchange: ThreadMessage[] = [
      { role: "user", content: userText },
      { role: "assistant", content: assistantText },
    ];
    const messages = [...(await this.load(threadId)), ...exchange];
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(this.fileFor(threadId), JSON.stringify(messages, null, 2));
    } catch (e) {
      throw new StorageWriteFailure(`Failed to persist thread ${threadId}`, e);
    }
    this.cache.set(threadId, messages);
    return messages;
  }
}
