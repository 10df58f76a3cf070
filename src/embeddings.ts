import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { GenerationError } from "./errors";

/** Anything that can turn text into a vector. Indexes depend on this, never on a provider. */
export interface Embedder {
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Gemini embedding client plus cosine similarity helper.
 * A single instance can be reused for any number of embed() calls.
 */
export class Embeddings implements Embedder {
  private readonly modelName: string;
  private readonly apiKey: string;
  /** Per-request bound; expiry surfaces as a GenerationError. */
  private readonly timeoutMs: number;
  private model: GenerativeModel | null = null;

  public constructor(apiKey: string, modelName = "text-embedding-004", timeoutMs = 60_000) {
    this.apiKey = apiKey;
    this.modelName = modelName.trim() || "text-embedding-004";
    this.timeoutMs = timeoutMs;
  }

  public getModelName(): string {
    return this.modelName;
  }

  /** Lazily create the model handle (idempotent). */
  public init(): void {
    if (this.model) return;
    console.error(`[RAG] Using embedding model: ${this.modelName}`);
    this.model = new GoogleGenerativeAI(this.apiKey).getGenerativeModel(
      { model: this.modelName },
      { timeout: this.timeoutMs },
    );
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   * @throws {GenerationError} When the provider rejects the request.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.model) throw new EmbedderNotInitializedError();
    try {
      const result = await this.model.embedContent(text);
      return Float32Array.from(result.embedding.values);
    } catch (e) {
      throw new GenerationError(`Embedding request failed (${this.modelName})`, e);
    }
  }

  /**
   * Cosine similarity between two vectors. Length mismatch is handled by
   * comparing up to the shortest length.
   *
   * @returns Similarity in range [-1, 1]
   */
  public static cosine(a: Float32Array, b: Float32Array): number {
    let dot = 0,
      na = 0,
      nb = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const x = a[i],
        y = b[i];
      dot += x * y;
      na += x * x;
      nb += y * y;
    }
    return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
  }
}
