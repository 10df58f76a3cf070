/**
 * Shared chunk / candidate / thread types used by the indexing, retrieval and
 * answering layers.
 */

/** Scalar value allowed in chunk metadata. Keeps the injection log format closed. */
export type MetadataValue = string | number | boolean;

/** Flat metadata map attached to a chunk. */
export type Metadata = Record<string, MetadataValue>;

/**
 * Immutable unit of retrievable text. Once inserted into an index it is never
 * mutated; re-inserting the same id appends a second copy.
 */
export interface Chunk {
  /** Unique id (injection record id for delta chunks). */
  readonly id: string;
  /** Raw chunk text. */
  readonly text: string;
  readonly metadata: Readonly<Metadata>;
}

/** A chunk held by an index together with its embedding. */
export interface EmbeddedChunk extends Chunk {
  readonly emb: Float32Array;
}

/**
 * A chunk plus the similarity it scored against one query on one index.
 * `score` is undefined when the index could not produce one; such candidates
 * stay in the context but are left out of confidence arithmetic.
 */
export interface RetrievedCandidate {
  readonly chunk: Chunk;
  readonly score?: number;
}

/** One line of the append-only injection log. */
export interface InjectionRecord {
  id: string;
  /** ISO-8601 timestamp of the write. */
  timestamp: string;
  text: string;
  metadata: Metadata;
}

export type ThreadRole = "user" | "assistant";

export interface ThreadMessage {
  role: ThreadRole;
  content: string;
}

/** Ordered, append-only conversation history for one thread id. */
export type Thread = ThreadMessage[];
