import type { CorpusIndex } from "./corpus-index";
import type { RetrievedCandidate } from "./types";

/**
 * Query base, then delta (if any), each for its own top-k, and concatenate
 * base-first. No cross-index re-ranking or dedup: a chunk present in both
 * yields two candidates, and the result holds between 0 and 2k entries.
 * The two searches run sequentially.
 */
export async function mergeCandidates(
  base: CorpusIndex,
  delta: CorpusIndex | undefined,
  query: string,
  k: number,
  verbose = false,
): Promise<RetrievedCandidate[]> {
  const baseHits = await base.search(query, k);
  if (verbose) console.error(`[RAG][verbose] Retrieved ${baseHits.length} candidates from base index`);
  if (!delta) return baseHits;
  const deltaHits = await delta.search(query, k);
  if (verbose) console.error(`[RAG][verbose] Retrieved ${deltaHits.length} candidates from delta index`);
  return [...baseHits, ...deltaHits];
}
