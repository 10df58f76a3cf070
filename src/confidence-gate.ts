import type { RetrievedCandidate } from "./types";

export interface GateOptions {
  /** Evidence quantity floor. */
  minHits: number;
  /** Per-candidate score floor. */
  similarityCutoff: number;
  /** Evidence quality floor on the mean score. */
  confidenceThreshold: number;
}

export type AbstainReason = "too_few_hits" | "low_confidence";

export interface GateDecision {
  accepted: RetrievedCandidate[];
  shouldAnswer: boolean;
  /** Mean of defined scores among accepted candidates; undefined when none has one. */
  meanScore?: number;
  reason?: AbstainReason;
}

function hasScore(c: RetrievedCandidate): c is RetrievedCandidate & { score: number } {
  return typeof c.score === "number";
}

/**
 * Decide whether retrieval evidence is strong enough to answer.
 *
 * 1. Drop candidates whose score is defined and strictly below the cutoff;
 *    unscored candidates are kept.
 * 2. Abstain if fewer than `minHits` remain.
 * 3. Abstain if the mean of the defined scores is strictly below
 *    `confidenceThreshold`. With no defined scores this check is skipped.
 */
export function gate(candidates: readonly RetrievedCandidate[], opts: GateOptions): GateDecision {
  const accepted = candidates.filter((c) => !hasScore(c) || c.score >= opts.similarityCutoff);

  const scores = accepted.filter(hasScore).map((c) => c.score);
  const meanScore = scores.length ? scores.reduce((a, b) => a + b, 0) / scores.length : undefined;

  if (accepted.length < opts.minHits) {
    return { accepted, shouldAnswer: false, meanScore, reason: "too_few_hits" };
  }
  if (meanScore !== undefined && meanScore < opts.confidenceThreshold) {
    return { accepted, shouldAnswer: false, meanScore, reason: "low_confidence" };
  }
  return { accepted, shouldAnswer: true, meanScore };
}
