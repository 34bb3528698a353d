/**
 * Alignment coverage ratios
 */

import type { CoveredHit, DomainHit } from "../types";

/**
 * Fraction of `length` spanned by the 1-based inclusive span `from..to`
 *
 * @example
 * ```typescript
 * computeCoverage(1, 50, 100); // 0.5
 * ```
 */
export function computeCoverage(from: number, to: number, length: number): number {
  return (to - from + 1) / length;
}

/**
 * Attach model and sequence coverage to a hit
 */
export function withCoverage(hit: DomainHit): CoveredHit {
  return {
    ...hit,
    modelCoverage: computeCoverage(hit.hmmFrom, hit.hmmTo, hit.queryLength),
    seqCoverage: computeCoverage(hit.aliFrom, hit.aliTo, hit.targetLength),
  };
}
