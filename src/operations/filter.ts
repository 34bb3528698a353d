/**
 * Score and coverage filtering for domain hits
 *
 * A hit is kept when it clears every enabled threshold. Checks run in a
 * fixed order (score, model coverage, sequence coverage) and each bound is
 * inclusive. E-values are not checked here; hmmsearch already applied its
 * `-E` cutoff.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { CoveredHit, DomainHit, FilterConfig, FilterOptions } from "../types";
import { FilterOptionsSchema } from "../types";
import { withCoverage } from "./coverage";

/**
 * Validate caller thresholds and fill in the score floor
 *
 * An absent `minScore` becomes `-Infinity`, so the score check is always
 * evaluated and never rejects.
 *
 * @throws {ValidationError} For a coverage threshold outside [0, 1] or a
 * non-numeric threshold
 */
export function normalizeFilterConfig(options: FilterOptions = {}): FilterConfig {
  const validation = FilterOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid filter thresholds: ${validation.summary}`);
  }

  return {
    minScore: options.minScore ?? Number.NEGATIVE_INFINITY,
    ...(options.minModelCoverage !== undefined && { minModelCoverage: options.minModelCoverage }),
    ...(options.minSeqCoverage !== undefined && { minSeqCoverage: options.minSeqCoverage }),
  };
}

/**
 * Check a covered hit against normalized thresholds
 *
 * Coverage comparisons use the unrounded ratios.
 */
export function passesThresholds(hit: CoveredHit, config: FilterConfig): boolean {
  if (hit.fullScore < config.minScore) {
    return false;
  }
  if (config.minModelCoverage !== undefined && hit.modelCoverage < config.minModelCoverage) {
    return false;
  }
  if (config.minSeqCoverage !== undefined && hit.seqCoverage < config.minSeqCoverage) {
    return false;
  }
  return true;
}

/**
 * Filter hits, preserving input order
 *
 * @example
 * ```typescript
 * const kept = filterHitsSync(hits, { minScore: 50, minModelCoverage: 0.7 });
 * ```
 */
export function filterHitsSync(hits: Iterable<DomainHit>, options: FilterOptions = {}): CoveredHit[] {
  const config = normalizeFilterConfig(options);
  const kept: CoveredHit[] = [];

  for (const hit of hits) {
    const covered = withCoverage(hit);
    if (passesThresholds(covered, config)) {
      kept.push(covered);
    }
  }

  return kept;
}

/**
 * Streaming form of `filterHitsSync`
 *
 * Thresholds are validated before the first hit is pulled.
 */
export function filterHits(
  source: AsyncIterable<DomainHit>,
  options: FilterOptions = {}
): AsyncIterable<CoveredHit> {
  const config = normalizeFilterConfig(options);

  return (async function* (): AsyncIterable<CoveredHit> {
    for await (const hit of source) {
      const covered = withCoverage(hit);
      if (passesThresholds(covered, config)) {
        yield covered;
      }
    }
  })();
}
