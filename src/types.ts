/**
 * Core type definitions for domain-table hits and their annotations
 *
 * Records are immutable once built: the parser produces `DomainHit`, the
 * filter stage derives `CoveredHit` from it, and the report writer only
 * reads both.
 */

import { type } from "arktype";

/**
 * One domain hit read from an HMMER `--domtblout` line
 */
export interface DomainHit {
  /** Target sequence name (column 1) */
  readonly target: string;
  /** Target sequence length in residues (column 3) */
  readonly targetLength: number;
  /** Query profile name (column 4) */
  readonly query: string;
  /** Query profile length in match states (column 6) */
  readonly queryLength: number;
  /** Full-sequence E-value (column 7) */
  readonly fullEvalue: number;
  /** Full-sequence bit score (column 8) */
  readonly fullScore: number;
  /** Alignment start on the profile, 1-based inclusive (column 16) */
  readonly hmmFrom: number;
  /** Alignment end on the profile, 1-based inclusive (column 17) */
  readonly hmmTo: number;
  /** Alignment start on the target, 1-based inclusive (column 18) */
  readonly aliFrom: number;
  /** Alignment end on the target, 1-based inclusive (column 19) */
  readonly aliTo: number;
  /** Free-text target description (column 23), empty when absent */
  readonly description: string;
  /** Line in the source table */
  readonly lineNumber: number;
}

/**
 * Domain hit with both coverage ratios attached
 */
export interface CoveredHit extends DomainHit {
  /** (hmmTo - hmmFrom + 1) / queryLength */
  readonly modelCoverage: number;
  /** (aliTo - aliFrom + 1) / targetLength */
  readonly seqCoverage: number;
}

/**
 * Outcome of reading a single table line
 */
export type LineResult =
  | { readonly kind: "hit"; readonly hit: DomainHit }
  | { readonly kind: "comment" }
  | { readonly kind: "blank" }
  | { readonly kind: "malformed"; readonly reason: string };

/**
 * Line counts for one parser run
 */
export interface ParseStats {
  linesRead: number;
  comments: number;
  blank: number;
  malformed: number;
  hits: number;
}

/**
 * Domain table parser configuration
 */
export interface ParserOptions {
  /** AbortController signal for cancelling a parse between lines */
  signal?: AbortSignal;
  /** Called once for every malformed line that gets skipped */
  onSkip?: (reason: string, lineNumber: number) => void;
}

/**
 * Caller-facing thresholds; every field may be left out
 */
export interface FilterOptions {
  /** Minimum full-sequence bit score (inclusive) */
  minScore?: number;
  /** Minimum model coverage in [0, 1] (inclusive) */
  minModelCoverage?: number;
  /** Minimum sequence coverage in [0, 1] (inclusive) */
  minSeqCoverage?: number;
}

/**
 * Thresholds after normalization; the score floor is always present
 */
export interface FilterConfig {
  readonly minScore: number;
  readonly minModelCoverage?: number;
  readonly minSeqCoverage?: number;
}

export const FilterOptionsSchema = type({
  "minScore?": "number",
  "minModelCoverage?": "0<=number<=1",
  "minSeqCoverage?": "0<=number<=1",
});

/**
 * Query profile id to annotation text
 */
export type AnnotationMap = ReadonlyMap<string, string>;

/**
 * The two annotation tables joined into the report
 */
export interface Annotations {
  readonly ko: AnnotationMap;
  readonly symbol: AnnotationMap;
}

export interface AnnotationLoaderOptions {
  /** Names the table in warnings, e.g. "KO map" (default: "annotation") */
  label?: string;
  /** Receives non-fatal load problems (default: console.warn) */
  onWarning?: (warning: string) => void;
}

/**
 * File writing configuration
 */
export interface WriteOptions {
  /** Write to `<path>.tmp` first and rename on success (default: false) */
  readonly atomic?: boolean;
}
