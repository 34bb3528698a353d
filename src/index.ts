/**
 * hitscan - post-processing for HMMER domain tables
 *
 * Parses `--domtblout` output, keeps hits that pass score and coverage
 * thresholds, joins KO and gene-symbol annotations, and writes a CSV report.
 */

// Error types
export { FileError, HitScanError, ParseError, SearchToolError, ValidationError } from "./errors";
// Domain table
export {
  DomainTableParser,
  parseDomainTable,
  parseDomainTableLine,
  parseFloatStrict,
  parseInteger,
  tokenize,
} from "./formats/domtbl/parser";
// Annotations
export {
  loadAnnotationMap,
  lookupAnnotation,
  MISSING_ANNOTATION,
  parseAnnotationText,
} from "./formats/annotation/loader";
// Report
export { escapeCsvField, formatExponential, formatFixed } from "./formats/report/format";
export { HitReportWriter, REPORT_COLUMNS } from "./formats/report/writer";
// Filtering
export { computeCoverage, withCoverage } from "./operations/coverage";
export {
  filterHits,
  filterHitsSync,
  normalizeFilterConfig,
  passesThresholds,
} from "./operations/filter";
// External search
export { buildSearchArgs, HMMSEARCH, SearchTool } from "./search/hmmsearch";
export type { SearchRequest, SearchToolShape } from "./search/hmmsearch";
export { DomainTableSource } from "./search/table-source";
export type { DomainTableSourceShape } from "./search/table-source";
// Pipeline and configuration
export { parseCommandLine, USAGE } from "./config";
export type { CommandLine } from "./config";
export { processDomainTable, reportPathFor, runPipeline, tablePathFor } from "./pipeline";
export type { PipelineConfig, PipelineOptions, PipelineSummary } from "./pipeline";
// File I/O
export { FileReader } from "./io/file-reader";
export { openForWriting, writeString } from "./io/file-writer";
export type { FileWriteHandle } from "./io/file-writer";
// Core types
export type {
  AnnotationLoaderOptions,
  AnnotationMap,
  Annotations,
  CoveredHit,
  DomainHit,
  FilterConfig,
  FilterOptions,
  LineResult,
  ParserOptions,
  ParseStats,
  WriteOptions,
} from "./types";
export { FilterOptionsSchema } from "./types";
