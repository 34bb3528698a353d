/**
 * End-to-end run: search, parse, filter, annotate, report
 *
 * Stages run strictly one after another. `processDomainTable` is the pure
 * core over table text; `runPipeline` adds the search tool, file checks and
 * file output around it.
 */

import { Effect, Layer } from "effect";
import { FileError } from "./errors";
import { loadAnnotationMap } from "./formats/annotation/loader";
import { parseDomainTable } from "./formats/domtbl/parser";
import { HitReportWriter } from "./formats/report/writer";
import { exists } from "./io/file-reader";
import { getPlatform, runPromise } from "./io/runtime";
import { filterHitsSync, normalizeFilterConfig } from "./operations/filter";
import { SearchTool } from "./search/hmmsearch";
import { DomainTableSource } from "./search/table-source";
import type { Annotations, CoveredHit, FilterOptions, ParseStats } from "./types";

/**
 * Materialized run parameters
 */
export interface PipelineConfig extends FilterOptions {
  /** Protein FASTA searched by hmmsearch */
  readonly input: string;
  /** Prefix for `<prefix>.domtblout` and `<prefix>.filtered.csv` */
  readonly outputPrefix: string;
  /** Profile HMM database */
  readonly hmmDb: string;
  /** hmmsearch `-E` threshold */
  readonly evalue: number;
  /** hmmsearch `--cpu` */
  readonly cpus: number;
  /** Profile id -> KO code table; optional input */
  readonly koMap?: string;
  /** Profile id -> gene symbol table; optional input */
  readonly symbolMap?: string;
  /** Abort hmmsearch after this many milliseconds */
  readonly timeoutMs?: number;
  /** Write the report via a temporary file and rename */
  readonly atomic?: boolean;
}

export interface PipelineOptions {
  /** Services for the search and table reading (default: hmmsearch and disk) */
  readonly services?: Layer.Layer<SearchTool | DomainTableSource>;
  /** Progress messages (default: console.log) */
  readonly log?: (message: string) => void;
  /** Annotation load warnings (default: console.warn) */
  readonly onWarning?: (warning: string) => void;
  /** Malformed table lines */
  readonly onSkip?: (reason: string, lineNumber: number) => void;
}

export interface PipelineSummary {
  readonly tablePath: string;
  readonly outputPath: string;
  readonly parse: ParseStats;
  readonly retained: number;
  readonly koEntries: number;
  readonly symbolEntries: number;
}

export function tablePathFor(outputPrefix: string): string {
  return `${outputPrefix}.domtblout`;
}

export function reportPathFor(outputPrefix: string): string {
  return `${outputPrefix}.filtered.csv`;
}

/**
 * Parse, filter and format a table held in memory
 *
 * Deterministic: identical inputs give identical `csv` text.
 *
 * @example
 * ```typescript
 * const { csv, hits } = processDomainTable(tableText, {
 *   filter: { minScore: 30 },
 *   annotations: { ko: new Map(), symbol: new Map() },
 * });
 * ```
 */
export function processDomainTable(
  table: string,
  options: {
    filter?: FilterOptions;
    annotations?: Annotations;
    onSkip?: (reason: string, lineNumber: number) => void;
  } = {}
): { csv: string; hits: CoveredHit[]; stats: ParseStats } {
  const annotations = options.annotations ?? { ko: new Map(), symbol: new Map() };
  const { hits: parsed, stats } = parseDomainTable(table, options.onSkip);
  const hits = filterHitsSync(parsed, options.filter);
  const csv = new HitReportWriter().formatReport(hits, annotations);
  return { csv, hits, stats };
}

function defaultServices(): Layer.Layer<SearchTool | DomainTableSource> {
  return Layer.mergeAll(SearchTool.Live, DomainTableSource.File).pipe(
    Layer.provide(getPlatform())
  );
}

/**
 * Run hmmsearch and write `<prefix>.filtered.csv`
 *
 * @throws {FileError} Input FASTA or HMM database missing, table unreadable,
 * or report unwritable
 * @throws {SearchToolError} hmmsearch could not run or exited non-zero
 * @throws {ValidationError} Invalid thresholds
 */
export async function runPipeline(
  config: PipelineConfig,
  options: PipelineOptions = {}
): Promise<PipelineSummary> {
  const log = options.log ?? ((message: string): void => console.log(message));

  const inputs: ReadonlyArray<readonly [string, string]> = [
    [config.input, "Input FASTA"],
    [config.hmmDb, "HMM database"],
  ];
  for (const [path, name] of inputs) {
    if (!(await exists(path))) {
      throw new FileError(`${name} not found: ${path}`, path, "stat");
    }
  }

  const filter: FilterOptions = {
    ...(config.minScore !== undefined && { minScore: config.minScore }),
    ...(config.minModelCoverage !== undefined && { minModelCoverage: config.minModelCoverage }),
    ...(config.minSeqCoverage !== undefined && { minSeqCoverage: config.minSeqCoverage }),
  };
  normalizeFilterConfig(filter);

  const tablePath = tablePathFor(config.outputPrefix);
  const outputPath = reportPathFor(config.outputPrefix);

  log(`Running hmmsearch on ${config.input}...`);
  const program = Effect.gen(function* () {
    const tool = yield* SearchTool;
    const source = yield* DomainTableSource;
    const produced = yield* tool.search({
      input: config.input,
      hmmDb: config.hmmDb,
      tablePath,
      evalue: config.evalue,
      cpus: config.cpus,
      ...(config.timeoutMs !== undefined && { timeoutMs: config.timeoutMs }),
    });
    return yield* source.read(produced);
  });
  const table = await runPromise(program.pipe(Effect.provide(options.services ?? defaultServices())));

  log("Parsing and filtering HMM hits...");
  const { hits: parsed, stats } = parseDomainTable(table, options.onSkip);
  const hits = filterHitsSync(parsed, filter);

  const onWarning = options.onWarning !== undefined ? { onWarning: options.onWarning } : {};
  const ko = await loadAnnotationMap(config.koMap, { label: "KO map", ...onWarning });
  const symbol = await loadAnnotationMap(config.symbolMap, { label: "symbol map", ...onWarning });

  const writer = new HitReportWriter();
  await writer.writeFile(outputPath, hits, { ko, symbol }, { atomic: config.atomic ?? false });
  log(`Done! Results saved to ${outputPath}`);

  return {
    tablePath,
    outputPath,
    parse: stats,
    retained: hits.length,
    koEntries: ko.size,
    symbolEntries: symbol.size,
  };
}
