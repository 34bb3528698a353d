/**
 * HMMER domain table (`--domtblout`) parser
 *
 * Reads the fixed column layout written by hmmsearch/hmmscan. Real tables
 * are whitespace-aligned rather than tab-delimited, and the last column is
 * free text that may itself contain spaces.
 *
 * Malformed lines never abort a run: they are counted in `ParseStats`,
 * reported through `onSkip`, and dropped whole.
 */

import { ParseError } from "../../errors";
import { readLines } from "../../io/file-reader";
import type { DomainHit, LineResult, ParserOptions, ParseStats } from "../../types";
import { COLUMNS, COMMENT_PREFIX, MAX_FIELDS, MIN_FIELDS } from "./constants";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN =
  /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i;

type NumericColumn = Exclude<keyof typeof COLUMNS, "target" | "query" | "description">;

/**
 * Split a line on runs of whitespace, keeping at most `maxFields` tokens
 *
 * The final token holds the remainder of the line with its inner spacing
 * intact.
 */
export function tokenize(line: string, maxFields: number = MAX_FIELDS): string[] {
  const fields: string[] = [];
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(line)) !== null) {
    if (fields.length === maxFields - 1) {
      fields.push(line.slice(match.index).trimEnd());
      break;
    }
    fields.push(match[0]);
  }

  return fields;
}

/**
 * Parse a base-10 integer, rejecting fractions, exponents and blanks
 */
export function parseInteger(raw: string): number | undefined {
  return INTEGER_PATTERN.test(raw) ? Number(raw) : undefined;
}

/**
 * Parse a decimal or exponent float; `inf`, `infinity` and `nan` are accepted
 */
export function parseFloatStrict(raw: string): number | undefined {
  if (!FLOAT_PATTERN.test(raw)) return undefined;

  const unsigned = raw.replace(/^[+-]/, "").toLowerCase();
  const negative = raw.startsWith("-");
  if (unsigned === "nan") return Number.NaN;
  if (unsigned === "inf" || unsigned === "infinity") {
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return Number(raw);
}

/**
 * Classify and parse one table line
 *
 * Never throws; any conversion failure yields `{ kind: "malformed" }`.
 */
export function parseDomainTableLine(line: string, lineNumber: number): LineResult {
  if (line.startsWith(COMMENT_PREFIX)) {
    return { kind: "comment" };
  }

  const trimmed = line.trim();
  if (trimmed === "") {
    return { kind: "blank" };
  }

  const fields = tokenize(trimmed);
  if (fields.length < MIN_FIELDS) {
    return {
      kind: "malformed",
      reason: `expected at least ${MIN_FIELDS} fields, got ${fields.length}`,
    };
  }

  let failure: string | undefined;
  const integer = (column: NumericColumn): number => {
    const raw = fields[COLUMNS[column]] ?? "";
    const value = parseInteger(raw);
    if (value === undefined) {
      failure ??= `${column} is not an integer: '${raw}'`;
      return Number.NaN;
    }
    return value;
  };
  const float = (column: NumericColumn): number => {
    const raw = fields[COLUMNS[column]] ?? "";
    const value = parseFloatStrict(raw);
    if (value === undefined) {
      failure ??= `${column} is not a number: '${raw}'`;
      return Number.NaN;
    }
    return value;
  };

  const hit: DomainHit = {
    target: fields[COLUMNS.target] ?? "",
    targetLength: integer("targetLength"),
    query: fields[COLUMNS.query] ?? "",
    queryLength: integer("queryLength"),
    fullEvalue: float("fullEvalue"),
    fullScore: float("fullScore"),
    hmmFrom: integer("hmmFrom"),
    hmmTo: integer("hmmTo"),
    aliFrom: integer("aliFrom"),
    aliTo: integer("aliTo"),
    description: fields[COLUMNS.description] ?? "",
    lineNumber,
  };

  if (failure !== undefined) {
    return { kind: "malformed", reason: failure };
  }
  if (hit.targetLength <= 0 || hit.queryLength <= 0) {
    return {
      kind: "malformed",
      reason: `lengths must be positive (target ${hit.targetLength}, query ${hit.queryLength})`,
    };
  }

  return { kind: "hit", hit };
}

function emptyStats(): ParseStats {
  return { linesRead: 0, comments: 0, blank: 0, malformed: 0, hits: 0 };
}

/**
 * Split text into lines, dropping the empty string after a final newline
 */
function splitLines(data: string): string[] {
  const lines = data.split(/\r?\n/);
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Record one line result in `stats`; returns the hit, if any
 */
function tally(
  result: LineResult,
  lineNumber: number,
  stats: ParseStats,
  onSkip: (reason: string, lineNumber: number) => void
): DomainHit | undefined {
  stats.linesRead++;
  switch (result.kind) {
    case "hit":
      stats.hits++;
      return result.hit;
    case "comment":
      stats.comments++;
      return undefined;
    case "blank":
      stats.blank++;
      return undefined;
    case "malformed":
      stats.malformed++;
      onSkip(result.reason, lineNumber);
      return undefined;
  }
}

/**
 * Parse a whole table held in memory
 *
 * @example
 * ```typescript
 * const { hits, stats } = parseDomainTable(text);
 * console.log(`${stats.hits} hits, ${stats.malformed} skipped`);
 * ```
 */
export function parseDomainTable(
  data: string,
  onSkip: (reason: string, lineNumber: number) => void = () => {}
): { hits: DomainHit[]; stats: ParseStats } {
  const stats = emptyStats();
  const hits: DomainHit[] = [];

  splitLines(data).forEach((line, index) => {
    const hit = tally(parseDomainTableLine(line, index + 1), index + 1, stats, onSkip);
    if (hit) hits.push(hit);
  });

  return { hits, stats };
}

/**
 * Streaming domain table parser
 *
 * Each `parse*` call restarts line numbering and statistics; `stats`
 * reflects the most recent call.
 *
 * @example
 * ```typescript
 * const parser = new DomainTableParser({
 *   onSkip: (reason, line) => console.debug(`line ${line}: ${reason}`),
 * });
 * for await (const hit of parser.parseFile("sample.domtblout")) {
 *   console.log(hit.target, hit.query, hit.fullScore);
 * }
 * ```
 */
export class DomainTableParser {
  private readonly onSkip: (reason: string, lineNumber: number) => void;
  private readonly signal: AbortSignal | undefined;
  private current: ParseStats = emptyStats();

  constructor(options: ParserOptions = {}) {
    this.onSkip = options.onSkip ?? ((): void => {});
    this.signal = options.signal;
  }

  /**
   * Counts from the most recent parse
   */
  get stats(): ParseStats {
    return { ...this.current };
  }

  /**
   * Parse hits from an in-memory table
   */
  async *parseString(data: string): AsyncIterable<DomainHit> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse hits from a table on disk
   *
   * @throws {FileError} If the table is missing or unreadable
   */
  async *parseFile(filePath: string): AsyncIterable<DomainHit> {
    yield* this.parseLines(readLines(filePath));
  }

  /**
   * Parse hits from any sequence of lines
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<DomainHit> {
    const stats = emptyStats();
    this.current = stats;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted(lineNumber);

      const hit = tally(parseDomainTableLine(line, lineNumber), lineNumber, stats, this.onSkip);
      if (hit) {
        yield hit;
      }
    }
  }

  private checkAborted(lineNumber: number): void {
    if (this.signal?.aborted) {
      throw new ParseError("Domain table parsing aborted", "domtbl", lineNumber);
    }
  }
}
