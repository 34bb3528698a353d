/**
 * Domain table parser tests
 *
 * Covers tokenization of the whitespace-aligned layout, strict numeric
 * conversion, and the skip-never-abort policy for malformed lines.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileError, ParseError } from "../../src/errors";
import {
  DomainTableParser,
  parseDomainTable,
  parseDomainTableLine,
  parseFloatStrict,
  parseInteger,
  tokenize,
} from "../../src/formats/domtbl/parser";
import { collect, domtbl, domtblRow } from "../utils/domtbl-fixtures";

describe("tokenize", () => {
  test("splits on runs of spaces and tabs", () => {
    expect(tokenize("a   b\t\tc")).toEqual(["a", "b", "c"]);
  });

  test("keeps the remainder of the line in the last token", () => {
    expect(tokenize("a b c   d  e", 3)).toEqual(["a", "b", "c   d  e"]);
  });

  test("keeps a multi-word description intact as field 23", () => {
    const fields = tokenize(domtblRow({ description: "alpha/beta  hydrolase fold" }));
    expect(fields).toHaveLength(23);
    expect(fields[22]).toBe("alpha/beta  hydrolase fold");
  });
});

describe("numeric fields", () => {
  test("parseInteger accepts signed digit strings only", () => {
    expect(parseInteger("12")).toBe(12);
    expect(parseInteger("+12")).toBe(12);
    expect(parseInteger("-3")).toBe(-3);
    expect(parseInteger("12.0")).toBeUndefined();
    expect(parseInteger("1e3")).toBeUndefined();
    expect(parseInteger("")).toBeUndefined();
  });

  test("parseFloatStrict accepts decimal, exponent and special values", () => {
    expect(parseFloatStrict("1.5e-10")).toBe(1.5e-10);
    expect(parseFloatStrict(".5")).toBe(0.5);
    expect(parseFloatStrict("5.")).toBe(5);
    expect(parseFloatStrict("-2.25")).toBe(-2.25);
    expect(parseFloatStrict("inf")).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloatStrict("-Infinity")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloatStrict("NaN")).toBeNaN();
    expect(parseFloatStrict("high")).toBeUndefined();
    expect(parseFloatStrict("1.2.3")).toBeUndefined();
  });
});

describe("parseDomainTableLine", () => {
  test("reads every field of a well-formed row", () => {
    const line = domtblRow({
      target: "contig_7_12",
      targetLength: 312,
      query: "PzDE_esterase",
      queryLength: 280,
      evalue: "3.1e-45",
      score: "152.4",
      hmm: [5, 270],
      ali: [20, 298],
      description: "putative esterase",
    });

    expect(parseDomainTableLine(line, 4)).toEqual({
      kind: "hit",
      hit: {
        target: "contig_7_12",
        targetLength: 312,
        query: "PzDE_esterase",
        queryLength: 280,
        fullEvalue: 3.1e-45,
        fullScore: 152.4,
        hmmFrom: 5,
        hmmTo: 270,
        aliFrom: 20,
        aliTo: 298,
        description: "putative esterase",
        lineNumber: 4,
      },
    });
  });

  test("classifies comment and blank lines", () => {
    expect(parseDomainTableLine("# target name  accession", 1)).toEqual({ kind: "comment" });
    expect(parseDomainTableLine("   \t ", 2)).toEqual({ kind: "blank" });
  });

  test("rejects a line with fewer than 22 fields", () => {
    expect(parseDomainTableLine("a b c d e f g h i j", 3)).toEqual({
      kind: "malformed",
      reason: "expected at least 22 fields, got 10",
    });
  });

  test("accepts exactly 22 fields with no description", () => {
    const line = domtblRow().split("   ").slice(0, 22).join(" ");
    const result = parseDomainTableLine(line, 1);
    expect(result.kind).toBe("hit");
    if (result.kind === "hit") {
      expect(result.hit.description).toBe("");
    }
  });

  test("rejects a non-integer length", () => {
    expect(parseDomainTableLine(domtblRow({ targetLength: "abc" }), 5)).toEqual({
      kind: "malformed",
      reason: "targetLength is not an integer: 'abc'",
    });
  });

  test("rejects a fractional length", () => {
    expect(parseDomainTableLine(domtblRow({ queryLength: "50.5" }), 5)).toEqual({
      kind: "malformed",
      reason: "queryLength is not an integer: '50.5'",
    });
  });

  test("rejects a non-numeric score", () => {
    expect(parseDomainTableLine(domtblRow({ score: "high" }), 6)).toEqual({
      kind: "malformed",
      reason: "fullScore is not a number: 'high'",
    });
  });

  test("rejects a zero-length profile", () => {
    expect(parseDomainTableLine(domtblRow({ queryLength: 0 }), 7)).toEqual({
      kind: "malformed",
      reason: "lengths must be positive (target 100, query 0)",
    });
  });
});

describe("parseDomainTable", () => {
  test("keeps two hits out of three data lines when one is truncated", () => {
    const table = domtbl([
      domtblRow({ target: "seqA", score: "40.0" }),
      "seqB - 100 PF00001 - 50 1e-5 25.0 0.1 1",
      domtblRow({ target: "seqC", score: "25.0" }),
    ]);

    const skipped: Array<[string, number]> = [];
    const { hits, stats } = parseDomainTable(table, (reason, line) => skipped.push([reason, line]));

    expect(hits.map((hit) => hit.target)).toEqual(["seqA", "seqC"]);
    expect(stats).toEqual({ linesRead: 9, comments: 6, blank: 0, malformed: 1, hits: 2 });
    expect(skipped).toEqual([["expected at least 22 fields, got 10", 5]]);
  });

  test("numbers lines from 1 and handles CRLF", () => {
    const { hits } = parseDomainTable(`# header\r\n${domtblRow()}\r\n`);
    expect(hits).toHaveLength(1);
    expect(hits[0]?.lineNumber).toBe(2);
  });
});

describe("DomainTableParser", () => {
  let parser: DomainTableParser;
  let workDir: string;

  beforeEach(() => {
    parser = new DomainTableParser();
    workDir = mkdtempSync(join(tmpdir(), "hitscan-domtbl-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  test("parses a string and records statistics", async () => {
    const text = ["# comment", domtblRow({ target: "s1" }), "", "short line only", domtblRow({ target: "s2" })].join(
      "\n"
    );

    const hits = await collect(parser.parseString(text));

    expect(hits.map((hit) => hit.target)).toEqual(["s1", "s2"]);
    expect(parser.stats).toEqual({ linesRead: 5, comments: 1, blank: 1, malformed: 1, hits: 2 });
  });

  test("reports skipped lines through onSkip", async () => {
    const skipped: Array<[string, number]> = [];
    const reporting = new DomainTableParser({
      onSkip: (reason, lineNumber) => skipped.push([reason, lineNumber]),
    });

    await collect(reporting.parseString(`${domtblRow()}\n${domtblRow({ score: "x" })}\n`));

    expect(skipped).toEqual([["fullScore is not a number: 'x'", 2]]);
  });

  test("restarts statistics on every parse", async () => {
    await collect(parser.parseString(`${domtblRow()}\n${domtblRow()}\n`));
    await collect(parser.parseString(`${domtblRow()}\n`));

    expect(parser.stats.hits).toBe(1);
    expect(parser.stats.linesRead).toBe(1);
  });

  test("parses a table file", async () => {
    const path = join(workDir, "sample.domtblout");
    writeFileSync(path, domtbl([domtblRow({ target: "f1" }), domtblRow({ target: "f2" })]));

    const hits = await collect(parser.parseFile(path));

    expect(hits.map((hit) => hit.target)).toEqual(["f1", "f2"]);
    expect(parser.stats.comments).toBe(6);
  });

  test("fails with FileError when the table is missing", async () => {
    const missing = join(workDir, "absent.domtblout");
    await expect(collect(parser.parseFile(missing))).rejects.toBeInstanceOf(FileError);
  });

  test("stops with ParseError once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const aborting = new DomainTableParser({ signal: controller.signal });

    const error = await collect(aborting.parseString(domtblRow())).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.format).toBe("domtbl");
      expect(error.message).toBe("Domain table parsing aborted");
      expect(error.lineNumber).toBe(1);
    }
  });
});
