/**
 * Command-line parsing and run configuration validation
 */

import { describe, expect, test } from "vitest";
import { DEFAULTS, parseCommandLine, USAGE } from "../src/config";
import { ValidationError } from "../src/errors";
import type { PipelineConfig } from "../src/pipeline";

function configOf(argv: string[]): PipelineConfig {
  const commandLine = parseCommandLine(argv);
  if (commandLine.help) throw new Error("expected a run configuration");
  return commandLine.config;
}

describe("parseCommandLine", () => {
  test("fills every default when only input and output are given", () => {
    expect(configOf(["-i", "orfs.faa", "-o", "out/sample"])).toEqual({
      input: "orfs.faa",
      outputPrefix: "out/sample",
      hmmDb: "data/PzDE-HMM.hmm",
      evalue: 1e-5,
      cpus: 4,
      koMap: "data/hmm_label-KO.txt",
      symbolMap: "data/hmm_label-symbol.txt",
      atomic: false,
    });
  });

  test("reads every flag in long form", () => {
    const config = configOf([
      "--input",
      "orfs.faa",
      "--output",
      "run1",
      "--hmm-db",
      "custom.hmm",
      "--evalue",
      "1e-10",
      "--min-score",
      "50",
      "--min-modelcov",
      "0.7",
      "--min-seqcov",
      "0.25",
      "--nproc",
      "16",
      "--ko-map",
      "ko.tsv",
      "--symbol-map",
      "symbols.tsv",
      "--timeout-ms",
      "30000",
      "--atomic",
    ]);

    expect(config).toEqual({
      input: "orfs.faa",
      outputPrefix: "run1",
      hmmDb: "custom.hmm",
      evalue: 1e-10,
      cpus: 16,
      minScore: 50,
      minModelCoverage: 0.7,
      minSeqCoverage: 0.25,
      koMap: "ko.tsv",
      symbolMap: "symbols.tsv",
      timeoutMs: 30000,
      atomic: true,
    });
  });

  test("accepts the short flags and --flag=value", () => {
    const config = configOf(["-i", "a.faa", "-o", "a", "-db", "x.hmm", "-n", "2", "--min-score=12.5"]);

    expect(config.hmmDb).toBe("x.hmm");
    expect(config.cpus).toBe(2);
    expect(config.minScore).toBe(12.5);
  });

  test("takes a negative number as a flag value", () => {
    expect(configOf(["-i", "a.faa", "-o", "a", "--min-score", "-5"]).minScore).toBe(-5);
  });

  test("leaves unset thresholds out of the configuration", () => {
    const config = configOf(["-i", "a.faa", "-o", "a"]);

    expect("minScore" in config).toBe(false);
    expect("minModelCoverage" in config).toBe(false);
    expect("minSeqCoverage" in config).toBe(false);
    expect("timeoutMs" in config).toBe(false);
  });

  test("returns help without validating anything else", () => {
    expect(parseCommandLine(["--help"])).toEqual({ help: true });
    expect(parseCommandLine(["-i", "a.faa", "-h"])).toEqual({ help: true });
  });

  test("usage names the defaults", () => {
    expect(USAGE).toContain(`[default: ${DEFAULTS.hmmDb}]`);
    expect(USAGE).toContain(`[default: ${DEFAULTS.cpus}]`);
  });

  describe("errors", () => {
    test("unknown argument", () => {
      expect(() => parseCommandLine(["-i", "a.faa", "--verbose"])).toThrow(
        new ValidationError("Unknown argument: --verbose")
      );
    });

    test("flag without a value", () => {
      expect(() => parseCommandLine(["-o", "a", "-i"])).toThrow("Missing value for -i");
      expect(() => parseCommandLine(["--input=", "-o", "a"])).toThrow("Missing value for --input");
    });

    test("non-numeric threshold", () => {
      expect(() => parseCommandLine(["-i", "a.faa", "-o", "a", "--min-score", "high"])).toThrow(
        "--min-score expects a number, got 'high'"
      );
    });

    test("non-integer cpu count", () => {
      expect(() => parseCommandLine(["-i", "a.faa", "-o", "a", "-n", "2.5"])).toThrow(
        "--nproc expects an integer, got '2.5'"
      );
    });

    test("missing input", () => {
      expect(() => parseCommandLine(["-o", "a"])).toThrow(/^Invalid arguments: /);
    });

    test("coverage threshold above one", () => {
      expect(() => parseCommandLine(["-i", "a.faa", "-o", "a", "--min-seqcov", "1.5"])).toThrow(
        ValidationError
      );
    });

    test("zero cpus", () => {
      expect(() => parseCommandLine(["-i", "a.faa", "-o", "a", "-n", "0"])).toThrow(ValidationError);
    });
  });
});
