/**
 * Run configuration from command-line arguments
 *
 * Values are read into a raw record, converted, then validated in one place
 * by an arktype schema.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";
import { parseFloatStrict, parseInteger } from "./formats/domtbl/parser";
import type { PipelineConfig } from "./pipeline";

export const DEFAULTS = {
  hmmDb: "data/PzDE-HMM.hmm",
  evalue: 1e-5,
  cpus: 4,
  koMap: "data/hmm_label-KO.txt",
  symbolMap: "data/hmm_label-symbol.txt",
} as const;

export const USAGE = `Usage: hitscan -i <input.faa> -o <output_prefix> [options]

Detect gene hits in a protein FASTA with hmmsearch, filter them by score
and coverage, and annotate them with KO codes and gene symbols.

  -i,  --input <path>        Input protein FASTA file (required)
  -o,  --output <prefix>     Output prefix (required)
  -db, --hmm-db <path>       HMM database [default: ${DEFAULTS.hmmDb}]
       --evalue <float>      E-value threshold [default: 1e-5]
       --min-score <float>   Minimum bit score
       --min-modelcov <f>    Minimum model coverage (0-1)
       --min-seqcov <f>      Minimum sequence coverage (0-1)
  -n,  --nproc <int>         Number of CPUs [default: ${DEFAULTS.cpus}]
       --ko-map <path>       KO mapping file [default: ${DEFAULTS.koMap}]
       --symbol-map <path>   Gene symbol mapping file [default: ${DEFAULTS.symbolMap}]
       --timeout-ms <int>    Abort hmmsearch after this many milliseconds
       --atomic              Write the report through a temporary file
  -h,  --help                Show this help
`;

const VALUE_FLAGS: Readonly<Record<string, string>> = {
  "-i": "input",
  "--input": "input",
  "-o": "output",
  "--output": "output",
  "-db": "hmm-db",
  "--hmm-db": "hmm-db",
  "--evalue": "evalue",
  "--min-score": "min-score",
  "--min-modelcov": "min-modelcov",
  "--min-seqcov": "min-seqcov",
  "-n": "nproc",
  "--nproc": "nproc",
  "--ko-map": "ko-map",
  "--symbol-map": "symbol-map",
  "--timeout-ms": "timeout-ms",
};

const SWITCH_FLAGS: Readonly<Record<string, string>> = {
  "--atomic": "atomic",
  "-h": "help",
  "--help": "help",
};

const RunConfigSchema = type({
  input: "string>0",
  outputPrefix: "string>0",
  hmmDb: "string>0",
  evalue: "number>0",
  cpus: "number>=1",
  "minScore?": "number",
  "minModelCoverage?": "0<=number<=1",
  "minSeqCoverage?": "0<=number<=1",
  koMap: "string",
  symbolMap: "string",
  "timeoutMs?": "number>0",
  atomic: "boolean",
});

type CliRaw = Record<string, string | true>;

export type CommandLine = { readonly help: true } | { readonly help: false; readonly config: PipelineConfig };

/**
 * Split argv into flag values; accepts `--flag value` and `--flag=value`
 *
 * @throws {ValidationError} On unknown flags or a flag missing its value
 */
function parseCliArgs(argv: readonly string[]): CliRaw {
  const out: CliRaw = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    const eq = token.startsWith("--") ? token.indexOf("=") : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);

    const switchKey = SWITCH_FLAGS[flag];
    if (switchKey !== undefined && eq === -1) {
      out[switchKey] = true;
      continue;
    }

    const key = VALUE_FLAGS[flag];
    if (key === undefined) {
      throw new ValidationError(`Unknown argument: ${token}`);
    }

    const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
    if (value === undefined || value === "") {
      throw new ValidationError(`Missing value for ${flag}`);
    }
    out[key] = value;
  }

  return out;
}

function readString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function readFloat(args: CliRaw, key: string): number | undefined {
  const raw = readString(args, key);
  if (raw === undefined) return undefined;

  const value = parseFloatStrict(raw);
  if (value === undefined || Number.isNaN(value)) {
    throw new ValidationError(`--${key} expects a number, got '${raw}'`);
  }
  return value;
}

function readInt(args: CliRaw, key: string): number | undefined {
  const raw = readString(args, key);
  if (raw === undefined) return undefined;

  const value = parseInteger(raw);
  if (value === undefined) {
    throw new ValidationError(`--${key} expects an integer, got '${raw}'`);
  }
  return value;
}

/**
 * Turn argv (without the node and script entries) into a run configuration
 *
 * @throws {ValidationError} For unknown flags, missing required flags or
 * out-of-range values
 *
 * @example
 * ```typescript
 * const commandLine = parseCommandLine(["-i", "orfs.faa", "-o", "out", "--min-score", "50"]);
 * if (!commandLine.help) await runPipeline(commandLine.config);
 * ```
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const args = parseCliArgs(argv);
  if (args["help"] === true) {
    return { help: true };
  }

  const minScore = readFloat(args, "min-score");
  const minModelCoverage = readFloat(args, "min-modelcov");
  const minSeqCoverage = readFloat(args, "min-seqcov");
  const timeoutMs = readInt(args, "timeout-ms");

  const validation = RunConfigSchema({
    input: readString(args, "input") ?? "",
    outputPrefix: readString(args, "output") ?? "",
    hmmDb: readString(args, "hmm-db") ?? DEFAULTS.hmmDb,
    evalue: readFloat(args, "evalue") ?? DEFAULTS.evalue,
    cpus: readInt(args, "nproc") ?? DEFAULTS.cpus,
    ...(minScore !== undefined && { minScore }),
    ...(minModelCoverage !== undefined && { minModelCoverage }),
    ...(minSeqCoverage !== undefined && { minSeqCoverage }),
    koMap: readString(args, "ko-map") ?? DEFAULTS.koMap,
    symbolMap: readString(args, "symbol-map") ?? DEFAULTS.symbolMap,
    ...(timeoutMs !== undefined && { timeoutMs }),
    atomic: args["atomic"] === true,
  });

  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid arguments: ${validation.summary}`);
  }

  return { help: false, config: validation };
}
