/**
 * hmmsearch invocation as an Effect service
 *
 * The search is a single blocking external process. Its outcome is a
 * value: the path of the domain table on success, `SearchToolError` on
 * failure. Callers never see a thrown exception from this boundary, and
 * tests replace the whole service with `Layer.succeed`.
 *
 * @module search/hmmsearch
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Context, Duration, Effect, Layer, Stream } from "effect";
import { SearchToolError } from "../errors";

export const HMMSEARCH = "hmmsearch";

/**
 * Everything needed for one hmmsearch run
 */
export interface SearchRequest {
  /** Protein FASTA to search */
  readonly input: string;
  /** Profile HMM database */
  readonly hmmDb: string;
  /** Where hmmsearch writes `--domtblout` */
  readonly tablePath: string;
  /** Reporting E-value threshold (`-E`) */
  readonly evalue: number;
  /** Worker threads (`--cpu`) */
  readonly cpus: number;
  /** Kill the search after this many milliseconds */
  readonly timeoutMs?: number;
}

/**
 * Shape of the search tool service
 */
export interface SearchToolShape {
  /**
   * Run a search and yield the path of the table it wrote
   */
  readonly search: (request: SearchRequest) => Effect.Effect<string, SearchToolError>;
}

/**
 * Command-line arguments for a request, in hmmsearch's expected order
 *
 * @example
 * ```typescript
 * buildSearchArgs({ input: "orfs.faa", hmmDb: "db.hmm", tablePath: "out.domtblout", evalue: 1e-5, cpus: 4 });
 * // ["--domtblout", "out.domtblout", "-E", "0.00001", "--cpu", "4", "db.hmm", "orfs.faa"]
 * ```
 */
export function buildSearchArgs(request: SearchRequest): string[] {
  return [
    "--domtblout",
    request.tablePath,
    "-E",
    String(request.evalue),
    "--cpu",
    String(request.cpus),
    request.hmmDb,
    request.input,
  ];
}

/**
 * Spawn hmmsearch, discard its stdout and keep stderr for diagnostics
 */
function runSearch(
  request: SearchRequest
): Effect.Effect<string, SearchToolError, CommandExecutor.CommandExecutor> {
  const command = Command.make(HMMSEARCH, ...buildSearchArgs(request));

  const finished = Effect.scoped(
    Effect.gen(function* () {
      const child = yield* Command.start(command);
      const [exitCode, , stderr] = yield* Effect.all(
        [
          child.exitCode,
          Stream.runDrain(child.stdout),
          child.stderr.pipe(
            Stream.decodeText(),
            Stream.runFold("", (text: string, chunk: string) => text + chunk)
          ),
        ],
        { concurrency: "unbounded" }
      );
      return { exitCode: Number(exitCode), stderr };
    })
  ).pipe(
    Effect.mapError(
      (error) =>
        new SearchToolError(
          `${HMMSEARCH} failed. Is HMMER installed and in your PATH? (${error.message})`,
          HMMSEARCH,
          "spawn"
        )
    )
  );

  const checked = Effect.flatMap(finished, ({ exitCode, stderr }) =>
    exitCode === 0
      ? Effect.succeed(request.tablePath)
      : Effect.fail(
          new SearchToolError(
            `${HMMSEARCH} failed with exit code ${exitCode}`,
            HMMSEARCH,
            "exit",
            exitCode,
            stderr.trim()
          )
        )
  );

  const { timeoutMs } = request;
  if (timeoutMs === undefined) {
    return checked;
  }

  return checked.pipe(
    Effect.timeoutFail({
      duration: Duration.millis(timeoutMs),
      onTimeout: () =>
        new SearchToolError(`${HMMSEARCH} timed out after ${timeoutMs}ms`, HMMSEARCH, "timeout"),
    })
  );
}

/**
 * Search tool service for Effect-based dependency injection
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const tool = yield* SearchTool;
 *   return yield* tool.search(request);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(SearchTool.Live), Effect.provide(NodeContext.layer))
 * );
 * ```
 */
export class SearchTool extends Context.Tag("@hitscan/SearchTool")<SearchTool, SearchToolShape>() {
  /**
   * Runs the real hmmsearch binary found on PATH
   */
  static readonly Live: Layer.Layer<SearchTool, never, CommandExecutor.CommandExecutor> =
    Layer.effect(
      SearchTool,
      Effect.gen(function* () {
        const executor = yield* CommandExecutor.CommandExecutor;
        return {
          search: (request: SearchRequest) =>
            runSearch(request).pipe(
              Effect.provideService(CommandExecutor.CommandExecutor, executor)
            ),
        };
      })
    );
}
