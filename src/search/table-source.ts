/**
 * Where the domain table text comes from
 *
 * The pipeline reads the table hmmsearch produced through this service so
 * that a fake table can be injected without touching the filesystem.
 */

import { FileSystem } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import { FileError } from "../errors";

export interface DomainTableSourceShape {
  /**
   * Read the whole table at `path`
   */
  readonly read: (path: string) => Effect.Effect<string, FileError>;
}

export class DomainTableSource extends Context.Tag("@hitscan/DomainTableSource")<
  DomainTableSource,
  DomainTableSourceShape
>() {
  /**
   * Reads tables from disk; a missing or unreadable table is a `FileError`
   */
  static readonly File: Layer.Layer<DomainTableSource, never, FileSystem.FileSystem> = Layer.effect(
    DomainTableSource,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return {
        read: (path: string) =>
          fs
            .readFileString(path)
            .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error))),
      };
    })
  );

  /**
   * Serves the same in-memory text whatever path is asked for
   */
  static fromText(text: string): Layer.Layer<DomainTableSource> {
    return Layer.succeed(DomainTableSource, {
      read: () => Effect.succeed(text),
    });
  }
}
