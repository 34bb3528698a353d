/**
 * File writing operations using Effect Platform
 *
 * Effect complexity is hidden behind Promise-based APIs. Reports are
 * written through a scoped handle so the file is closed however the
 * writing callback ends.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { WriteOptions } from "../types";
import { getPlatform, runPromise } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 */
export interface FileWriteHandle {
  /**
   * Append string content at the current position
   */
  writeString(content: string): Promise<void>;
}

/**
 * Temporary path used by atomic writes
 */
export function temporaryPathFor(path: string): string {
  return `${path}.tmp`;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is created or truncated, and closed when the callback settles.
 * With `atomic: true` the data goes to `<path>.tmp`, which is renamed over
 * `path` only after the callback resolves; on failure `path` is untouched
 * and the temporary file is removed.
 *
 * @param path - Destination file
 * @param callback - Receives the handle; its result is returned
 * @param options - Write options
 * @throws {FileError} When the file cannot be opened, written or renamed
 *
 * @example
 * ```typescript
 * await openForWriting("hits.csv", async (handle) => {
 *   await handle.writeString("target,query\n");
 *   await handle.writeString("seq1,PF00001\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  const atomic = options.atomic ?? false;
  const targetPath = atomic ? temporaryPathFor(path) : path;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(targetPath, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", targetPath, error)));

    const encoder = new TextEncoder();
    const handle: FileWriteHandle = {
      writeString: (content: string): Promise<void> =>
        runPromise(
          file
            .writeAll(encoder.encode(content))
            .pipe(Effect.mapError((error) => FileError.fromSystemError("write", targetPath, error)))
        ),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error): unknown => error,
    });
  });

  const written = program.pipe(Effect.scoped);

  const finished = atomic
    ? Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        return yield* written.pipe(
          Effect.tap(() =>
            fs
              .rename(targetPath, path)
              .pipe(Effect.mapError((error) => FileError.fromSystemError("rename", path, error)))
          ),
          // The temporary file is absent when open failed; the original error is kept either way
          Effect.tapError(() => Effect.ignore(fs.remove(targetPath)))
        );
      })
    : written;

  return runPromise(finished.pipe(Effect.provide(getPlatform())));
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await openForWriting(path, (handle) => handle.writeString(content), options);
}
