/**
 * File reading utilities built on Effect Platform
 *
 * Provides existence checks, whole-file reads and line streaming for the
 * domain table and annotation files. Effect stays internal; every export
 * is Promise-based and fails with `FileError`.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { getPlatform, runPromise } from "./runtime";

const DEFAULT_BUFFER_SIZE = 65536;

/**
 * Check if a regular file exists at `path`
 *
 * @returns true only for files; directories and missing paths give false
 * @throws {FileError} If the path cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const found = yield* fs.exists(path);
    if (!found) return false;

    const info = yield* fs.stat(path);
    return info.type === "File";
  });

  return runPromise(
    program.pipe(
      Effect.mapError((error) => FileError.fromSystemError("stat", path, error)),
      Effect.provide(getPlatform())
    )
  );
}

/**
 * Check whether anything (file, directory, link target) exists at `path`
 *
 * @throws {FileError} If the path cannot be inspected
 */
export async function pathExists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path);
  });

  return runPromise(
    program.pipe(
      Effect.mapError((error) => FileError.fromSystemError("stat", path, error)),
      Effect.provide(getPlatform())
    )
  );
}

/**
 * Read entire file to string
 *
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  });

  return runPromise(
    program.pipe(
      Effect.mapError((error) => FileError.fromSystemError("read", path, error)),
      Effect.provide(getPlatform())
    )
  );
}

/**
 * Create a byte stream over a file
 *
 * The file is opened lazily, so open failures show up on the first read.
 */
export async function createStream(
  path: string,
  bufferSize = DEFAULT_BUFFER_SIZE
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.toReadableStream(fs.stream(path, { bufferSize }));
  });

  return runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Read a text file line by line
 *
 * Lines are yielded without their terminator; `\r\n` and `\n` are both
 * accepted. A final line without a terminator is still yielded.
 *
 * @throws {FileError} If the file is missing or a read fails mid-stream
 *
 * @example
 * ```typescript
 * for await (const line of readLines("results.domtblout")) {
 *   if (!line.startsWith("#")) console.log(line);
 * }
 * ```
 */
export async function* readLines(path: string): AsyncIterable<string> {
  if (!(await exists(path))) {
    throw new FileError(`File does not exist or is not a regular file: ${path}`, path, "read");
  }

  const stream = await createStream(path);
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let settled = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw FileError.fromSystemError("read", path, error);
      });

      if (chunk.done) {
        settled = true;
        buffer += decoder.decode();
        if (buffer !== "") {
          yield buffer;
        }
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        yield line;
      }
    }
  } finally {
    // Consumer stopped early: close the underlying file now
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

export const FileReader = {
  exists,
  pathExists,
  readToString,
  createStream,
  readLines,
} as const;
