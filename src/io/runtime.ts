/**
 * Effect platform layer and promise bridge
 *
 * All file and process access goes through `@effect/platform` services;
 * this module supplies the Node implementation and runs programs so that
 * their typed failures reach callers as the error objects themselves.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Layer providing FileSystem, Path and CommandExecutor for Node.js
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided Effect, rejecting with its typed failure
 *
 * `Effect.runPromise` wraps failures in a FiberFailure; callers of the
 * promise API expect `FileError`, `SearchToolError` and friends instead.
 *
 * @example
 * ```typescript
 * const text = await runPromise(readProgram.pipe(Effect.provide(getPlatform())));
 * ```
 */
export async function runPromise<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
