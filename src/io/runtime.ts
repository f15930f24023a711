/**
 * Effect platform layer selection
 *
 * File access goes through the `FileSystem` service from @effect/platform;
 * this module supplies the Node.js implementation of it and the helper
 * that runs a platform program as a promise.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a program against the platform layer
 *
 * Failures reject with the program's own error rather than a fiber
 * failure wrapper, so callers can match on error classes.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
