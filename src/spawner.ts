/**
 * Spawners run actor bodies as independent fibers and report how they ended.
 *
 * A body's own failure and a failure of the fiber hosting it are kept apart:
 * `Completion.await` succeeds with `Either.left(e)` for the former and fails
 * with `ExecutionError` for the latter.
 *
 * @module
 */
import { Cause, Effect, Either, Exit, Fiber, Option, Runtime } from "effect";
import type { Scope } from "effect";

import { ExecutionError } from "./errors.js";

/**
 * Eventual outcome of one spawned body
 */
export interface Completion<A, E> {
  /**
   * Wait for the body. Right = success, Left = the body's own failure.
   */
  readonly await: Effect.Effect<Either.Either<A, E>, ExecutionError>;

  /**
   * Outcome if the body has finished, None otherwise
   */
  readonly poll: Effect.Effect<Option.Option<Either.Either<A, E>>, ExecutionError>;

  /**
   * Abort the body. `await` then fails with reason "interrupted".
   */
  readonly interrupt: Effect.Effect<void>;
}

/**
 * Capability that runs bodies concurrently with the caller.
 * `R` is what the substrate provides to every body it runs.
 */
export interface Spawner<R = never> {
  readonly spawn: <A, E>(body: Effect.Effect<A, E, R>) => Effect.Effect<Completion<A, E>>;
}

/**
 * Map a body's exit onto the completion outcome.
 */
export const settleExit = <A, E>(
  exit: Exit.Exit<A, E>,
): Effect.Effect<Either.Either<A, E>, ExecutionError> =>
  Exit.match(exit, {
    onSuccess: (value) => Effect.succeed(Either.right(value)),
    onFailure: (cause) =>
      Option.match(Cause.failureOption(cause), {
        onSome: (error) => Effect.succeed(Either.left(error)),
        onNone: () =>
          Effect.fail(
            new ExecutionError({
              reason: Cause.isInterruptedOnly(cause) ? "interrupted" : "defect",
              message: Cause.pretty(cause),
            }),
          ),
      }),
  });

/**
 * Completion backed by a running fiber
 */
export const fromFiber = <A, E>(fiber: Fiber.Fiber<A, E>): Completion<A, E> => ({
  await: Fiber.await(fiber).pipe(Effect.flatMap((exit) => settleExit(exit))),
  poll: Fiber.poll(fiber).pipe(
    Effect.flatMap((maybeExit) =>
      Option.match(maybeExit, {
        onNone: () => Effect.succeedNone,
        onSome: (exit) => Effect.asSome(settleExit(exit)),
      }),
    ),
  ),
  interrupt: Effect.asVoid(Fiber.interrupt(fiber)),
});

/**
 * Forks bodies onto the global scope; they outlive the fiber that spawned them.
 */
export const daemonSpawner: Spawner = {
  spawn: (body) => Effect.map(Effect.forkDaemon(body), fromFiber),
};

/**
 * Forks bodies into the given scope. Closing the scope interrupts them.
 */
export const scopedSpawner = (scope: Scope.Scope): Spawner => ({
  spawn: (body) => Effect.map(Effect.forkIn(body, scope), fromFiber),
});

/**
 * Runs bodies on the given runtime, which also provides their services.
 */
export const runtimeSpawner = <R>(runtime: Runtime.Runtime<R>): Spawner<R> => ({
  spawn: (body) => Effect.sync(() => fromFiber(Runtime.runFork(runtime)(body))),
});
