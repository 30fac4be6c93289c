/**
 * Actor launch: binds a mailbox, a spawner and an actor body.
 *
 * There is no registry and no supervision. Each launch is independent and its
 * failure never reaches another actor.
 */
import { Effect, Option } from "effect";

import type { ActorContext } from "./context.js";
import { makeContext } from "./context.js";
import { Inspector as InspectorTag } from "./inspection.js";
import { emitWithTimestamp, exitOutcome } from "./internal/inspection.js";
import type { Mailbox } from "./mailbox.js";
import type { Spawner } from "./spawner.js";

export interface LaunchOptions {
  /**
   * Mailbox id used in logs, spans and inspection events
   */
  readonly name?: string;
}

/**
 * Create a mailbox, hand its context to `body`, and spawn the result.
 *
 * Returns the actor's address and the completion of its body. The receiver is
 * closed when the body exits, after which tells are dropped silently.
 *
 * @example
 * ```ts
 * const [ref, done] = yield* launch(unboundedMailbox, daemonSpawner, (ctx: ActorContext<number>) =>
 *   Effect.gen(function* () {
 *     const n = yield* ctx.receive;
 *     return n * 2;
 *   }),
 * );
 * yield* ref.tell(21);
 * const result = yield* done.await; // Either.right(42)
 * ```
 */
export const launch = Effect.fn("effect-mailbox.actor.launch")(function* <M, A, E, R>(
  mailbox: Mailbox,
  spawner: Spawner<R>,
  body: (ctx: ActorContext<M>) => Effect.Effect<A, E, R>,
  options?: LaunchOptions,
) {
  const inspector = Option.getOrUndefined(yield* Effect.serviceOption(InspectorTag));

  const [ref, receiver] = yield* mailbox.make<M>(
    options?.name === undefined ? undefined : { id: options.name },
  );
  const actorId = receiver.mailboxId;
  yield* Effect.annotateCurrentSpan("effect_mailbox.actor.id", actorId);

  const ctx = makeContext(receiver, inspector);
  const hosted = body(ctx).pipe(
    Effect.onExit((exit) =>
      Effect.gen(function* () {
        const outcome = exitOutcome(exit);
        yield* emitWithTimestamp(inspector, (timestamp) => ({
          type: "@actor.exit",
          actorId,
          outcome,
          timestamp,
        }));
        if (outcome === "success" || outcome === "failure") {
          yield* Effect.logDebug(`actor body exited: ${outcome}`);
        } else {
          yield* Effect.logWarning(`actor body did not complete: ${outcome}`);
        }
      }),
    ),
    Effect.ensuring(receiver.close),
    Effect.annotateLogs("actor.id", actorId),
    Effect.withSpan("effect-mailbox.actor.body", {
      attributes: { "effect_mailbox.actor.id": actorId },
    }),
  );

  yield* emitWithTimestamp(inspector, (timestamp) => ({
    type: "@actor.launch",
    actorId,
    timestamp,
  }));

  const completion = yield* spawner.spawn(hosted);
  yield* Effect.logDebug("actor launched").pipe(Effect.annotateLogs("actor.id", actorId));

  return [ref, completion] as const;
});
