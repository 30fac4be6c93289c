/**
 * Helpers for exercising actor bodies in tests.
 *
 * @module
 */
import { Deferred, Effect } from "effect";

import { launch } from "./actor.js";
import type { ActorContext } from "./context.js";
import type { Mailbox } from "./mailbox.js";
import type { Spawner } from "./spawner.js";
import { fromFiber } from "./spawner.js";

/**
 * Yield to allow forked fibers to process.
 */
export const yieldFibers = Effect.yieldNow().pipe(Effect.repeatN(9));

/**
 * Spawner that forks each body onto a parked daemon fiber and releases it on
 * the first `await` of its completion. Lets a test queue messages and drop
 * refs before the body starts.
 *
 * Unlike the other spawners this does not start bodies by itself: an actor
 * launched with it does nothing until someone awaits its completion.
 * Concurrent awaits share the one fiber; `interrupt` stops the body whether or
 * not it has started.
 */
export const lazySpawner: Spawner = {
  spawn: <A, E>(body: Effect.Effect<A, E>) =>
    Effect.gen(function* () {
      const start = yield* Deferred.make<void>();
      const fiber = yield* Effect.forkDaemon(Effect.zipRight(Deferred.await(start), body));
      const completion = fromFiber(fiber);
      return {
        ...completion,
        await: Effect.zipRight(Deferred.succeed(start, undefined), completion.await),
      };
    }),
};

/**
 * Launch an actor that collects `count` messages and completes with them.
 */
export const collector = <M>(mailbox: Mailbox, spawner: Spawner, count: number) =>
  launch(mailbox, spawner, (ctx: ActorContext<M>) =>
    Effect.gen(function* () {
      const received: M[] = [];
      while (received.length < count) {
        received.push(yield* ctx.receive);
      }
      return received;
    }),
  );
