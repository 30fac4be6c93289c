import { Effect, Option, Stream } from "effect";

import type { NoSender } from "./errors.js";
import type { Inspector } from "./inspection.js";
import { emitWithTimestamp } from "./internal/inspection.js";
import type { Receiver } from "./mailbox.js";

/**
 * Handle given to a running actor body. Wraps the actor's private receiver.
 */
export interface ActorContext<M> {
  readonly actorId: string;

  /**
   * Wait for the next message
   */
  readonly receive: Effect.Effect<M, NoSender>;

  /**
   * Mailbox contents as a stream, ending when the mailbox reports NoSender
   */
  readonly messages: Stream.Stream<M>;
}

/** @internal */
export const makeContext = <M>(
  receiver: Receiver<M>,
  inspector: Inspector | undefined,
): ActorContext<M> => {
  const actorId = receiver.mailboxId;
  let closedReported = false;

  const receive = receiver.receive.pipe(
    Effect.tap((message) =>
      emitWithTimestamp(inspector, (timestamp) => ({
        type: "@actor.receive",
        actorId,
        message,
        timestamp,
      })),
    ),
    Effect.tapError(() => {
      if (closedReported) {
        return Effect.void;
      }
      closedReported = true;
      return emitWithTimestamp(inspector, (timestamp) => ({
        type: "@actor.closed",
        actorId,
        timestamp,
      }));
    }),
  );

  const messages = Stream.repeatEffectOption(
    receive.pipe(Effect.catchTag("NoSender", () => Effect.fail(Option.none()))),
  );

  return { actorId, receive, messages };
};
