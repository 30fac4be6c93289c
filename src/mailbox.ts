/**
 * Mailboxes: the write end (ActorRef) and read end (Receiver) of an actor's
 * message queue, and the factory that builds them as a pair.
 *
 * @module
 */
import { Effect, Option, Queue } from "effect";

import type { ActorRef } from "./actor-ref.js";
import { NoSender } from "./errors.js";
import { buildActorRef, makeMailboxCore } from "./internal/actor-ref-core.js";
import type { MailboxCore } from "./internal/actor-ref-core.js";

/**
 * Read end of one mailbox. Owned by a single actor context.
 */
export interface Receiver<M> {
  readonly mailboxId: string;

  /**
   * Next message in FIFO order. Fails with NoSender once the queue is drained
   * and every ActorRef has been dropped, and on every call after that.
   * Only one receive may be pending at a time.
   */
  readonly receive: Effect.Effect<M, NoSender>;

  /**
   * Stop accepting messages. Later tells are dropped without a signal to the
   * sender; later receives fail with NoSender.
   */
  readonly close: Effect.Effect<void>;
}

export interface MailboxOptions {
  readonly id?: string;
}

/**
 * Mailbox factory - the only way to construct mailboxes
 */
export interface Mailbox {
  readonly make: <M>(
    options?: MailboxOptions,
  ) => Effect.Effect<readonly [ActorRef<M>, Receiver<M>]>;
}

let mailboxCounter = 0;

const nextMailboxId = (): string => {
  mailboxCounter += 1;
  return `mailbox-${mailboxCounter}`;
};

const makeReceiver = <M>(core: MailboxCore<M>): Receiver<M> => {
  let closed = false;
  let pending = false;

  const take = Queue.take(core.queue).pipe(
    Effect.flatMap((entry) =>
      Option.match(entry, {
        onNone: () => {
          closed = true;
          return Effect.fail(new NoSender({ mailboxId: core.id }));
        },
        onSome: (message) => Effect.succeed(message),
      }),
    ),
  );

  const receive = Effect.suspend(() => {
    if (closed) {
      return Effect.fail(new NoSender({ mailboxId: core.id }));
    }
    return Effect.acquireUseRelease(
      // true when this call became the reader
      Effect.sync(() => {
        if (pending) {
          return false;
        }
        pending = true;
        return true;
      }),
      (reader) => (reader ? take : Effect.dieMessage(`Concurrent receive on mailbox ${core.id}`)),
      (reader) =>
        reader
          ? Effect.sync(() => {
              pending = false;
            })
          : Effect.void,
    );
  });

  const close = Effect.suspend(() => {
    closed = true;
    return Queue.shutdown(core.queue);
  }).pipe(Effect.withSpan("effect-mailbox.receiver.close"));

  return { mailboxId: core.id, receive, close };
};

/**
 * Mailbox backed by an unbounded Effect Queue. `tell` never blocks.
 */
export const unboundedMailbox: Mailbox = {
  make: <M>(options?: MailboxOptions) =>
    Effect.gen(function* () {
      const queue = yield* Queue.unbounded<Option.Option<M>>();
      const core = makeMailboxCore<M>(options?.id ?? nextMailboxId(), queue);
      const ref = buildActorRef(core);
      const receiver = makeReceiver(core);
      return [ref, receiver] as const;
    }).pipe(Effect.withSpan("effect-mailbox.mailbox.make")),
};
