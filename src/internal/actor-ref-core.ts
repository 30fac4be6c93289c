/**
 * Shared mailbox state and ActorRef construction.
 * @internal
 */
import { Effect, Option, Queue } from "effect";

import type { ActorRef } from "../actor-ref.js";

/**
 * State shared by every handle on one mailbox.
 * `None` in the queue marks that the last handle was dropped.
 */
export interface MailboxCore<M> {
  readonly id: string;
  readonly queue: Queue.Queue<Option.Option<M>>;
  refs: number;
}

export const makeMailboxCore = <M>(
  id: string,
  queue: Queue.Queue<Option.Option<M>>,
): MailboxCore<M> => ({ id, queue, refs: 0 });

/**
 * Build one handle. A live handle takes a reference; a dead one (cloned from a
 * dropped handle) never touches the count.
 */
export const buildActorRef = <M>(core: MailboxCore<M>, live = true): ActorRef<M> => {
  let dropped = !live;
  if (live) {
    core.refs += 1;
  }

  const tellSync = (message: M): void => {
    if (dropped) {
      return;
    }
    // false once the receiver has shut the queue down
    Queue.unsafeOffer(core.queue, Option.some(message));
  };

  /** Returns true when this call closed the mailbox */
  const release = (): boolean => {
    if (dropped) {
      return false;
    }
    dropped = true;
    core.refs -= 1;
    if (core.refs > 0) {
      return false;
    }
    Queue.unsafeOffer(core.queue, Option.none());
    return true;
  };

  const cloneSync = (): ActorRef<M> => buildActorRef(core, !dropped);

  const drop = Effect.suspend(() =>
    release()
      ? Effect.logDebug("last ActorRef dropped, mailbox closing").pipe(
          Effect.annotateLogs("mailbox.id", core.id),
        )
      : Effect.void,
  ).pipe(Effect.withSpan("effect-mailbox.ref.drop"));

  return {
    id: core.id,
    tell: (message) => Effect.sync(() => tellSync(message)),
    tellSync,
    clone: Effect.sync(cloneSync),
    cloneSync,
    drop,
    dropSync: () => {
      release();
    },
  };
};
