import { Effect } from "effect";
import type { Scope } from "effect";

/**
 * Address of an actor's mailbox.
 *
 * Every handle holds one reference on the mailbox. The mailbox closes once the
 * last handle is dropped; messages already queued are still delivered.
 */
export interface ActorRef<M> {
  /**
   * Identifier of the mailbox this handle points at
   */
  readonly id: string;

  /**
   * Enqueue a message. Dropped silently when this handle was dropped or the
   * receiving actor is gone.
   */
  readonly tell: (message: M) => Effect.Effect<void>;

  /**
   * Enqueue a message (sync)
   */
  readonly tellSync: (message: M) => void;

  /**
   * Another handle on the same mailbox (Effect)
   */
  readonly clone: Effect.Effect<ActorRef<M>>;

  /**
   * Another handle on the same mailbox (sync)
   */
  readonly cloneSync: () => ActorRef<M>;

  /**
   * Release this handle. Only the first call counts.
   */
  readonly drop: Effect.Effect<void>;

  /**
   * Release this handle (sync)
   */
  readonly dropSync: () => void;
}

/**
 * Clone a ref for the lifetime of the current scope.
 *
 * @example
 * ```ts
 * Effect.scoped(
 *   Effect.gen(function* () {
 *     const worker = yield* cloneScoped(ref);
 *     yield* worker.tell("job");
 *   }),
 * );
 * ```
 */
export const cloneScoped = <M>(ref: ActorRef<M>): Effect.Effect<ActorRef<M>, never, Scope.Scope> =>
  Effect.acquireRelease(ref.clone, (clone) => clone.drop);
