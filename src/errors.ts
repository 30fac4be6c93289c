/**
 * Typed error classes for effect-mailbox.
 *
 * All errors extend Schema.TaggedError for:
 * - Type-safe catching via Effect.catchTag
 * - Serialization support
 *
 * @module
 */
import { Schema } from "effect";

/** Mailbox is drained and every ActorRef to it has been dropped */
export class NoSender extends Schema.TaggedError<NoSender>()("NoSender", {
  mailboxId: Schema.String,
}) {}

/** The fiber hosting an actor body did not run to completion */
export class ExecutionError extends Schema.TaggedError<ExecutionError>()("ExecutionError", {
  reason: Schema.Literal("interrupted", "defect"),
  message: Schema.String,
}) {}
