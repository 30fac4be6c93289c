/**
 * @internal
 */
import { Cause, Clock, Effect, Exit, Option } from "effect";

import type { ExitOutcome, InspectionEvent, Inspector } from "../inspection.js";

/**
 * Emit an inspection event stamped with the current clock.
 * No-op without an inspector; a throwing inspector is logged and ignored.
 */
export const emitWithTimestamp = (
  inspector: Inspector | undefined,
  build: (timestamp: number) => InspectionEvent,
): Effect.Effect<void> => {
  if (inspector === undefined) {
    return Effect.void;
  }
  const { onInspect } = inspector;
  return Clock.currentTimeMillis.pipe(
    Effect.flatMap((timestamp) => Effect.try(() => onInspect(build(timestamp)))),
    Effect.catchAll((e) => Effect.logWarning("Inspector failed", e)),
  );
};

export const exitOutcome = <A, E>(exit: Exit.Exit<A, E>): ExitOutcome => {
  if (Exit.isSuccess(exit)) {
    return "success";
  }
  if (Option.isSome(Cause.failureOption(exit.cause))) {
    return "failure";
  }
  return Cause.isInterruptedOnly(exit.cause) ? "interrupted" : "defect";
};
