// @effect-diagnostics strictEffectProvide:off anyUnknownInErrorContext:off missingEffectContext:off
import type { Scope } from "effect";
import { Effect } from "effect";
import { describe as vitestDescribe, expect, test as vitestTest } from "vitest";

export { yieldFibers } from "../../src/testing.js";

export const it = {
  /** Run effect with real clock */
  live: <E>(name: string, fn: () => Effect.Effect<void, E, never>, timeout?: number) =>
    vitestTest(name, () => Effect.runPromise(fn()), timeout),

  /** Run scoped effect with real clock */
  scopedLive: <E>(name: string, fn: () => Effect.Effect<void, E, Scope.Scope>, timeout?: number) =>
    vitestTest(name, () => Effect.runPromise(fn().pipe(Effect.scoped)), timeout),
};

export const describe = vitestDescribe;
export { expect };
