// @effect-diagnostics strictEffectProvide:off - tests are entry points
import { Context, Effect, Either, Exit, Option, Scope } from "effect";

import { daemonSpawner, runtimeSpawner, scopedSpawner } from "../src/index.js";
import { describe, expect, it, yieldFibers } from "./utils/effect-test.js";

class Greeting extends Context.Tag("test/Greeting")<Greeting, string>() {}

describe("Spawner", () => {
  describe("daemonSpawner", () => {
    it.live("completes with the body's value", () =>
      Effect.gen(function* () {
        const completion = yield* daemonSpawner.spawn(Effect.succeed(42));
        const result = yield* completion.await;
        expect(Either.getOrThrow(result)).toBe(42);
      }),
    );

    it.live("passes the body's failure through as Left", () =>
      Effect.gen(function* () {
        const completion = yield* daemonSpawner.spawn(Effect.fail("boom"));
        const result = yield* completion.await;
        expect(Either.getOrThrow(Either.flip(result))).toBe("boom");
      }),
    );

    it.live("reports a defect as an execution failure", () =>
      Effect.gen(function* () {
        const completion = yield* daemonSpawner.spawn(Effect.dieMessage("kaput"));
        const error = yield* Effect.flip(completion.await);
        expect(error._tag).toBe("ExecutionError");
        expect(error.reason).toBe("defect");
        expect(error.message).toContain("kaput");
      }),
    );

    it.live("reports interruption as an execution failure", () =>
      Effect.gen(function* () {
        const completion = yield* daemonSpawner.spawn(Effect.never);
        yield* yieldFibers;
        expect(Option.isNone(yield* completion.poll)).toBe(true);

        yield* completion.interrupt;
        const error = yield* Effect.flip(completion.await);
        expect(error.reason).toBe("interrupted");
      }),
    );

    it.live("poll returns the outcome once finished", () =>
      Effect.gen(function* () {
        const completion = yield* daemonSpawner.spawn(Effect.succeed("done"));
        yield* completion.await;

        const polled = yield* completion.poll;
        expect(Either.getOrThrow(Option.getOrThrow(polled))).toBe("done");
      }),
    );
  });

  describe("scopedSpawner", () => {
    it.live("interrupts bodies when the scope closes", () =>
      Effect.gen(function* () {
        const scope = yield* Scope.make();
        const completion = yield* scopedSpawner(scope).spawn(Effect.never);
        yield* yieldFibers;

        yield* Scope.close(scope, Exit.void);
        const error = yield* Effect.flip(completion.await);
        expect(error.reason).toBe("interrupted");
      }),
    );

    it.scopedLive("lets bodies finish inside an open scope", () =>
      Effect.gen(function* () {
        const scope = yield* Effect.scope;
        const completion = yield* scopedSpawner(scope).spawn(Effect.succeed(7));
        const result = yield* completion.await;
        expect(Either.getOrThrow(result)).toBe(7);
      }),
    );
  });

  describe("runtimeSpawner", () => {
    it.live("provides the runtime's services to the body", () =>
      Effect.gen(function* () {
        const runtime = yield* Effect.runtime<Greeting>().pipe(
          Effect.provideService(Greeting, "hi"),
        );
        const completion = yield* runtimeSpawner(runtime).spawn(
          Effect.map(Greeting, (greeting) => `${greeting} there`),
        );
        const result = yield* completion.await;
        expect(Either.getOrThrow(result)).toBe("hi there");
      }),
    );
  });
});
