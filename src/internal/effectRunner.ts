import type { Effect, Exit } from "effect";
import type { EffectRuntime } from "./runtimeContext";

export interface EffectRunHandle<A, E> {
  readonly promise: Promise<Exit.Exit<A, E>>;
  readonly signal: AbortSignal;
  readonly cancel: () => void;
}

export const runEffect = <A, E>(
  runtime: EffectRuntime,
  effect: Effect.Effect<A, E, never>,
): EffectRunHandle<A, E> => {
  const controller = new AbortController();
  let canceled = false;
  const promise = runtime.runPromiseExit(effect, {
    signal: controller.signal,
  });
  return {
    promise,
    signal: controller.signal,
    cancel: () => {
      if (canceled) {
        return;
      }
      canceled = true;
      controller.abort();
    },
  };
};
