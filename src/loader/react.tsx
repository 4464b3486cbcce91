import { type Cause, Effect, Exit, type Option, Stream } from "effect";
import { useCallback, useEffect, useMemo, useState, useSyncExternalStore } from "react";
import { runEffect } from "../internal/effectRunner";
import { createExternalStore } from "../internal/externalStore";
import { useRuntimeContext } from "../internal/runtimeContext";
import { isEmptyRange, type IndexRange } from "../sparse";
import type { WindowLoader, WindowLoaderError, WindowSnapshot } from "./types";

export interface UseSparseWindowOptions<T, E> {
  readonly loader: WindowLoader<T, E>;
  readonly view: IndexRange;
}

export interface UseSparseWindowResult<T, E> {
  readonly snapshot: WindowSnapshot;
  /** One entry per index of the view; `none` where data has not arrived yet. */
  readonly rows: readonly Option.Option<T>[];
  /** Cause of the last failed fill for the current view. */
  readonly cause: Cause.Cause<WindowLoaderError<E>> | undefined;
}

export const useSparseWindow = <T, E>(
  options: UseSparseWindowOptions<T, E>,
): UseSparseWindowResult<T, E> => {
  const runtime = useRuntimeContext();
  const { loader } = options;
  const { start, end } = options.view;

  const store = useMemo(
    () =>
      createExternalStore<WindowSnapshot>(
        Effect.runSync(loader.snapshot),
        (left, right) => left.revision === right.revision,
      ),
    [loader],
  );
  const getSnapshot = useCallback(() => store.getSnapshot(), [store]);
  const subscribe = useCallback((listener: () => void) => store.subscribe(listener), [store]);
  const snapshot = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
  const [cause, setCause] = useState<Cause.Cause<WindowLoaderError<E>> | undefined>(undefined);

  useEffect(() => {
    const handle = runEffect(
      runtime,
      Stream.runForEach(loader.snapshots, (next) =>
        Effect.sync(() => {
          store.setSnapshot(next);
        }),
      ),
    );
    return () => {
      handle.cancel();
    };
  }, [loader, runtime, store]);

  useEffect(() => {
    setCause(undefined);
    const handle = runEffect(runtime, loader.fill({ start, end }));
    void handle.promise.then((exit) => {
      if (handle.signal.aborted) {
        return;
      }
      setCause(Exit.isFailure(exit) ? exit.cause : undefined);
    });
    return () => {
      handle.cancel();
    };
  }, [end, loader, runtime, start]);

  const rows = useMemo(
    () =>
      isEmptyRange({ start, end }) ? [] : Array.from(loader.container.iterRange({ start, end })),
    // The container mutates in place; the revision tracks its changes.
    [end, loader, snapshot.revision, start],
  );

  return {
    snapshot,
    rows,
    cause,
  };
};
