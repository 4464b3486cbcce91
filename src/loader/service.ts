import { Effect, Option, Ref, SubscriptionRef } from "effect";
import { resolveConfig } from "../config";
import { Telemetry } from "../kernel/telemetry";
import { isValidView, nextRequestForView } from "../prefetch";
import { isEmptyRange, rangeLength, SparseRangeError, type IndexRange, type SparseArray } from "../sparse";
import {
  type MakeWindowLoaderOptions,
  type WindowLoader,
  type WindowLoaderError,
  type WindowSnapshot,
  WindowFetchError,
} from "./types";

interface Fetched {
  readonly range: IndexRange;
  readonly received: number;
}

const takeSnapshot = <T>(
  container: SparseArray<T>,
  pending: readonly IndexRange[],
  revision: number,
): WindowSnapshot => ({
  revision,
  length: container.length,
  populated: container.populatedCount,
  loaded: container.loadedRanges(),
  pending,
});

export const makeWindowLoader = <T, E>(
  options: MakeWindowLoaderOptions<T, E>,
): Effect.Effect<WindowLoader<T, E>, never, Telemetry> =>
  Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const config = resolveConfig(options.config);
    const { container, fetch } = options;

    const pendingRef = yield* Ref.make<readonly IndexRange[]>([]);
    const snapshotsRef = yield* SubscriptionRef.make(takeSnapshot(container, [], 0));

    const publish = SubscriptionRef.updateEffect(snapshotsRef, (previous) =>
      Effect.map(Ref.get(pendingRef), (pending) =>
        takeSnapshot(container, pending, previous.revision + 1),
      ),
    );

    // Planning and registering the planned range happen in one step so that
    // concurrent requests never claim overlapping ranges.
    const claim = (view: IndexRange): Effect.Effect<Option.Option<IndexRange>> =>
      Ref.modify(pendingRef, (pending) => {
        const planned = nextRequestForView(container, view, {
          extraLoadRatio: config.prefetch.extraLoadRatio,
          exclude: pending,
        });
        return [planned, Option.isSome(planned) ? [...pending, planned.value] : pending];
      });

    const release = (range: IndexRange): Effect.Effect<void> =>
      Ref.update(pendingRef, (pending) => pending.filter((entry) => entry !== range)).pipe(
        Effect.zipRight(publish),
      );

    const load = (range: IndexRange): Effect.Effect<Fetched, WindowLoaderError<E>> =>
      Effect.gen(function* () {
        yield* telemetry.emit({
          _tag: "request",
          phase: "start",
          range,
          timestamp: Date.now(),
        });
        yield* Effect.logDebug("requesting range");

        const items = yield* fetch(range);
        if (items.length > rangeLength(range)) {
          return yield* Effect.fail(new WindowFetchError(range, items.length));
        }

        const conflict = container.findInsertConflict(range.start, items.length);
        if (conflict !== undefined) {
          return yield* Effect.fail(conflict);
        }
        container.insert(range.start, items);

        const inserted = { start: range.start, end: range.start + items.length };
        yield* telemetry.emit({
          _tag: "insert",
          range: inserted,
          timestamp: Date.now(),
        });
        yield* telemetry.emit({
          _tag: "request",
          phase: "success",
          range,
          timestamp: Date.now(),
        });
        yield* Effect.logDebug(`inserted ${String(items.length)} items`);

        return { range, received: items.length };
      }).pipe(
        Effect.tapError((error) =>
          Effect.zipRight(
            telemetry.emit({
              _tag: "request",
              phase: "failure",
              range,
              timestamp: Date.now(),
              detail: error,
            }),
            Effect.logWarning("range request failed"),
          ),
        ),
        Effect.ensuring(release(range)),
        Effect.annotateLogs({ rangeStart: range.start, rangeEnd: range.end }),
      );

    const requestOnce = (
      view: IndexRange,
    ): Effect.Effect<Option.Option<Fetched>, WindowLoaderError<E>> =>
      Effect.gen(function* () {
        if (!isEmptyRange(view) && !isValidView(view, container.length)) {
          return yield* Effect.fail(new SparseRangeError(view.start, view.end, container.length));
        }

        const planned = yield* claim(view);
        if (Option.isNone(planned)) {
          return Option.none();
        }
        yield* publish;

        const fetched = yield* load(planned.value);
        return Option.some(fetched);
      });

    const request = (view: IndexRange): Effect.Effect<Option.Option<IndexRange>, WindowLoaderError<E>> =>
      Effect.map(requestOnce(view), (fetched) => Option.map(fetched, (value) => value.range));

    const fill = (view: IndexRange): Effect.Effect<readonly IndexRange[], WindowLoaderError<E>> =>
      Effect.gen(function* () {
        const requested: IndexRange[] = [];
        while (requested.length < config.loader.maxRequestsPerFill) {
          const fetched = yield* requestOnce(view);
          if (Option.isNone(fetched)) {
            break;
          }
          requested.push(fetched.value.range);
          if (fetched.value.received === 0) {
            yield* Effect.logWarning("fetch returned no items, stopping fill");
            break;
          }
        }
        return requested;
      });

    return {
      container,
      request,
      fill,
      pending: Ref.get(pendingRef),
      snapshot: SubscriptionRef.get(snapshotsRef),
      snapshots: snapshotsRef.changes,
    } satisfies WindowLoader<T, E>;
  });
