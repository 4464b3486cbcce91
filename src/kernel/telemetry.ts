import { Context, Effect, Layer, PubSub, type Queue, type Scope, Stream } from "effect";
import type { IndexRange } from "../sparse";

export type TelemetryEvent =
  | {
      readonly _tag: "request";
      readonly phase: "start" | "success" | "failure";
      readonly range: IndexRange;
      readonly timestamp: number;
      readonly detail?: unknown;
    }
  | {
      readonly _tag: "insert";
      readonly range: IndexRange;
      readonly timestamp: number;
    };

export interface TelemetryService {
  readonly emit: (event: TelemetryEvent) => Effect.Effect<void>;
  readonly stream: Stream.Stream<TelemetryEvent>;
  /** Opens a subscription that receives every event emitted after this effect completes. */
  readonly subscribe: Effect.Effect<Queue.Dequeue<TelemetryEvent>, never, Scope.Scope>;
}

export class Telemetry extends Context.Tag("SparseView/Telemetry")<
  Telemetry,
  TelemetryService
>() {}

export const TelemetryLive = Layer.effect(
  Telemetry,
  Effect.map(PubSub.unbounded<TelemetryEvent>(), (pubsub): TelemetryService => ({
    emit: (event) => PubSub.publish(pubsub, event).pipe(Effect.asVoid),
    stream: Stream.fromPubSub(pubsub),
    subscribe: PubSub.subscribe(pubsub),
  })),
);

export const emitTelemetry = (event: TelemetryEvent): Effect.Effect<void, never, Telemetry> =>
  Effect.flatMap(Telemetry, (service) => service.emit(event));
