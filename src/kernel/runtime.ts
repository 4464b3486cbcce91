import { Layer, Logger, LogLevel, ManagedRuntime } from "effect";
import { resolveConfig, type SparseViewConfig } from "../config";
import { type Telemetry, TelemetryLive } from "./telemetry";

export type AppManagedRuntime<R> = ManagedRuntime.ManagedRuntime<R, never>;

export const createManagedRuntime = <R>(layer: Layer.Layer<R, never, never>): AppManagedRuntime<R> =>
  ManagedRuntime.make(layer);

export type SparseViewServices = Telemetry;

export const createSparseViewLayer = (
  config: SparseViewConfig = {},
): Layer.Layer<SparseViewServices, never, never> => {
  const resolved = resolveConfig(config);
  return Layer.merge(
    TelemetryLive,
    Logger.minimumLogLevel(LogLevel.fromLiteral(resolved.logLevel)),
  );
};

export const createSparseViewRuntime = (
  config: SparseViewConfig = {},
): AppManagedRuntime<SparseViewServices> => createManagedRuntime(createSparseViewLayer(config));
