export {
  createManagedRuntime,
  createSparseViewLayer,
  createSparseViewRuntime,
  type AppManagedRuntime,
  type SparseViewServices,
} from "./runtime";
export {
  emitTelemetry,
  Telemetry,
  TelemetryLive,
  type TelemetryEvent,
  type TelemetryService,
} from "./telemetry";
