/**
 * Collector Services
 *
 * Export all service modules
 */

export { InstrumentRegistry } from "./instrument-registry";
export type { HandleRef, RegisterInput, RegistryError } from "./instrument-registry";
export { TickWriter } from "./tick-writer";
export type { TickWriterStats } from "./tick-writer";
export { SnapshotPoller } from "./snapshot-poller";
export type { SnapshotPollerStats } from "./snapshot-poller";
export { DeltaStream } from "./delta-stream";
export type { DeltaStreamOptions, DeltaStreamState, DeltaStreamStats } from "./delta-stream";
export { DiscoveryLoop } from "./discovery-loop";
export type { DiscoveryLoopDeps, DiscoveryLoopOptions } from "./discovery-loop";
