/**
 * Collector Types
 *
 * Shared type definitions for the collector application
 */

import type { WindowClass } from "@updown-recorder/core";

import type { DeltaStreamState } from "./services/delta-stream";

/**
 * Static configuration of one collector instance
 */
export interface CollectorConfig {
  windowClasses: readonly WindowClass[];
  instrumentPrefix: string;
  snapshotPollIntervalMs: number;
  discoveryIntervalMs: number;
  expiryGraceSec: number;
  deltaReceiveTimeoutMs: number;
  deltaReconnectDelayMs: number;
  deltaWritesTicks: boolean;
  statusLogIntervalMs: number;
}

/**
 * Collector metrics for observability
 */
export interface CollectorMetrics {
  activeInstruments: number;
  trackedBooks: number;
  ticksWritten: number;
  ticksSkipped: number;
  tickWriteFailures: number;
  snapshotPolls: number;
  snapshotFetchFailures: number;
  deltaState: DeltaStreamState;
  deltaMessages: number;
  deltaUpdatesApplied: number;
  deltaUpdatesDropped: number;
  deltaInvalidMessages: number;
  deltaReconnects: number;
  deltaFailures: number;
}
