/**
 * Build CollectorConfig from the validated environment
 */

import { err, ok, type Result } from "neverthrow";
import { parseWindowClasses } from "@updown-recorder/core";

import type { Env } from "./env";
import type { CollectorConfig } from "./types";

export type ConfigError = { type: "INVALID_CONFIG"; message: string };

function invalidConfig(message: string): ConfigError {
  return { type: "INVALID_CONFIG", message };
}

export function buildCollectorConfig(
  env: Pick<
    Env,
    | "WINDOW_CLASSES"
    | "INSTRUMENT_PREFIX"
    | "SNAPSHOT_POLL_INTERVAL_MS"
    | "DISCOVERY_INTERVAL_MS"
    | "EXPIRY_GRACE_SEC"
    | "DELTA_RECEIVE_TIMEOUT_MS"
    | "DELTA_RECONNECT_DELAY_MS"
    | "DELTA_WRITES_TICKS"
    | "STATUS_LOG_INTERVAL_MS"
  >,
): Result<CollectorConfig, ConfigError> {
  const { classes, unknown } = parseWindowClasses(env.WINDOW_CLASSES);
  if (unknown.length > 0) {
    return err(invalidConfig(`Unknown window classes: ${unknown.join(", ")}`));
  }
  if (classes.length === 0) {
    return err(invalidConfig("WINDOW_CLASSES names no window class"));
  }

  return ok({
    windowClasses: classes,
    instrumentPrefix: env.INSTRUMENT_PREFIX,
    snapshotPollIntervalMs: env.SNAPSHOT_POLL_INTERVAL_MS,
    discoveryIntervalMs: env.DISCOVERY_INTERVAL_MS,
    expiryGraceSec: env.EXPIRY_GRACE_SEC,
    deltaReceiveTimeoutMs: env.DELTA_RECEIVE_TIMEOUT_MS,
    deltaReconnectDelayMs: env.DELTA_RECONNECT_DELAY_MS,
    deltaWritesTicks: env.DELTA_WRITES_TICKS,
    statusLogIntervalMs: env.STATUS_LOG_INTERVAL_MS,
  });
}
