/**
 * Window Clock - Pure logic for time-windowed instrument identifiers
 *
 * Instruments are bucketed into fixed windows. The identifier of a window is a
 * deterministic function of its class and start, so the same window always maps
 * to the same instrument id.
 *
 * This module is pure (no I/O, no throw).
 */

import type { EpochSec, WindowClass } from "./types";

export const WINDOW_LENGTH_SEC: Readonly<Record<WindowClass, number>> = {
  "5m": 300,
  "15m": 900,
};

export const WINDOW_CLASSES: readonly WindowClass[] = ["5m", "15m"];

export const DEFAULT_INSTRUMENT_PREFIX = "btc-updown";

/** Seconds after close before an instrument is retired */
export const DEFAULT_EXPIRY_GRACE_SEC = 30;

export interface WindowRef {
  id: string;
  windowStart: EpochSec;
}

export function isWindowClass(value: string): value is WindowClass {
  return value === "5m" || value === "15m";
}

/**
 * Instrument id of a window: `<prefix>-<class>-<windowStart>`
 */
export function instrumentIdFor(
  windowClass: WindowClass,
  windowStart: EpochSec,
  prefix: string = DEFAULT_INSTRUMENT_PREFIX,
): string {
  return `${prefix}-${windowClass}-${String(windowStart)}`;
}

/**
 * Window containing `nowSec`.
 *
 * windowStart = floor(now / length) * length
 */
export function currentWindowId(
  windowClass: WindowClass,
  nowSec: EpochSec,
  prefix: string = DEFAULT_INSTRUMENT_PREFIX,
): WindowRef {
  const length = WINDOW_LENGTH_SEC[windowClass];
  const windowStart = Math.floor(nowSec / length) * length;
  return { id: instrumentIdFor(windowClass, windowStart, prefix), windowStart };
}

export function windowCloseTs(windowClass: WindowClass, windowStart: EpochSec): EpochSec {
  return windowStart + WINDOW_LENGTH_SEC[windowClass];
}

/**
 * Seconds until the window after the one containing `nowSec` opens
 */
export function secondsUntilNextWindow(windowClass: WindowClass, nowSec: EpochSec): number {
  const { windowStart } = currentWindowId(windowClass, nowSec);
  return windowCloseTs(windowClass, windowStart) - Math.floor(nowSec);
}

/**
 * Expiry is due strictly after `closeTs + graceSec`, never before.
 */
export function isExpiryDue(closeTs: EpochSec, nowSec: EpochSec, graceSec: number = DEFAULT_EXPIRY_GRACE_SEC): boolean {
  return nowSec > closeTs + graceSec;
}

/**
 * Parse a comma separated list such as "5m,15m".
 *
 * Unknown entries are returned separately so configuration can reject them.
 */
export function parseWindowClasses(raw: string): { classes: WindowClass[]; unknown: string[] } {
  const classes: WindowClass[] = [];
  const unknown: string[] = [];

  for (const part of raw.split(",")) {
    const value = part.trim();
    if (value === "") continue;
    if (!isWindowClass(value)) {
      unknown.push(value);
      continue;
    }
    if (!classes.includes(value)) classes.push(value);
  }

  return { classes, unknown };
}
