/**
 * packages/core - Pure Domain Logic
 *
 * Window math, order-book state and tick math for the recorder.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  EpochSec,
  Ms,
  SideHandle,
  OutcomeSide,
  WindowClass,
  TickSource,
  // Instruments
  SideHandles,
  Instrument,
  // Order book
  PriceLevel,
  BookLevels,
  BookDelta,
  BestPrices,
  InstrumentQuote,
  // Ticks
  DedupKey,
  Tick,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Window Clock
// ─────────────────────────────────────────────────────────────────────────────
export type { WindowRef } from "./window";
export {
  WINDOW_LENGTH_SEC,
  WINDOW_CLASSES,
  DEFAULT_INSTRUMENT_PREFIX,
  DEFAULT_EXPIRY_GRACE_SEC,
  isWindowClass,
  instrumentIdFor,
  currentWindowId,
  windowCloseTs,
  secondsUntilNextWindow,
  isExpiryDue,
  parseWindowClasses,
} from "./window";

// ─────────────────────────────────────────────────────────────────────────────
// Book Store
// ─────────────────────────────────────────────────────────────────────────────
export { BookStore } from "./book-store";

// ─────────────────────────────────────────────────────────────────────────────
// Tick Math
// ─────────────────────────────────────────────────────────────────────────────
export { MID_DECIMALS, roundMid, dedupKey, sameDedupKey, isEmptyQuote, secondsElapsed, buildTick } from "./tick";
