/**
 * Core Domain Types
 *
 * Pure type definitions for the window tick recorder.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Epoch seconds */
export type EpochSec = number;

/** Milliseconds */
export type Ms = number;

/** Opaque feed identifier of one outcome token (CLOB token id) */
export type SideHandle = string;

/** Outcome of an up/down instrument */
export type OutcomeSide = "yes" | "no";

/** Fixed window durations the recorder tracks */
export type WindowClass = "5m" | "15m";

/** Which feed caused a tick write */
export type TickSource = "snapshot" | "delta";

// ─────────────────────────────────────────────────────────────────────────────
// Instruments
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The two outcome tokens of one instrument
 */
export interface SideHandles {
  yes: SideHandle;
  no: SideHandle;
}

/**
 * One time-windowed up/down instrument.
 *
 * Only `resolved` ever changes after creation.
 */
export interface Instrument {
  id: string;
  handles: SideHandles;
  openTs: EpochSec;
  closeTs: EpochSec;
  windowClass: WindowClass;
  resolved: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Order Book
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One price level. In a delta, `size === 0` removes the level.
 */
export interface PriceLevel {
  price: number;
  size: number;
}

/**
 * Full book of one side-handle as returned by the snapshot source
 */
export interface BookLevels {
  bids: PriceLevel[];
  asks: PriceLevel[];
}

/**
 * Incremental change for one side-handle from the delta source
 */
export interface BookDelta {
  handle: SideHandle;
  bids: PriceLevel[];
  asks: PriceLevel[];
}

export interface BestPrices {
  bestBid: number | null;
  bestAsk: number | null;
}

/**
 * Best prices of both outcomes of an instrument, read at one instant
 */
export interface InstrumentQuote {
  yes: BestPrices;
  no: BestPrices;
}

// ─────────────────────────────────────────────────────────────────────────────
// Ticks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * (yesBid, yesAsk, noBid, noAsk) of the last committed tick
 */
export type DedupKey = readonly [number | null, number | null, number | null, number | null];

/**
 * Immutable best-price observation
 */
export interface Tick {
  instrumentId: string;
  ts: Date;
  epochMs: Ms;
  secondsElapsed: number;
  yesBestBid: number | null;
  yesBestAsk: number | null;
  noBestBid: number | null;
  noBestAsk: number | null;
  yesMid: number | null;
  noMid: number | null;
  source: TickSource;
}
