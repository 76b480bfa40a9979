/**
 * Tick math - mid prices, dedup keys and tick construction
 *
 * This module is pure (no I/O, no throw).
 */

import type { DedupKey, EpochSec, Instrument, InstrumentQuote, Ms, Tick, TickSource } from "./types";

/** Fractional digits kept for mid prices */
export const MID_DECIMALS = 6;

const MID_SCALE = 10 ** MID_DECIMALS;

/**
 * (bid + ask) / 2 rounded to MID_DECIMALS, or null unless both are present
 */
export function roundMid(bid: number | null, ask: number | null): number | null {
  if (bid === null || ask === null) return null;
  return Math.round(((bid + ask) / 2) * MID_SCALE) / MID_SCALE;
}

export function dedupKey(quote: InstrumentQuote): DedupKey {
  return [quote.yes.bestBid, quote.yes.bestAsk, quote.no.bestBid, quote.no.bestAsk];
}

export function sameDedupKey(a: DedupKey | undefined, b: DedupKey): boolean {
  if (a === undefined) return false;
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

/**
 * True when none of the four best prices is known
 */
export function isEmptyQuote(quote: InstrumentQuote): boolean {
  return dedupKey(quote).every(v => v === null);
}

/**
 * Seconds since the instrument opened, rounded to 2 decimals
 */
export function secondsElapsed(openTs: EpochSec, nowMs: Ms): number {
  return Math.round((nowMs / 1000 - openTs) * 100) / 100;
}

export function buildTick(instrument: Instrument, quote: InstrumentQuote, source: TickSource, nowMs: Ms): Tick {
  return {
    instrumentId: instrument.id,
    ts: new Date(nowMs),
    epochMs: Math.floor(nowMs),
    secondsElapsed: secondsElapsed(instrument.openTs, nowMs),
    yesBestBid: quote.yes.bestBid,
    yesBestAsk: quote.yes.bestAsk,
    noBestBid: quote.no.bestBid,
    noBestAsk: quote.no.bestAsk,
    yesMid: roundMid(quote.yes.bestBid, quote.yes.bestAsk),
    noMid: roundMid(quote.no.bestBid, quote.no.bestAsk),
    source,
  };
}
