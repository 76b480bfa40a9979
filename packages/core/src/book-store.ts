/**
 * Book Store - In-memory order books keyed by side-handle
 *
 * Each book is two price -> size maps. Stored sizes are always > 0: zero-size
 * levels are removed, never kept.
 *
 * - Snapshot: wholesale replace (authoritative)
 * - Delta: per-level upsert/remove, last write wins until the next snapshot
 *
 * All mutations are synchronous, so a reader never observes a half-applied
 * snapshot or delta.
 */

import type { BestPrices, InstrumentQuote, PriceLevel, SideHandle, SideHandles } from "./types";

interface Book {
  bids: Map<number, number>;
  asks: Map<number, number>;
}

function isValidPrice(price: number): boolean {
  return Number.isFinite(price);
}

function toLevelMap(levels: readonly PriceLevel[]): Map<number, number> {
  const out = new Map<number, number>();
  for (const { price, size } of levels) {
    if (!isValidPrice(price) || !Number.isFinite(size) || size <= 0) continue;
    out.set(price, size);
  }
  return out;
}

function applyLevels(side: Map<number, number>, levels: readonly PriceLevel[]): void {
  for (const { price, size } of levels) {
    if (!isValidPrice(price) || !Number.isFinite(size)) continue;
    if (size <= 0) {
      side.delete(price);
    } else {
      side.set(price, size);
    }
  }
}

function maxKey(levels: Map<number, number>): number | null {
  let best: number | null = null;
  for (const price of levels.keys()) {
    if (best === null || price > best) best = price;
  }
  return best;
}

function minKey(levels: Map<number, number>): number | null {
  let best: number | null = null;
  for (const price of levels.keys()) {
    if (best === null || price < best) best = price;
  }
  return best;
}

export class BookStore {
  private readonly books = new Map<SideHandle, Book>();

  /**
   * Replace the whole book of `handle`. Levels with non-positive size are dropped.
   */
  replaceSnapshot(handle: SideHandle, bids: readonly PriceLevel[], asks: readonly PriceLevel[]): void {
    this.books.set(handle, { bids: toLevelMap(bids), asks: toLevelMap(asks) });
  }

  /**
   * Apply incremental level changes; an unknown handle starts from an empty book.
   *
   * size == 0 removes the price level (no-op if absent), size > 0 upserts it.
   */
  applyDelta(handle: SideHandle, bids: readonly PriceLevel[], asks: readonly PriceLevel[]): void {
    let book = this.books.get(handle);
    if (!book) {
      book = { bids: new Map(), asks: new Map() };
      this.books.set(handle, book);
    }
    applyLevels(book.bids, bids);
    applyLevels(book.asks, asks);
  }

  bestPrices(handle: SideHandle): BestPrices {
    const book = this.books.get(handle);
    if (!book) return { bestBid: null, bestAsk: null };
    return { bestBid: maxKey(book.bids), bestAsk: minKey(book.asks) };
  }

  /**
   * Best prices of both outcomes, read in one synchronous step
   */
  quote(handles: SideHandles): InstrumentQuote {
    return { yes: this.bestPrices(handles.yes), no: this.bestPrices(handles.no) };
  }

  /**
   * Copy of the levels currently held for `handle` (bids descending, asks ascending)
   */
  levels(handle: SideHandle): { bids: PriceLevel[]; asks: PriceLevel[] } {
    const book = this.books.get(handle);
    if (!book) return { bids: [], asks: [] };
    const toLevels = (m: Map<number, number>): PriceLevel[] =>
      Array.from(m.entries(), ([price, size]) => ({ price, size }));
    return {
      bids: toLevels(book.bids).sort((a, b) => b.price - a.price),
      asks: toLevels(book.asks).sort((a, b) => a.price - b.price),
    };
  }

  has(handle: SideHandle): boolean {
    return this.books.has(handle);
  }

  forget(handle: SideHandle): void {
    this.books.delete(handle);
  }

  size(): number {
    return this.books.size;
  }
}
