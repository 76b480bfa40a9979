/**
 * Tick Writer Service
 *
 * - Reads both sides' best prices from the BookStore and appends a tick
 * - Skips when nothing is quoted or the prices match the last committed tick
 * - Calls for the same instrument run one after another
 */

import { buildTick, dedupKey, isEmptyQuote, sameDedupKey } from "@updown-recorder/core";
import type { BookStore, DedupKey, TickSource } from "@updown-recorder/core";
import type { TickRepository } from "@updown-recorder/repositories";
import { logger } from "@updown-recorder/utils";

import type { InstrumentRegistry } from "./instrument-registry";

const log = logger.child("tick-writer");

export interface TickWriterStats {
  written: number;
  skipped: number;
  failed: number;
}

export class TickWriter {
  private readonly lastKeys = new Map<string, DedupKey>();
  private readonly chains = new Map<string, Promise<boolean>>();
  private readonly stats: TickWriterStats = { written: 0, skipped: 0, failed: 0 };

  constructor(
    private readonly registry: InstrumentRegistry,
    private readonly books: BookStore,
    private readonly repository: TickRepository,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Resolves to `true` when a row was persisted.
   *
   * `force` bypasses the dedup comparison but not the empty-quote check.
   */
  writeTick(instrumentId: string, source: TickSource, force = false): Promise<boolean> {
    const previous = this.chains.get(instrumentId) ?? Promise.resolve(false);
    const run = (): Promise<boolean> => this.writeNow(instrumentId, source, force);
    const next = previous.then(run, run);

    this.chains.set(instrumentId, next);
    const cleanup = (): void => {
      if (this.chains.get(instrumentId) === next) this.chains.delete(instrumentId);
    };
    void next.then(cleanup, cleanup);

    return next;
  }

  /**
   * Drop dedup state of an expired instrument
   */
  forget(instrumentId: string): void {
    this.lastKeys.delete(instrumentId);
  }

  getStats(): TickWriterStats {
    return { ...this.stats };
  }

  private async writeNow(instrumentId: string, source: TickSource, force: boolean): Promise<boolean> {
    const instrument = this.registry.lookup(instrumentId);
    if (!instrument) {
      return false;
    }

    const quote = this.books.quote(instrument.handles);
    if (isEmptyQuote(quote)) {
      this.stats.skipped++;
      return false;
    }

    const key = dedupKey(quote);
    if (!force && sameDedupKey(this.lastKeys.get(instrumentId), key)) {
      this.stats.skipped++;
      return false;
    }

    const tick = buildTick(instrument, quote, source, this.now());
    const result = await this.repository.insertTick(tick);
    if (result.isErr()) {
      this.stats.failed++;
      log.error("Tick insert failed", { instrumentId, source, error: result.error.message });
      return false;
    }

    // Expired while the insert was in flight: keep no state for it.
    if (this.registry.lookup(instrumentId)) {
      this.lastKeys.set(instrumentId, key);
    }
    this.stats.written++;
    log.debug("Tick written", {
      instrumentId,
      source,
      yesMid: tick.yesMid,
      noMid: tick.noMid,
      secondsElapsed: tick.secondsElapsed,
    });
    return true;
  }
}
