/**
 * Snapshot Poller Service
 *
 * Every cycle, replaces both books of each active instrument with a fresh REST
 * snapshot and writes a tick. A failed side is logged and skipped.
 */

import type { BookStore, Instrument, SideHandle } from "@updown-recorder/core";
import type { BookSnapshotPort } from "@updown-recorder/adapters";
import { logger, runIntervalLoop } from "@updown-recorder/utils";

import type { InstrumentRegistry } from "./instrument-registry";
import type { TickWriter } from "./tick-writer";

const log = logger.child("snapshot");

export interface SnapshotPollerStats {
  polls: number;
  fetchFailures: number;
}

export class SnapshotPoller {
  private readonly stats: SnapshotPollerStats = { polls: 0, fetchFailures: 0 };

  constructor(
    private readonly source: BookSnapshotPort,
    private readonly registry: InstrumentRegistry,
    private readonly books: BookStore,
    private readonly writer: TickWriter,
    private readonly intervalMs: number,
  ) {}

  async pollOnce(): Promise<void> {
    this.stats.polls++;
    const instruments = this.registry.activeInstruments();
    await Promise.all(instruments.map(instrument => this.pollInstrument(instrument)));
  }

  run(signal: AbortSignal): Promise<void> {
    return runIntervalLoop({
      name: "snapshot-poller",
      intervalMs: this.intervalMs,
      runOnce: () => this.pollOnce(),
      signal,
      log,
    });
  }

  getStats(): SnapshotPollerStats {
    return { ...this.stats };
  }

  private async pollInstrument(instrument: Instrument): Promise<void> {
    const { yes, no } = instrument.handles;
    await Promise.all([this.refresh(instrument.id, yes), this.refresh(instrument.id, no)]);
    await this.writer.writeTick(instrument.id, "snapshot");
  }

  private async refresh(instrumentId: string, handle: SideHandle): Promise<void> {
    const result = await this.source.fetchBook(handle);
    if (result.isErr()) {
      this.stats.fetchFailures++;
      log.warn("Snapshot fetch failed", { instrumentId, handle, error: result.error.message });
      return;
    }

    // Expired during the fetch: do not recreate its book.
    if (!this.registry.resolveHandle(handle)) return;

    this.books.replaceSnapshot(handle, result.value.bids, result.value.asks);
  }
}
