/**
 * Discovery / Expiry Loop
 *
 * One instance per window class. Each cycle:
 * 1. registers the current window's instrument (unless it is the window that
 *    was already running at startup), seeds its books and force-writes a tick
 * 2. expires instruments of this class whose close + grace has passed
 */

import { currentWindowId, secondsUntilNextWindow, windowCloseTs } from "@updown-recorder/core";
import type { BookStore, SideHandle, WindowClass, WindowRef } from "@updown-recorder/core";
import type { BookSnapshotPort, LookupPort } from "@updown-recorder/adapters";
import { logger, runIntervalLoop, type Logger } from "@updown-recorder/utils";

import type { InstrumentRegistry } from "./instrument-registry";
import type { TickWriter } from "./tick-writer";

export interface DiscoveryLoopDeps {
  lookup: LookupPort;
  snapshots: BookSnapshotPort;
  registry: InstrumentRegistry;
  books: BookStore;
  writer: TickWriter;
}

export interface DiscoveryLoopOptions {
  windowClass: WindowClass;
  instrumentPrefix: string;
  intervalMs: number;
  now?: () => number;
}

export class DiscoveryLoop {
  readonly windowClass: WindowClass;
  /**
   * Window in progress when the loop was created; never recorded.
   */
  readonly startupWindow: WindowRef;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: DiscoveryLoopDeps,
    private readonly options: DiscoveryLoopOptions,
  ) {
    this.windowClass = options.windowClass;
    this.now = options.now ?? Date.now;
    this.log = logger.child(`discovery:${options.windowClass}`);
    this.startupWindow = currentWindowId(options.windowClass, this.nowSec(), options.instrumentPrefix);
  }

  /**
   * Seconds until the first window this loop will record
   */
  secondsUntilFirstWindow(): number {
    return secondsUntilNextWindow(this.windowClass, this.nowSec());
  }

  async runOnce(): Promise<void> {
    const nowSec = this.nowSec();
    const current = currentWindowId(this.windowClass, nowSec, this.options.instrumentPrefix);

    if (current.id !== this.startupWindow.id && !this.deps.registry.isTracked(current.id)) {
      await this.discover(current);
    }

    await this.expireDue(nowSec);
  }

  run(signal: AbortSignal): Promise<void> {
    return runIntervalLoop({
      name: `discovery:${this.windowClass}`,
      intervalMs: this.options.intervalMs,
      runOnce: () => this.runOnce(),
      signal,
      log: this.log,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Discovery
  // ─────────────────────────────────────────────────────────────────────────────

  private async discover(window: WindowRef): Promise<void> {
    const resolved = await this.deps.lookup.resolve(window.id);
    if (resolved.isErr()) {
      this.log.warn("Lookup failed; retrying next cycle", {
        instrumentId: window.id,
        error: resolved.error.message,
      });
      return;
    }
    const handles = resolved.value;
    if (handles === null) {
      this.log.debug("Instrument not listed yet", { instrumentId: window.id });
      return;
    }

    const registered = await this.deps.registry.register({
      id: window.id,
      handles,
      openTs: window.windowStart,
      closeTs: windowCloseTs(this.windowClass, window.windowStart),
      windowClass: this.windowClass,
    });
    if (registered.isErr()) {
      this.log.error("Failed to persist instrument", { instrumentId: window.id, error: registered.error.message });
      return;
    }
    if (!registered.value) return;

    this.log.info("Recording new instrument", { instrumentId: window.id, yes: handles.yes, no: handles.no });

    await Promise.all([this.seedBook(window.id, handles.yes), this.seedBook(window.id, handles.no)]);
    const written = await this.deps.writer.writeTick(window.id, "snapshot", true);
    if (!written) {
      this.log.warn("No initial tick (empty books)", { instrumentId: window.id });
    }
  }

  private async seedBook(instrumentId: string, handle: SideHandle): Promise<void> {
    const result = await this.deps.snapshots.fetchBook(handle);
    if (result.isErr()) {
      this.log.warn("Initial snapshot failed", { instrumentId, handle, error: result.error.message });
      return;
    }
    this.deps.books.replaceSnapshot(handle, result.value.bids, result.value.asks);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Expiry
  // ─────────────────────────────────────────────────────────────────────────────

  private async expireDue(nowSec: number): Promise<void> {
    for (const instrument of this.deps.registry.dueForExpiry(this.windowClass, nowSec)) {
      const result = await this.deps.registry.expire(instrument.id);

      this.deps.books.forget(instrument.handles.yes);
      this.deps.books.forget(instrument.handles.no);
      this.deps.writer.forget(instrument.id);

      if (result.isErr()) {
        this.log.error("Failed to mark instrument resolved", {
          instrumentId: instrument.id,
          error: result.error.message,
        });
      } else {
        this.log.info("Instrument expired", { instrumentId: instrument.id, closeTs: instrument.closeTs });
      }
    }
  }

  private nowSec(): number {
    return Math.floor(this.now() / 1000);
  }
}
