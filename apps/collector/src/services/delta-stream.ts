/**
 * Delta Stream Service
 *
 * Keeps one delta-feed connection open, subscribes every tracked side handle,
 * and applies incoming book changes to the BookStore.
 *
 * State machine:
 *   idle -> connecting -> active -> backoff -> connecting -> ...
 *   any -> stopped (signal aborted)
 *
 * Subscriptions belong to a connection; after a reconnect every handle is
 * subscribed again. An unexpected exception ends the connection, not the
 * stream: it is logged and handled like a disconnect.
 */

import type { BookDelta, BookStore, SideHandle } from "@updown-recorder/core";
import type { DeltaFeedConnection, DeltaFeedPort } from "@updown-recorder/adapters";
import { logger, sleep } from "@updown-recorder/utils";

import type { InstrumentRegistry } from "./instrument-registry";
import type { TickWriter } from "./tick-writer";

const log = logger.child("delta");

export type DeltaStreamState = "idle" | "connecting" | "active" | "backoff" | "stopped";

export interface DeltaStreamOptions {
  receiveTimeoutMs: number;
  reconnectDelayMs: number;
  /**
   * Write a tick (source "delta") for every instrument a message touched
   */
  writeTicks: boolean;
}

export interface DeltaStreamStats {
  connections: number;
  reconnects: number;
  failures: number;
  messages: number;
  invalidMessages: number;
  rejectedItems: number;
  updatesApplied: number;
  updatesDropped: number;
  subscribed: number;
}

export class DeltaStream {
  private state: DeltaStreamState = "idle";
  private readonly stats: DeltaStreamStats = {
    connections: 0,
    reconnects: 0,
    failures: 0,
    messages: 0,
    invalidMessages: 0,
    rejectedItems: 0,
    updatesApplied: 0,
    updatesDropped: 0,
    subscribed: 0,
  };

  constructor(
    private readonly feed: DeltaFeedPort,
    private readonly registry: InstrumentRegistry,
    private readonly books: BookStore,
    private readonly writer: TickWriter,
    private readonly options: DeltaStreamOptions,
  ) {}

  getState(): DeltaStreamState {
    return this.state;
  }

  getStats(): DeltaStreamStats {
    return { ...this.stats };
  }

  /**
   * Connect, consume, back off and reconnect until `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.state = "connecting";
      log.info("Connecting to delta feed");

      try {
        const opened = await this.feed.open();
        if (opened.isErr()) {
          log.warn("Delta feed connect failed", { error: opened.error.message });
        } else {
          await this.consume(opened.value, signal);
        }
      } catch (error: unknown) {
        this.stats.failures++;
        log.error("Delta stream connection failed unexpectedly", { error });
      }

      if (signal.aborted) break;

      this.state = "backoff";
      this.stats.reconnects++;
      log.info(`Delta feed reconnecting in ${this.options.reconnectDelayMs}ms`);
      await sleep(this.options.reconnectDelayMs, signal);
    }

    this.state = "stopped";
    log.info("Delta stream stopped", { ...this.stats });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  private async consume(connection: DeltaFeedConnection, signal: AbortSignal): Promise<void> {
    this.state = "active";
    this.stats.connections++;
    log.info("Delta feed connected");

    const subscribed = new Set<SideHandle>();
    try {
      while (!signal.aborted) {
        if (!this.syncSubscriptions(connection, subscribed)) return;

        const result = await connection.receive(this.options.receiveTimeoutMs);
        switch (result.kind) {
          case "timeout":
            break;
          case "invalid":
            this.stats.invalidMessages++;
            log.debug("Skipping malformed delta message", { error: result.message });
            break;
          case "closed":
            log.warn("Delta feed closed", { reason: result.reason });
            return;
          case "message":
            this.stats.messages++;
            if (result.rejected > 0) {
              this.stats.rejectedItems += result.rejected;
              log.debug("Dropped malformed items of a batched delta message", { rejected: result.rejected });
            }
            await this.applyUpdates(result.updates);
            break;
        }
      }
    } finally {
      this.stats.subscribed = 0;
      await connection.close();
    }
  }

  /**
   * Subscribe newly tracked handles and forget handles no longer tracked.
   * Returns false when the connection refused a subscribe.
   */
  private syncSubscriptions(connection: DeltaFeedConnection, subscribed: Set<SideHandle>): boolean {
    const current = this.registry.activeHandles();

    for (const handle of current) {
      if (subscribed.has(handle)) continue;
      const result = connection.subscribe(handle);
      if (result.isErr()) {
        log.warn("Delta subscribe failed", { handle, error: result.error.message });
        return false;
      }
      subscribed.add(handle);
      log.debug("Subscribed", { handle, side: this.registry.resolveHandle(handle)?.side });
    }

    for (const handle of subscribed) {
      if (!current.has(handle)) subscribed.delete(handle);
    }

    this.stats.subscribed = subscribed.size;
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Updates
  // ─────────────────────────────────────────────────────────────────────────────

  private async applyUpdates(updates: readonly BookDelta[]): Promise<void> {
    const touched = new Set<string>();

    for (const update of updates) {
      const ref = this.registry.resolveHandle(update.handle);
      if (!ref) {
        this.stats.updatesDropped++;
        continue;
      }
      this.books.applyDelta(update.handle, update.bids, update.asks);
      this.stats.updatesApplied++;
      touched.add(ref.instrumentId);
    }

    if (!this.options.writeTicks) return;
    await Promise.all([...touched].map(instrumentId => this.writer.writeTick(instrumentId, "delta")));
  }
}
