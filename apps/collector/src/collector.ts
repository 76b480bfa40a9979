/**
 * Collector
 *
 * Wires the registry, book store, tick writer and the three kinds of loops,
 * and owns the single AbortController every loop observes.
 */

import type { ResultAsync } from "neverthrow";
import { BookStore, type WindowClass } from "@updown-recorder/core";
import type { BookSnapshotPort, DeltaFeedPort, LookupPort } from "@updown-recorder/adapters";
import type {
  InstrumentRepository,
  InstrumentStats,
  RepositoryError,
  TickRepository,
} from "@updown-recorder/repositories";
import { logger, runIntervalLoop } from "@updown-recorder/utils";

import { DeltaStream, DiscoveryLoop, InstrumentRegistry, SnapshotPoller, TickWriter } from "./services";
import type { CollectorConfig, CollectorMetrics } from "./types";

const log = logger.child("collector");

export interface CollectorDeps {
  lookup: LookupPort;
  snapshots: BookSnapshotPort;
  feed: DeltaFeedPort;
  instruments: InstrumentRepository;
  ticks: TickRepository;
  /**
   * Wall clock in epoch milliseconds
   */
  now?: () => number;
}

export class Collector {
  readonly registry: InstrumentRegistry;
  readonly books = new BookStore();
  readonly writer: TickWriter;
  readonly poller: SnapshotPoller;
  readonly deltaStream: DeltaStream;
  readonly discoveryLoops: readonly DiscoveryLoop[];

  private readonly controller = new AbortController();
  private running: Promise<void> | null = null;

  constructor(
    private readonly deps: CollectorDeps,
    private readonly config: CollectorConfig,
  ) {
    const now = deps.now ?? Date.now;

    this.registry = new InstrumentRegistry(deps.instruments, config.expiryGraceSec);
    this.writer = new TickWriter(this.registry, this.books, deps.ticks, now);
    this.poller = new SnapshotPoller(
      deps.snapshots,
      this.registry,
      this.books,
      this.writer,
      config.snapshotPollIntervalMs,
    );
    this.deltaStream = new DeltaStream(deps.feed, this.registry, this.books, this.writer, {
      receiveTimeoutMs: config.deltaReceiveTimeoutMs,
      reconnectDelayMs: config.deltaReconnectDelayMs,
      writeTicks: config.deltaWritesTicks,
    });
    this.discoveryLoops = config.windowClasses.map(
      windowClass =>
        new DiscoveryLoop(
          {
            lookup: deps.lookup,
            snapshots: deps.snapshots,
            registry: this.registry,
            books: this.books,
            writer: this.writer,
          },
          {
            windowClass,
            instrumentPrefix: config.instrumentPrefix,
            intervalMs: config.discoveryIntervalMs,
            now,
          },
        ),
    );
  }

  /**
   * Start every loop. Resolves once all loops have exited after `stop()`.
   */
  start(): Promise<void> {
    if (this.running) return this.running;

    for (const loop of this.discoveryLoops) {
      log.info(`[${loop.windowClass}] Current window ${loop.startupWindow.id} already in progress; skipping`);
      log.info(`[${loop.windowClass}] Next window starts in ~${loop.secondsUntilFirstWindow()}s`);
    }

    const signal = this.controller.signal;
    this.running = Promise.all([
      this.poller.run(signal),
      this.deltaStream.run(signal),
      ...this.discoveryLoops.map(loop => loop.run(signal)),
      runIntervalLoop({
        name: "status",
        intervalMs: this.config.statusLogIntervalMs,
        runOnce: async () => {
          log.info("Status", { ...this.getMetrics() });
        },
        signal,
        log,
      }),
    ]).then(() => undefined);

    return this.running;
  }

  /**
   * Abort every loop and wait for them to exit
   */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.running) await this.running;
  }

  /**
   * Read-only aggregate for one window class
   */
  getStats(windowClass: WindowClass): ResultAsync<InstrumentStats, RepositoryError> {
    return this.deps.instruments.getStats(windowClass);
  }

  getMetrics(): CollectorMetrics {
    const ticks = this.writer.getStats();
    const snapshots = this.poller.getStats();
    const delta = this.deltaStream.getStats();
    return {
      activeInstruments: this.registry.size(),
      trackedBooks: this.books.size(),
      ticksWritten: ticks.written,
      ticksSkipped: ticks.skipped,
      tickWriteFailures: ticks.failed,
      snapshotPolls: snapshots.polls,
      snapshotFetchFailures: snapshots.fetchFailures,
      deltaState: this.deltaStream.getState(),
      deltaMessages: delta.messages,
      deltaUpdatesApplied: delta.updatesApplied,
      deltaUpdatesDropped: delta.updatesDropped,
      deltaInvalidMessages: delta.invalidMessages,
      deltaReconnects: delta.reconnects,
      deltaFailures: delta.failures,
    };
  }
}
