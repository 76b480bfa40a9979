/**
 * Collector Main Entry Point
 *
 * - Discover each new 5m / 15m window and register its instrument
 * - Keep both order books current from REST snapshots and the WS delta feed
 * - Append a de-duplicated best-price tick series per instrument
 * - Mark instruments resolved after close
 */

import "dotenv/config";

import {
  ClobBookClient,
  GammaLookupClient,
  PolymarketMarketFeed,
} from "@updown-recorder/adapters";
import { closeDb, getDb } from "@updown-recorder/db";
import {
  createPostgresInstrumentRepository,
  createPostgresTickRepository,
} from "@updown-recorder/repositories";
import { logger, onShutdownSignal } from "@updown-recorder/utils";

import { Collector } from "./collector";
import { buildCollectorConfig } from "./config";
import { env } from "./env";

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const configResult = buildCollectorConfig(env);
  if (configResult.isErr()) {
    logger.error("Invalid configuration", configResult.error);
    process.exit(1);
  }
  const config = configResult.value;

  logger.info("Starting collector", {
    appEnv: env.APP_ENV,
    windowClasses: config.windowClasses.join(","),
    instrumentPrefix: config.instrumentPrefix,
    snapshotPollIntervalMs: config.snapshotPollIntervalMs,
    discoveryIntervalMs: config.discoveryIntervalMs,
    deltaWritesTicks: config.deltaWritesTicks,
  });

  // Initialize database
  const db = getDb(env.DATABASE_URL);

  const collector = new Collector(
    {
      lookup: new GammaLookupClient({ baseUrl: env.GAMMA_API_URL, timeoutMs: env.HTTP_TIMEOUT_MS }),
      snapshots: new ClobBookClient({ baseUrl: env.CLOB_API_URL, timeoutMs: env.HTTP_TIMEOUT_MS }),
      feed: new PolymarketMarketFeed({ wsUrl: env.CLOB_WS_URL, pingIntervalMs: env.DELTA_PING_INTERVAL_MS }),
      instruments: createPostgresInstrumentRepository(db),
      ticks: createPostgresTickRepository(db),
    },
    config,
  );

  // ============================================================================
  // Graceful Shutdown
  // ============================================================================

  onShutdownSignal(async () => {
    logger.info("Shutting down...");
    try {
      await collector.stop();
      await closeDb(db);
      logger.info("Shutdown complete", { ...collector.getMetrics() });
      process.exit(0);
    } catch (error: unknown) {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    }
  });

  logger.info("Collector running");
  await collector.start();
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
