/**
 * Common worker pattern utilities
 *
 * Fixed-cadence loops that share one running flag (an AbortSignal) and never let
 * a single failed iteration end the loop.
 */

import { logger, type Logger } from "./logger";
import { sleep } from "./sleep";

/**
 * Options for an interval-based loop
 */
export interface IntervalLoopOptions {
  /**
   * Name of the loop (for logging)
   */
  name: string;

  /**
   * Sleep between the end of one iteration and the start of the next
   */
  intervalMs: number;

  /**
   * Function to run on each iteration
   */
  runOnce: () => Promise<void>;

  /**
   * Loop exits at the next iteration boundary once aborted
   */
  signal: AbortSignal;

  log?: Logger;
}

/**
 * Run `runOnce` until `signal` aborts.
 *
 * Iterations never overlap. An exception thrown by an iteration is logged and
 * the loop continues after the usual sleep.
 */
export async function runIntervalLoop(options: IntervalLoopOptions): Promise<void> {
  const { name, intervalMs, runOnce, signal } = options;
  const log = options.log ?? logger;

  log.debug(`${name} loop started`, { intervalMs });

  while (!signal.aborted) {
    try {
      await runOnce();
    } catch (error: unknown) {
      log.error(`${name} iteration failed`, { error });
    }
    await sleep(intervalMs, signal);
  }

  log.debug(`${name} loop stopped`);
}

/**
 * Install SIGINT/SIGTERM handlers that run `shutdown` once.
 */
export function onShutdownSignal(shutdown: () => Promise<void>): void {
  let isShuttingDown = false;
  const handler = (): void => {
    // Prevent multiple shutdown calls
    if (isShuttingDown) return;
    isShuttingDown = true;
    void shutdown();
  };

  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}
