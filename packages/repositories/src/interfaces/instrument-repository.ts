/**
 * Instrument Repository Interface
 *
 * - Insert-or-ignore on discovery
 * - Mark resolved on expiry
 * - Per-window-class statistics
 * - Administrative delete (ticks cascade)
 */

import type { ResultAsync } from "neverthrow";
import type { Instrument, WindowClass } from "@updown-recorder/core";

import type { RepositoryError } from "../types";

/**
 * Counts reported by `getStats`
 */
export interface InstrumentStats {
  total: number;
  resolved: number;
  active: number;
  totalTicks: number;
}

export interface InstrumentRepository {
  /**
   * Insert the instrument unless a row with the same id exists.
   * Resolves to `true` when a row was created.
   */
  insertInstrument(instrument: Instrument): ResultAsync<boolean, RepositoryError>;

  /**
   * Set `resolved = true`. NOT_FOUND when no such row exists.
   */
  markResolved(instrumentId: string): ResultAsync<void, RepositoryError>;

  findById(instrumentId: string): ResultAsync<Instrument | null, RepositoryError>;

  getStats(windowClass: WindowClass): ResultAsync<InstrumentStats, RepositoryError>;

  /**
   * Delete the instrument and, through the foreign key, all of its ticks.
   */
  deleteInstrument(instrumentId: string): ResultAsync<void, RepositoryError>;
}
