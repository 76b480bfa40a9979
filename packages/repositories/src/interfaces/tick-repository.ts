/**
 * Tick Repository Interface
 */

import type { ResultAsync } from "neverthrow";
import type { Tick } from "@updown-recorder/core";

import type { RepositoryError } from "../types";

export interface TickRepository {
  /**
   * Append one tick. Each call is its own committed statement.
   */
  insertTick(tick: Tick): ResultAsync<void, RepositoryError>;

  countTicks(instrumentId: string): ResultAsync<number, RepositoryError>;
}
