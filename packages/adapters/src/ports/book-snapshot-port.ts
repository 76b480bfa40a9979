/**
 * Book Snapshot Port - full order book of one side handle
 */

import type { ResultAsync } from "neverthrow";
import type { BookLevels, SideHandle } from "@updown-recorder/core";

import type { AdapterError } from "./adapter-error";

export interface BookSnapshotPort {
  /**
   * Levels with a non-positive size are already dropped.
   */
  fetchBook(handle: SideHandle): ResultAsync<BookLevels, AdapterError>;
}
