/**
 * Lookup Port - resolves an instrument id to its two side handles
 */

import type { ResultAsync } from "neverthrow";
import type { SideHandles } from "@updown-recorder/core";

import type { AdapterError } from "./adapter-error";

export interface LookupPort {
  /**
   * `ok(null)` when the instrument is not (yet) listed or one side is missing.
   * Transport failures are `err`.
   */
  resolve(instrumentId: string): ResultAsync<SideHandles | null, AdapterError>;
}
