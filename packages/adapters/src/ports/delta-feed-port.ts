/**
 * Delta Feed Port - streaming incremental book changes
 *
 * One `DeltaFeedConnection` per physical connection. Subscriptions do not
 * survive a reconnect; the caller re-subscribes on every new connection.
 */

import type { Result } from "neverthrow";
import type { BookDelta, SideHandle } from "@updown-recorder/core";

import type { AdapterError } from "./adapter-error";

/**
 * Outcome of one bounded wait on the connection.
 *
 * `rejected` counts items of a batched message that could not be decoded.
 */
export type DeltaReceiveResult =
  | { kind: "message"; updates: BookDelta[]; rejected: number }
  | { kind: "invalid"; message: string }
  | { kind: "timeout" }
  | { kind: "closed"; reason: string };

export interface DeltaFeedConnection {
  subscribe(handle: SideHandle): Result<void, AdapterError>;

  /**
   * Wait at most `timeoutMs` for the next inbound message.
   * A timeout is a normal outcome, not an error.
   */
  receive(timeoutMs: number): Promise<DeltaReceiveResult>;

  close(): Promise<void>;
}

export interface DeltaFeedPort {
  open(): Promise<Result<DeltaFeedConnection, AdapterError>>;
}
