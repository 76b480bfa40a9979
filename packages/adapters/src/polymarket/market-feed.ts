/**
 * Polymarket Market Feed
 *
 * Delta feed over the CLOB market channel. Each inbound frame is decoded into
 * per-token book changes:
 * - frames carrying `asset_id` with `bids` / `asks` (single object or batched array)
 * - `price_change` events, whose `price_changes[]` entries update one level each
 *   (BUY -> bid, SELL -> ask)
 * Other event types are ignored.
 */

import { err, ok, ResultAsync, type Result } from "neverthrow";
import type { BookDelta, PriceLevel, SideHandle } from "@updown-recorder/core";

import { connectionFailed, invalidResponse, toConnectionError, type AdapterError } from "../ports/adapter-error";
import type { DeltaFeedConnection, DeltaFeedPort, DeltaReceiveResult } from "../ports/delta-feed-port";
import {
  WsBookMessageSchema,
  WsPriceChangeMessageSchema,
  type MarketSubscribeMessage,
  type WsPriceChange,
} from "./types";
import { defaultConnectionFactory, type IWsConnection, type WsConnectionFactory } from "./ws-connection";

export function buildSubscribeMessage(handle: SideHandle): MarketSubscribeMessage {
  return { auth: {}, type: "subscribe", channel: "market", assets_ids: [handle] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

class DeltaAccumulator {
  private readonly byHandle = new Map<SideHandle, BookDelta>();

  add(handle: SideHandle, bids: PriceLevel[], asks: PriceLevel[]): void {
    const existing = this.byHandle.get(handle);
    if (existing) {
      existing.bids.push(...bids);
      existing.asks.push(...asks);
      return;
    }
    this.byHandle.set(handle, { handle, bids: [...bids], asks: [...asks] });
  }

  addPriceChange(change: WsPriceChange): void {
    const level = { price: change.price, size: change.size };
    if (change.side === "BUY") this.add(change.asset_id, [level], []);
    else this.add(change.asset_id, [], [level]);
  }

  toArray(): BookDelta[] {
    return [...this.byHandle.values()];
  }
}

export interface DecodedFrame {
  updates: BookDelta[];
  /**
   * Items of a batched frame that failed to parse and were left out
   */
  rejected: number;
}

/**
 * Decode one market-channel frame.
 *
 * Frames that are not JSON objects or arrays are `invalid_response`, and so is
 * a frame whose every recognised item fails to parse. In a batch, a bad item is
 * dropped and counted while the rest still apply. Unrelated events yield no
 * updates.
 */
export function decodeMarketMessage(data: unknown): Result<DecodedFrame, AdapterError> {
  if (!isRecord(data) && !Array.isArray(data)) {
    return err(invalidResponse(`Unexpected frame: ${String(data).slice(0, 80)}`));
  }

  const items: unknown[] = Array.isArray(data) ? data : [data];
  const acc = new DeltaAccumulator();
  const failures: string[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;

    if (item.event_type === "price_change") {
      const parsed = WsPriceChangeMessageSchema.safeParse(item);
      if (!parsed.success) {
        failures.push(`Malformed price_change: ${parsed.error.message}`);
        continue;
      }
      for (const change of parsed.data.price_changes) {
        acc.addPriceChange(change);
      }
      continue;
    }

    if (!("asset_id" in item)) continue;

    const parsed = WsBookMessageSchema.safeParse(item);
    if (!parsed.success) {
      failures.push(`Malformed book message: ${parsed.error.message}`);
      continue;
    }
    const { asset_id, bids, asks } = parsed.data;
    if (bids.length > 0 || asks.length > 0) {
      acc.add(asset_id, bids, asks);
    }
  }

  const updates = acc.toArray();
  const [firstFailure] = failures;
  if (firstFailure !== undefined && updates.length === 0) {
    return err(invalidResponse(firstFailure));
  }
  return ok({ updates, rejected: failures.length });
}

class MarketChannelConnection implements DeltaFeedConnection {
  constructor(private readonly connection: IWsConnection) {}

  subscribe(handle: SideHandle): Result<void, AdapterError> {
    if (!this.connection.send(buildSubscribeMessage(handle))) {
      return err(connectionFailed(`Cannot subscribe ${handle}: socket not open`));
    }
    return ok(undefined);
  }

  async receive(timeoutMs: number): Promise<DeltaReceiveResult> {
    const frame = await this.connection.receive(timeoutMs);
    if (frame.kind !== "message") return frame;

    return decodeMarketMessage(frame.data).match<DeltaReceiveResult>(
      ({ updates, rejected }) => ({ kind: "message", updates, rejected }),
      error => ({ kind: "invalid", message: error.message }),
    );
  }

  close(): Promise<void> {
    return this.connection.close();
  }
}

export interface PolymarketMarketFeedOptions {
  wsUrl: string;
  pingIntervalMs: number;
  connectionFactory?: WsConnectionFactory;
}

export class PolymarketMarketFeed implements DeltaFeedPort {
  private readonly wsUrl: string;
  private readonly pingIntervalMs: number;
  private readonly connectionFactory: WsConnectionFactory;

  constructor(options: PolymarketMarketFeedOptions) {
    this.wsUrl = options.wsUrl;
    this.pingIntervalMs = options.pingIntervalMs;
    this.connectionFactory = options.connectionFactory ?? defaultConnectionFactory;
  }

  async open(): Promise<Result<DeltaFeedConnection, AdapterError>> {
    const connection = this.connectionFactory({
      url: this.wsUrl,
      label: "market",
      pingIntervalMs: this.pingIntervalMs,
    });

    return ResultAsync.fromPromise(connection.connect(), toConnectionError).map(
      (): DeltaFeedConnection => new MarketChannelConnection(connection),
    );
  }
}
