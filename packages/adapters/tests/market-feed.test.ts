/**
 * Polymarket Market Feed Unit Tests
 *
 * - Frame decoding (book, batched, price_change, ignored events)
 * - Subscribe payload
 * - Connection lifecycle over a fake socket
 */

import { describe, expect, test } from "vitest";

import { buildSubscribeMessage, decodeMarketMessage, PolymarketMarketFeed } from "../src/polymarket/market-feed";
import type { WsConnectionOptions } from "../src/polymarket/ws-connection";
import { FakeWsConnection } from "./helpers/fake-ws-connection";

describe("decodeMarketMessage", () => {
  test("should decode a single book frame", () => {
    const result = decodeMarketMessage({
      event_type: "book",
      asset_id: "tok-up",
      bids: [{ price: "0.5", size: "10" }],
      asks: [],
    });

    expect(result._unsafeUnwrap().updates).toEqual([{ handle: "tok-up", bids: [{ price: 0.5, size: 10 }], asks: [] }]);
  });

  test("should decode a batched array of frames", () => {
    const result = decodeMarketMessage([
      { asset_id: "tok-up", bids: [{ price: "0.51", size: "3" }] },
      { asset_id: "tok-down", asks: [{ price: "0.48", size: "0" }] },
    ]);

    expect(result._unsafeUnwrap().updates).toEqual([
      { handle: "tok-up", bids: [{ price: 0.51, size: 3 }], asks: [] },
      { handle: "tok-down", bids: [], asks: [{ price: 0.48, size: 0 }] },
    ]);
  });

  test("should group price_change entries per asset by side", () => {
    const result = decodeMarketMessage({
      event_type: "price_change",
      market: "0xmarket",
      price_changes: [
        { asset_id: "tok-up", price: "0.51", size: "0", side: "BUY" },
        { asset_id: "tok-down", price: "0.49", size: "12", side: "SELL" },
        { asset_id: "tok-up", price: "0.53", size: "5", side: "SELL" },
      ],
    });

    expect(result._unsafeUnwrap().updates).toEqual([
      { handle: "tok-up", bids: [{ price: 0.51, size: 0 }], asks: [{ price: 0.53, size: 5 }] },
      { handle: "tok-down", bids: [], asks: [{ price: 0.49, size: 12 }] },
    ]);
  });

  test("should yield nothing for events without levels", () => {
    const result = decodeMarketMessage({ event_type: "last_trade_price", asset_id: "tok-up", price: "0.5" });

    expect(result._unsafeUnwrap().updates).toEqual([]);
  });

  test("should skip array entries that are not objects", () => {
    const result = decodeMarketMessage([1, { asset_id: "tok-up", bids: [{ price: "0.4", size: "2" }] }]);

    expect(result._unsafeUnwrap().updates).toEqual([{ handle: "tok-up", bids: [{ price: 0.4, size: 2 }], asks: [] }]);
  });

  test("should reject a text frame", () => {
    const result = decodeMarketMessage("INVALID OPERATION");

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "invalid_response",
      message: "Unexpected frame: INVALID OPERATION",
    });
  });

  test("should reject a price_change without entries", () => {
    const result = decodeMarketMessage({ event_type: "price_change", market: "0xmarket" });

    expect(result._unsafeUnwrapErr().type).toBe("invalid_response");
  });

  test("should keep the valid items of a batch and count the malformed ones", () => {
    const result = decodeMarketMessage([
      { asset_id: "tok-up", bids: [{ price: "x", size: "1" }] },
      { asset_id: "tok-down", asks: [{ price: "0.49", size: "7" }] },
      { event_type: "price_change", market: "0xmarket" },
    ]);

    expect(result._unsafeUnwrap()).toEqual({
      updates: [{ handle: "tok-down", bids: [], asks: [{ price: 0.49, size: 7 }] }],
      rejected: 2,
    });
  });

  test("should reject a batch in which every item is malformed", () => {
    const result = decodeMarketMessage([
      { asset_id: "tok-up", bids: [{ price: "x", size: "1" }] },
      { asset_id: "tok-down", asks: [{ price: "0.49", size: "y" }] },
    ]);

    expect(result._unsafeUnwrapErr().message.startsWith("Malformed book message:")).toBe(true);
  });

  test("should reject a book frame with unparseable levels", () => {
    const result = decodeMarketMessage({ asset_id: "tok-up", bids: [{ price: "x", size: "1" }] });

    expect(result._unsafeUnwrapErr().type).toBe("invalid_response");
  });
});

describe("PolymarketMarketFeed", () => {
  function createFeed(connection: FakeWsConnection) {
    const created: WsConnectionOptions[] = [];
    const feed = new PolymarketMarketFeed({
      wsUrl: "wss://feed.test/ws/market",
      pingIntervalMs: 30_000,
      connectionFactory: options => {
        created.push(options);
        return connection;
      },
    });
    return { feed, created };
  }

  test("should open a connection with the configured url and ping interval", async () => {
    const fake = new FakeWsConnection();
    const { feed, created } = createFeed(fake);

    const result = await feed.open();

    expect(result.isOk()).toBe(true);
    expect(created).toEqual([{ url: "wss://feed.test/ws/market", label: "market", pingIntervalMs: 30_000 }]);
  });

  test("should report connection_failed when the handshake fails", async () => {
    const fake = new FakeWsConnection();
    fake.connectError = new Error("ECONNREFUSED");
    const { feed } = createFeed(fake);

    const result = await feed.open();

    expect(result._unsafeUnwrapErr()).toEqual({ type: "connection_failed", message: "ECONNREFUSED" });
  });

  test("should send one subscribe frame per handle", async () => {
    const fake = new FakeWsConnection();
    const { feed } = createFeed(fake);
    const connection = (await feed.open())._unsafeUnwrap();

    expect(connection.subscribe("tok-up").isOk()).toBe(true);
    expect(connection.subscribe("tok-down").isOk()).toBe(true);

    expect(fake.sent).toEqual([buildSubscribeMessage("tok-up"), buildSubscribeMessage("tok-down")]);
    expect(fake.sent[0]).toEqual({ auth: {}, type: "subscribe", channel: "market", assets_ids: ["tok-up"] });
  });

  test("should fail to subscribe after close", async () => {
    const fake = new FakeWsConnection();
    const { feed } = createFeed(fake);
    const connection = (await feed.open())._unsafeUnwrap();

    await connection.close();
    const result = connection.subscribe("tok-up");

    expect(result._unsafeUnwrapErr().type).toBe("connection_failed");
  });

  test("should map frames to receive results", async () => {
    const fake = new FakeWsConnection();
    fake.frames.push(
      { kind: "message", data: { asset_id: "tok-up", bids: [{ price: "0.5", size: "1" }] } },
      { kind: "message", data: "PONG" },
      { kind: "closed", reason: "bye" },
    );
    const { feed } = createFeed(fake);
    const connection = (await feed.open())._unsafeUnwrap();

    expect(await connection.receive(1000)).toEqual({
      kind: "message",
      updates: [{ handle: "tok-up", bids: [{ price: 0.5, size: 1 }], asks: [] }],
      rejected: 0,
    });
    expect(await connection.receive(1000)).toEqual({ kind: "invalid", message: "Unexpected frame: PONG" });
    expect(await connection.receive(1000)).toEqual({ kind: "closed", reason: "bye" });
    expect(await connection.receive(1000)).toEqual({ kind: "timeout" });
    expect(fake.receiveTimeouts).toEqual([1000, 1000, 1000, 1000]);
  });
});
