/**
 * TickWriter Unit Tests
 *
 * - Mid prices and elapsed seconds of a written tick
 * - Dedup against the last committed tick only
 * - Empty quotes are never written, even when forced
 * - Writes for one instrument are serialized
 */

import { beforeEach, describe, expect, test } from "vitest";
import { BookStore } from "@updown-recorder/core";

import { InstrumentRegistry } from "../../src/services/instrument-registry";
import { TickWriter } from "../../src/services/tick-writer";
import { FakeClock } from "../helpers/fake-ports";
import {
  InMemoryInstrumentRepository,
  InMemoryStorage,
  InMemoryTickRepository,
} from "../helpers/in-memory-repositories";

const OPEN_TS = 1_700_000_400;
const ID = "btc-updown-5m-1700000400";
const YES = "tok-yes";
const NO = "tok-no";

describe("TickWriter", () => {
  let storage: InMemoryStorage;
  let ticks: InMemoryTickRepository;
  let registry: InstrumentRegistry;
  let books: BookStore;
  let clock: FakeClock;
  let writer: TickWriter;

  beforeEach(async () => {
    storage = new InMemoryStorage();
    ticks = new InMemoryTickRepository(storage);
    registry = new InstrumentRegistry(new InMemoryInstrumentRepository(storage), 30);
    books = new BookStore();
    clock = new FakeClock(OPEN_TS * 1000 + 12_500);
    writer = new TickWriter(registry, books, ticks, clock.now);

    await registry.register({
      id: ID,
      handles: { yes: YES, no: NO },
      openTs: OPEN_TS,
      closeTs: OPEN_TS + 300,
      windowClass: "5m",
    });
    books.replaceSnapshot(YES, [{ price: 0.5, size: 100 }], [{ price: 0.52, size: 80 }]);
    books.replaceSnapshot(NO, [{ price: 0.46, size: 90 }], [{ price: 0.48, size: 60 }]);
  });

  test("writes best prices, rounded mids and elapsed seconds", async () => {
    const written = await writer.writeTick(ID, "snapshot");

    expect(written).toBe(true);
    expect(storage.ticks).toHaveLength(1);
    expect(storage.ticks[0]).toEqual({
      instrumentId: ID,
      ts: new Date(OPEN_TS * 1000 + 12_500),
      epochMs: OPEN_TS * 1000 + 12_500,
      secondsElapsed: 12.5,
      yesBestBid: 0.5,
      yesBestAsk: 0.52,
      noBestBid: 0.46,
      noBestAsk: 0.48,
      yesMid: 0.51,
      noMid: 0.47,
      source: "snapshot",
    });
  });

  test("skips a tick whose four prices match the last committed tick", async () => {
    expect(await writer.writeTick(ID, "snapshot")).toBe(true);
    expect(await writer.writeTick(ID, "snapshot")).toBe(false);

    books.applyDelta(YES, [{ price: 0.51, size: 10 }], []);
    expect(await writer.writeTick(ID, "delta")).toBe(true);

    expect(storage.ticks.map(t => [t.yesBestBid, t.source])).toEqual([
      [0.5, "snapshot"],
      [0.51, "delta"],
    ]);
    expect(writer.getStats()).toEqual({ written: 2, skipped: 1, failed: 0 });
  });

  test("a one-sided quote is written with a null mid", async () => {
    books.replaceSnapshot(NO, [], [{ price: 0.48, size: 60 }]);

    await writer.writeTick(ID, "snapshot");

    expect(storage.ticks[0]?.noBestBid).toBeNull();
    expect(storage.ticks[0]?.noMid).toBeNull();
    expect(storage.ticks[0]?.yesMid).toBe(0.51);
  });

  test("force bypasses dedup", async () => {
    await writer.writeTick(ID, "snapshot");

    expect(await writer.writeTick(ID, "snapshot", true)).toBe(true);
    expect(storage.ticks).toHaveLength(2);
  });

  test("an empty quote is skipped even when forced", async () => {
    books.forget(YES);
    books.forget(NO);

    expect(await writer.writeTick(ID, "snapshot", true)).toBe(false);
    expect(ticks.attempts).toBe(0);
    expect(writer.getStats().skipped).toBe(1);
  });

  test("an untracked instrument writes nothing and counts nothing", async () => {
    expect(await writer.writeTick("btc-updown-5m-1700000700", "snapshot")).toBe(false);
    expect(writer.getStats()).toEqual({ written: 0, skipped: 0, failed: 0 });
  });

  test("a failed insert does not become the dedup reference", async () => {
    ticks.failing = true;
    expect(await writer.writeTick(ID, "snapshot")).toBe(false);
    expect(writer.getStats().failed).toBe(1);

    ticks.failing = false;
    expect(await writer.writeTick(ID, "snapshot")).toBe(true);
    expect(storage.ticks).toHaveLength(1);
  });

  test("concurrent writes for one instrument run one after another", async () => {
    const results = await Promise.all([writer.writeTick(ID, "snapshot"), writer.writeTick(ID, "delta")]);

    expect(results).toEqual([true, false]);
    expect(storage.ticks.map(t => t.source)).toEqual(["snapshot"]);
  });

  test("forget clears the dedup reference", async () => {
    await writer.writeTick(ID, "snapshot");
    writer.forget(ID);

    expect(await writer.writeTick(ID, "snapshot")).toBe(true);
  });
});
