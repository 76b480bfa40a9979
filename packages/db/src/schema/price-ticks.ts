/**
 * price_ticks - Best-price observations (時系列 append)
 *
 * - 価格が変化した時のみ collector が append (重複 tick は書かない)
 * - instrument 削除時は cascade で削除
 * - epoch_ms index for range queries
 */

import { bigint, bigserial, doublePrecision, index, pgTable, text, timestamp } from "drizzle-orm/pg-core";

import { instruments } from "./instruments";

export const priceTicks = pgTable(
  "price_ticks",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    instrumentId: text("instrument_id")
      .notNull()
      .references(() => instruments.id, { onDelete: "cascade" }),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    epochMs: bigint("epoch_ms", { mode: "number" }).notNull(),
    secondsElapsed: doublePrecision("seconds_elapsed"),
    yesBestBid: doublePrecision("yes_best_bid"),
    yesBestAsk: doublePrecision("yes_best_ask"),
    noBestBid: doublePrecision("no_best_bid"),
    noBestAsk: doublePrecision("no_best_ask"),
    yesMid: doublePrecision("yes_mid"),
    noMid: doublePrecision("no_mid"),
    source: text("source").notNull().default("snapshot"),
  },
  table => [
    index("price_ticks_instrument_id_idx").on(table.instrumentId),
    index("price_ticks_epoch_ms_idx").on(table.epochMs),
  ],
);

export type PriceTickRow = typeof priceTicks.$inferSelect;
export type NewPriceTickRow = typeof priceTicks.$inferInsert;
