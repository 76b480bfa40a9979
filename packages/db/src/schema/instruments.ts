/**
 * instruments - 時間枠ごとの up/down 銘柄 (1行/ウィンドウ)
 *
 * - collector の discovery が新しいウィンドウ開始時に insert (既存なら無視)
 * - 作成後に変更されるのは resolved のみ (expiry 時に true)
 * - open/close は epoch 秒
 */

import { bigint, boolean, index, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const instruments = pgTable(
  "instruments",
  {
    id: text("id").primaryKey(),
    yesTokenId: text("yes_token_id").notNull(),
    noTokenId: text("no_token_id").notNull(),
    openTimestamp: bigint("open_timestamp", { mode: "number" }).notNull(),
    closeTimestamp: bigint("close_timestamp", { mode: "number" }).notNull(),
    resolved: boolean("resolved").notNull().default(false),
    windowClass: text("window_class").notNull().default("5m"),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [index("instruments_window_class_idx").on(table.windowClass)],
);

export type InstrumentRow = typeof instruments.$inferSelect;
export type NewInstrumentRow = typeof instruments.$inferInsert;
