/**
 * Polymarket wire types
 *
 * Gamma: https://gamma-api.polymarket.com/markets?slug=...
 * CLOB REST: https://clob.polymarket.com/book?token_id=...
 * CLOB WS market channel: wss://ws-subscriptions-clob.polymarket.com/ws/market
 *
 * Prices and sizes arrive as decimal strings.
 */

import { z } from "zod";

export const DEFAULT_GAMMA_API_URL = "https://gamma-api.polymarket.com";
export const DEFAULT_CLOB_API_URL = "https://clob.polymarket.com";
export const DEFAULT_CLOB_WS_URL = "wss://ws-subscriptions-clob.polymarket.com/ws/market";

const DecimalSchema = z.coerce.number().finite();

// ─────────────────────────────────────────────────────────────────────────────
// Gamma
// ─────────────────────────────────────────────────────────────────────────────

export const GammaTokenSchema = z.object({
  outcome: z.string(),
  token_id: z.string(),
});

/**
 * `clobTokenIds` and `outcomes` are usually JSON-encoded string arrays,
 * occasionally real arrays.
 */
const StringListSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Gamma sends `null` for absent lists as often as it omits them.
 */
export const GammaMarketSchema = z.object({
  slug: z.string().nullish(),
  tokens: z.array(GammaTokenSchema).nullish(),
  clobTokenIds: StringListSchema.nullish(),
  outcomes: StringListSchema.nullish(),
});

export const GammaMarketsResponseSchema = z.array(GammaMarketSchema);

export type GammaToken = z.infer<typeof GammaTokenSchema>;
export type GammaMarket = z.infer<typeof GammaMarketSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// CLOB REST
// ─────────────────────────────────────────────────────────────────────────────

export const ClobLevelSchema = z.object({
  price: DecimalSchema,
  size: DecimalSchema,
});

export const ClobBookSchema = z.object({
  asset_id: z.string().optional(),
  bids: z.array(ClobLevelSchema).default([]),
  asks: z.array(ClobLevelSchema).default([]),
});

export type ClobLevel = z.infer<typeof ClobLevelSchema>;
export type ClobBook = z.infer<typeof ClobBookSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// CLOB WS (market channel)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subscribe frame, one per asset
 */
export interface MarketSubscribeMessage {
  auth: Record<string, never>;
  type: "subscribe";
  channel: "market";
  assets_ids: string[];
}

/**
 * `book` events and other frames that carry levels for one asset
 */
export const WsBookMessageSchema = z.object({
  event_type: z.string().optional(),
  asset_id: z.string().min(1),
  bids: z.array(ClobLevelSchema).default([]),
  asks: z.array(ClobLevelSchema).default([]),
});

export const WsPriceChangeSchema = z.object({
  asset_id: z.string().min(1),
  price: DecimalSchema,
  size: DecimalSchema,
  side: z.enum(["BUY", "SELL"]),
});

export const WsPriceChangeMessageSchema = z.object({
  event_type: z.literal("price_change"),
  market: z.string().optional(),
  price_changes: z.array(WsPriceChangeSchema),
});

export type WsBookMessage = z.infer<typeof WsBookMessageSchema>;
export type WsPriceChange = z.infer<typeof WsPriceChangeSchema>;
export type WsPriceChangeMessage = z.infer<typeof WsPriceChangeMessageSchema>;
