/**
 * Polymarket Adapter
 */

export { GammaLookupClient, extractSideHandles } from "./gamma-lookup-client";
export { ClobBookClient } from "./clob-book-client";
export { PolymarketMarketFeed, buildSubscribeMessage, decodeMarketMessage } from "./market-feed";
export type { DecodedFrame } from "./market-feed";
export type { PolymarketMarketFeedOptions } from "./market-feed";
export type { RestClientOptions } from "./http";
export { WsConnection, defaultConnectionFactory } from "./ws-connection";
export type { IWsConnection, WsConnectionFactory, WsConnectionOptions, WsReceiveResult } from "./ws-connection";
export { DEFAULT_CLOB_API_URL, DEFAULT_CLOB_WS_URL, DEFAULT_GAMMA_API_URL } from "./types";
export type { GammaMarket, MarketSubscribeMessage } from "./types";
