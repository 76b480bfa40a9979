/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all database schemas
 * - Timestamps are timestamptz (UTC); window bounds are epoch seconds
 */

// Instruments (1行/ウィンドウ, resolved のみ更新)
export * from "./instruments";

// Ticks (時系列 append)
export * from "./price-ticks";
