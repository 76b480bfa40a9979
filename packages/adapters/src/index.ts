/**
 * packages/adapters - Upstream Adapters
 *
 * - Port interfaces for instrument lookup, book snapshots and the delta feed
 * - Polymarket implementations
 */

// Port interfaces
export * from "./ports";

// Polymarket adapter
export * from "./polymarket";
