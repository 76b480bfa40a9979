/**
 * Port Interfaces
 */

export * from "./adapter-error";
export * from "./lookup-port";
export * from "./book-snapshot-port";
export * from "./delta-feed-port";
