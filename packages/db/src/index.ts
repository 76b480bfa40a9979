// Schema and row types
export * from "./schema";
export * as schema from "./schema";

// Connection helper (Node-only)
export { closeDb, getDb } from "./get-db";
export type { Db, GetDbOptions, SchemaDatabase } from "./get-db";
