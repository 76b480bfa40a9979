/**
 * Postgres Repository Implementations
 */

export { createPostgresInstrumentRepository } from "./instrument-repository";
export { createPostgresTickRepository } from "./tick-repository";
