/**
 * Repository Interfaces
 */

export * from "./instrument-repository";
export * from "./tick-repository";
