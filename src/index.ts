/**
 * Barrel exports.
 *
 * Re-exports the rule modules and pipelines so they can be reused
 * programmatically. The CLI lives in `cli.ts`.
 */
export * from "./cleaner";
export * from "./dosage";
export * from "./errors";
export * from "./loader";
export * from "./pipelines";
export * from "./report";
export * from "./rules";
export * from "./types";
