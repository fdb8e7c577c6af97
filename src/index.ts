/**
 * Crypto puzzle catalog.
 *
 * Build time:  readDescriptionSources → compile → validate → saveDataset
 *              (or buildDataset, which runs all four)
 * Query time:  getRegistry() / createRegistry(dataset) → get, all, stats,
 *              filter, search
 */

export * from "./puzzles/index.js";
export * from "./crypto/index.js";
export * from "./ingest/index.js";
export * from "./compiler/index.js";
export * from "./validator/index.js";
export * from "./registry/index.js";
export * from "./search/index.js";
export * from "./build/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
