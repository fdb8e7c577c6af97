/**
 * Process-wide registry handle.
 *
 * The registry is built at most once per process, on first use, from the
 * dataset file named by DATASET_PATH. Loading and validation are synchronous,
 * so two callers can never observe a half-built registry.
 *
 * Tests and tools that need their own data call createRegistry instead.
 */

import { config } from "../config/index.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { CanonicalDataset } from "../puzzles/schema.js";
import { validateOrThrow } from "../validator/validators.js";
import { PuzzleRegistry } from "./registry.js";
import { loadDataset } from "./serialization.js";

export interface RegistryOptions {
  logger?: Logger;
}

/**
 * Validate a dataset and build an independent registry over it.
 *
 * @throws ValidationError if the dataset breaks any invariant
 */
export function createRegistry(
  dataset: CanonicalDataset,
  options: RegistryOptions = {}
): PuzzleRegistry {
  const logger = options.logger ?? silentLogger;
  const report = validateOrThrow(dataset);
  const registry = PuzzleRegistry.create(dataset);
  logger.debug("Registry built", {
    puzzles: registry.size,
    warnings: report.warningCount,
    dataHash: registry.version.dataHash,
  });
  return registry;
}

/**
 * Load a dataset file and build a registry over it.
 *
 * @throws DatasetFormatError if the file is missing or malformed
 * @throws ValidationError if the dataset breaks any invariant
 */
export function loadRegistry(filePath: string, options: RegistryOptions = {}): PuzzleRegistry {
  const logger = options.logger ?? silentLogger;
  logger.info("Loading dataset", { path: filePath });
  return createRegistry(loadDataset(filePath), { logger });
}

let shared: PuzzleRegistry | undefined;

/**
 * The process-wide registry, loaded from DATASET_PATH on the first call.
 */
export function getRegistry(options: RegistryOptions = {}): PuzzleRegistry {
  if (shared === undefined) {
    shared = loadRegistry(config.datasetPath, options);
  }
  return shared;
}
