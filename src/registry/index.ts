/**
 * Dataset registry and query engine.
 */

export {
  PuzzleRegistry,
  NotFoundError,
  type NotFound,
  type NotFoundSegment,
  type GetResult,
  type AllResult,
  type StatsResult,
  type PuzzleFilter,
  type RegistryStats,
} from "./registry.js";
export {
  serializeDataset,
  deserializeDataset,
  isVersionCompatible,
  saveDataset,
  loadDataset,
  DatasetFormatError,
  DATASET_FORMAT_VERSION,
} from "./serialization.js";
export { createRegistry, loadRegistry, getRegistry, type RegistryOptions } from "./dataset.js";
