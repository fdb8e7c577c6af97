/**
 * Dataset serialization.
 *
 * The build step writes the validated dataset to disk once; every process
 * that queries puzzles loads that file instead of re-reading descriptions.
 *
 * The file wraps the dataset in an envelope:
 *
 *   { "formatVersion": "1.0.0", "dataset": { collections, version } }
 *
 * Loaders accept any file with the same major format version and reject the
 * rest, so a stale build output fails loudly rather than half-loading.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { CanonicalDatasetSchema, type CanonicalDataset } from "../puzzles/schema.js";

export const DATASET_FORMAT_VERSION = "1.0.0";

const DatasetEnvelopeSchema = z.object({
  formatVersion: z.string().regex(/^\d+\.\d+\.\d+$/, "Expected a semantic version"),
  dataset: CanonicalDatasetSchema,
});

export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

/**
 * Serialize a dataset to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializeDataset(dataset: CanonicalDataset, pretty = true): string {
  return JSON.stringify(
    { formatVersion: DATASET_FORMAT_VERSION, dataset },
    null,
    pretty ? 2 : undefined
  );
}

/**
 * Deserialize a dataset from a JSON string.
 *
 * @throws DatasetFormatError if parsing, validation or the version check fails
 */
export function deserializeDataset(json: string): CanonicalDataset {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new DatasetFormatError(
      `Failed to parse dataset JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = DatasetEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new DatasetFormatError(`Invalid dataset format: ${errors}`);
  }

  const { formatVersion, dataset } = result.data;
  if (!isVersionCompatible(formatVersion)) {
    throw new DatasetFormatError(
      `Incompatible dataset format version: ${formatVersion} ` +
        `(current: ${DATASET_FORMAT_VERSION}). Rebuild the dataset.`
    );
  }

  return dataset;
}

/**
 * Only an exact major version match is compatible.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = DATASET_FORMAT_VERSION.split(".").map(Number);
  return major === currentMajor;
}

/**
 * Write a dataset file, creating its directory if needed.
 *
 * @returns The path written
 */
export function saveDataset(dataset: CanonicalDataset, filePath: string): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, serializeDataset(dataset), "utf-8");
  return filePath;
}

/**
 * Read a dataset file.
 *
 * @throws DatasetFormatError if the file cannot be read or is invalid
 */
export function loadDataset(filePath: string): CanonicalDataset {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new DatasetFormatError(
      `Failed to read dataset file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return deserializeDataset(json);
}
