/**
 * Reads description documents from a data directory.
 *
 *   <dataDir>/collections/*.json   collection documents
 *   <dataDir>/solvers.json         solver table
 *
 * Collection documents are returned sorted by file name so that the
 * compiled declaration order does not depend on directory listing order.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { SourceDocument } from "./descriptions.js";

export class DescriptionLoadError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "DescriptionLoadError";
    this.path = path;
  }
}

export interface DescriptionSources {
  collections: SourceDocument[];
  solvers: SourceDocument;
}

export const COLLECTIONS_DIR = "collections";
export const SOLVERS_FILE = "solvers.json";

function readSource(path: string): SourceDocument {
  try {
    return {
      name: basename(path, extname(path)),
      text: readFileSync(path, "utf-8"),
    };
  } catch (err) {
    throw new DescriptionLoadError(
      `Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }
}

/**
 * Read every description document under `dataDir`.
 *
 * @throws DescriptionLoadError if the directory layout is incomplete
 */
export function readDescriptionSources(dataDir: string): DescriptionSources {
  const collectionsDir = join(dataDir, COLLECTIONS_DIR);
  const solversPath = join(dataDir, SOLVERS_FILE);

  if (!existsSync(collectionsDir)) {
    throw new DescriptionLoadError(`Collections directory not found: ${collectionsDir}`, collectionsDir);
  }
  if (!existsSync(solversPath)) {
    throw new DescriptionLoadError(`Solver table not found: ${solversPath}`, solversPath);
  }

  const files = readdirSync(collectionsDir)
    .filter((file) => file.endsWith(".json"))
    .sort();

  return {
    collections: files.map((file) => readSource(join(collectionsDir, file))),
    solvers: readSource(solversPath),
  };
}
