/**
 * Dataset build pipeline.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DESCRIPTIONS → COMPILE → VALIDATE → SERIALIZE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The only place malformed data is rejected. Either every stage passes and
 * the dataset file is written, or nothing is written and the result carries
 * every issue from the stage that failed.
 */

import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { CanonicalDataset } from "../puzzles/schema.js";
import {
  DescriptionLoadError,
  readDescriptionSources,
  type DescriptionSources,
} from "../ingest/loader.js";
import { compile } from "../compiler/compiler.js";
import type { CompileIssue } from "../compiler/errors.js";
import {
  validate,
  type ValidationIssue,
  type ValidationReport,
} from "../validator/validators.js";
import { saveDataset } from "../registry/serialization.js";

export interface BuildOptions {
  /** Directory holding collections/ and solvers.json */
  dataDir: string;
  /** Where to write the dataset; nothing is written when omitted */
  outPath?: string;
  /** Repository root to check asset paths against */
  assetRoot?: string;
  /** Treat validation warnings as failures */
  strict?: boolean;
  /** Build timestamp; defaults to now */
  builtAt?: string;
  logger?: Logger;
}

export type BuildResult =
  | {
      success: true;
      dataset: CanonicalDataset;
      report: ValidationReport;
      outPath?: string;
    }
  | { success: false; stage: "load"; message: string }
  | { success: false; stage: "compile"; issues: CompileIssue[] }
  | { success: false; stage: "validate"; issues: ValidationIssue[]; report: ValidationReport };

/**
 * Run the whole build.
 *
 * @throws only for unexpected I/O failures while writing the output
 */
export function buildDataset(options: BuildOptions): BuildResult {
  const logger = options.logger ?? silentLogger;

  logger.info("Reading descriptions", { dataDir: options.dataDir });
  let sources: DescriptionSources;
  try {
    sources = readDescriptionSources(options.dataDir);
  } catch (err) {
    if (err instanceof DescriptionLoadError) {
      logger.error(err.message, { path: err.path });
      return { success: false, stage: "load", message: err.message };
    }
    throw err;
  }
  logger.debug("Descriptions read", { collections: sources.collections.length });

  const compiled = compile(sources, options.builtAt !== undefined ? { builtAt: options.builtAt } : {});
  if (!compiled.success) {
    logger.error("Compilation failed", { issues: compiled.issues.length });
    return { success: false, stage: "compile", issues: compiled.issues };
  }
  const { dataset } = compiled;
  logger.info("Compiled dataset", {
    collections: dataset.collections.length,
    dataHash: dataset.version.dataHash,
  });

  const report = validate(
    dataset,
    options.assetRoot !== undefined ? { assetRoot: options.assetRoot } : {}
  );
  const blocking = options.strict
    ? report.issues
    : report.issues.filter((issue) => issue.severity === "error");
  if (blocking.length > 0) {
    logger.error("Validation failed", {
      errors: report.errorCount,
      warnings: report.warningCount,
      strict: options.strict ?? false,
    });
    return { success: false, stage: "validate", issues: blocking, report };
  }
  if (report.warningCount > 0) {
    logger.warn("Validation passed with warnings", { warnings: report.warningCount });
  }
  logger.info("Validated dataset", { puzzles: report.checked });

  if (options.outPath === undefined) {
    return { success: true, dataset, report };
  }
  const outPath = saveDataset(dataset, options.outPath);
  logger.info("Wrote dataset", { path: outPath });
  return { success: true, dataset, report, outPath };
}
