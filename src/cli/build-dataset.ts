#!/usr/bin/env node
/**
 * CLI command to build the puzzle dataset.
 *
 * Reads every collection document and the solver table, compiles them,
 * validates the result and writes the serialized dataset.
 *
 * Usage:
 *   npx tsx src/cli/build-dataset.ts [options]
 *   npm run build-dataset
 *
 * Options:
 *   --data <dir>      Description directory (default: DATA_DIR or "data")
 *   --out <file>      Output file (default: DATASET_PATH or "dist/dataset.json")
 *   --assets <dir>    Check asset paths against this root
 *   --verbose         Show warnings and per-collection counts
 *   --json            Output the build report as JSON (for CI parsing)
 *   --strict          Treat validation warnings as failures
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Dataset built and written
 *   1 - Loading, compilation or validation failed
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, validateConfig, ConfigError } from "../config/index.js";
import { createAppLogger, initRunId } from "../logging/index.js";
import { buildDataset, type BuildResult } from "../build/pipeline.js";
import { formatCompileIssue } from "../compiler/errors.js";
import { formatValidationIssue } from "../validator/validators.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      data: { type: "string", default: config.dataDir },
      out: { type: "string", default: config.datasetPath },
      assets: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: puzzle-build [options]

Options:
  --data <dir>      Description directory (default: ${config.dataDir})
  --out <file>      Output file (default: ${config.datasetPath})
  --assets <dir>    Check asset paths against this root
  --verbose         Show warnings and per-collection counts
  --json            Output the build report as JSON (for CI parsing)
  --strict          Treat validation warnings as failures
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Puzzle Dataset Build"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printError(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("red", "•")} ${text}`);
}

function printWarning(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("yellow", "•")} ${text}`);
}

function printDetail(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("dim", "•")} ${text}`);
}

function printResult(result: BuildResult, verbose: boolean): void {
  if (!result.success) {
    switch (result.stage) {
      case "load":
        console.log(`${c("red", "✗")} ${c("bold", "Load")}: ${result.message}`);
        break;
      case "compile":
        console.log(`${c("red", "✗")} ${c("bold", "Compile")}: ${result.issues.length} issue(s)`);
        result.issues.forEach((issue) => printError(formatCompileIssue(issue)));
        break;
      case "validate":
        console.log(`${c("red", "✗")} ${c("bold", "Validate")}: ${result.issues.length} issue(s)`);
        result.issues.forEach((issue) => printError(formatValidationIssue(issue)));
        break;
    }
    console.log("");
    return;
  }

  const { dataset, report } = result;
  console.log(
    `${c("green", "✓")} ${c("bold", "Compile")}: ${dataset.collections.length} collection(s), data ${dataset.version.dataHash}`
  );
  if (verbose) {
    for (const collection of dataset.collections) {
      printDetail(`${collection.name}: ${collection.puzzles.length} puzzle(s)`);
    }
  }
  console.log(
    `${c("green", "✓")} ${c("bold", "Validate")}: ${report.checked} puzzle(s), ${report.warningCount} warning(s)`
  );
  if (verbose) {
    report.issues.forEach((issue) => printWarning(formatValidationIssue(issue)));
  }
  if (result.outPath !== undefined) {
    console.log(`${c("green", "✓")} ${c("bold", "Write")}: ${result.outPath}`);
  }
  console.log("");
}

function toJsonReport(result: BuildResult): Record<string, unknown> {
  const timestamp = new Date().toISOString();
  if (!result.success) {
    return result.stage === "load"
      ? { timestamp, success: false, stage: result.stage, message: result.message }
      : { timestamp, success: false, stage: result.stage, issues: result.issues };
  }
  return {
    timestamp,
    success: true,
    outPath: result.outPath,
    version: result.dataset.version,
    collections: result.dataset.collections.map((collection) => ({
      name: collection.name,
      size: collection.puzzles.length,
    })),
    checked: result.report.checked,
    warnings: result.report.issues,
  };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();
  const runId = initRunId();

  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`${c("red", "✗")} ${c("bold", "Config")}: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const isJson = args.json === true;
  const isVerbose = args.verbose === true;
  // log lines go to the console only alongside --verbose human output
  const logger = createAppLogger("build", { console: isVerbose && !isJson });

  if (!isJson) {
    printHeader();
  }
  logger.debug("Build started", { runId });

  const result = buildDataset({
    dataDir: resolve(args.data ?? config.dataDir),
    outPath: resolve(args.out ?? config.datasetPath),
    ...(args.assets !== undefined ? { assetRoot: resolve(args.assets) } : {}),
    strict: args.strict === true,
    logger,
  });

  if (isJson) {
    console.log(JSON.stringify(toJsonReport(result), null, 2));
  } else {
    printResult(result, isVerbose);
    console.log("─".repeat(60));
    console.log(
      result.success ? c("green", "✓ Dataset built") : c("red", `✗ Build failed at ${result.stage}`)
    );
    console.log("─".repeat(60));
    console.log("");
  }

  process.exit(result.success ? 0 : 1);
}

try {
  main();
} catch (err) {
  console.error("Unexpected error:", err);
  process.exit(1);
}
