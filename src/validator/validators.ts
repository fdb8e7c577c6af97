/**
 * Dataset Invariant Validators
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * BUILD-TIME GATE FOR COMPILED PUZZLES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Runs a fixed battery of structural and cryptographic checks over every
 * compiled record. Checks never short-circuit: the report lists every
 * violation so one build run shows all problems.
 *
 * A dataset with any error-severity issue must not reach the registry.
 * Warnings describe incomplete history and pass unless the caller is strict.
 *
 * USAGE:
 *   const report = validate(dataset);
 *   if (!report.valid) {
 *     for (const issue of report.issues) {
 *       console.log(formatValidationIssue(issue));
 *     }
 *   }
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { CanonicalDataset, Puzzle, Solver } from "../puzzles/schema.js";
import { puzzleKey } from "../puzzles/schema.js";
import { chainInfo } from "../puzzles/chain.js";
import { keyRange, parsePuzzleDate } from "../puzzles/helpers.js";
import { decodeAddress, type DecodedAddress } from "../crypto/address.js";
import { hash160Hex, isHex } from "../crypto/hash.js";
import { decodeWif } from "../crypto/wif.js";
import { keyControlsAddress, parsePrivateKey } from "../crypto/keys.js";

/**
 * Severity levels for validation issues.
 * - error: dataset cannot be published
 * - warning: dataset can be published but the record should be reviewed
 */
export type ValidationSeverity = "error" | "warning";

/**
 * Validation rule identifiers for programmatic handling.
 */
export type ValidationRule =
  // identity
  | "DUPLICATE_ID"
  | "DUPLICATE_COLLECTION"
  | "COLLECTION_MISMATCH"
  // status
  | "STATUS_KEY_MISSING"
  | "STATUS_UNSOLVED_FIELDS"
  | "STATUS_SOLVER"
  // address
  | "CHAIN_MISMATCH"
  | "ADDRESS_DECODE"
  | "ADDRESS_KIND_MISMATCH"
  | "HASH160_MISSING"
  | "HASH160_MISMATCH"
  | "WITNESS_PROGRAM_MISSING"
  | "WITNESS_PROGRAM_MISMATCH"
  // key
  | "KEY_FORMAT"
  | "KEY_BITS_INVALID"
  | "KEY_BITS_MISMATCH"
  | "WIF_INVALID"
  | "WIF_KEY_MISMATCH"
  | "WIF_COMPRESSION_MISMATCH"
  | "KEY_ADDRESS_MISMATCH"
  | "SHARES_INVALID"
  // pubkey
  | "PUBKEY_FORMAT"
  | "PUBKEY_HASH_MISMATCH"
  // script
  | "SCRIPT_HASH_MISMATCH"
  | "SCRIPT_NOT_P2SH"
  // dates and history
  | "DATE_FORMAT"
  | "CHRONOLOGY"
  | "TXID_FORMAT"
  | "TX_AMOUNT"
  | "TX_ORDER"
  | "FUNDING_TX_MISSING"
  | "START_DATE_MISMATCH"
  | "CLAIM_TX_MISSING"
  | "SWEEP_TX_MISSING"
  // people and assets
  | "PROFILE_URL"
  | "ASSET_MISSING";

/**
 * A single invariant violation.
 */
export interface ValidationIssue {
  rule: ValidationRule;
  severity: ValidationSeverity;
  /** "<collection>/<id>", or "<collection>" for collection-level issues */
  puzzle: string;
  /** Dotted path of the offending field */
  field: string;
  message: string;
}

export interface ValidationReport {
  /** No error-severity issues */
  valid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  /** Number of puzzles checked */
  checked: number;
}

export interface ValidateOptions {
  /**
   * Repository root holding the "assets/" tree. When set, every asset path
   * referenced by a puzzle must exist under it.
   */
  assetRoot?: string;
}

/**
 * Thrown by validateOrThrow. Carries every error-severity issue.
 */
export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Dataset validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${formatValidationIssue(issue)}`);
    }
    return lines.join("\n");
  }
}

export function formatValidationIssue(issue: ValidationIssue): string {
  const label = issue.severity === "error" ? "ERROR" : "WARNING";
  return `[${label}] [${issue.rule}] ${issue.puzzle} ${issue.field}: ${issue.message}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// ISSUE COLLECTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Callback the individual checks report through.
 */
export type Report = (
  rule: ValidationRule,
  field: string,
  message: string,
  severity?: ValidationSeverity
) => void;

export function collector(puzzle: string, issues: ValidationIssue[]): Report {
  return (rule, field, message, severity = "error") => {
    issues.push({ rule, severity, puzzle, field, message });
  };
}

function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

const TXID_PATTERN = /^[0-9a-fA-F]{64}$/;
const ETH_TXID_PATTERN = /^0x[0-9a-fA-F]{64}$/;

// ═══════════════════════════════════════════════════════════════════════════
// PER-PUZZLE CHECKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Solved/claimed need the key; unsolved must not carry solve data.
 */
export function checkStatus(puzzle: Puzzle, report: Report): void {
  const hasHex = puzzle.key?.hex !== undefined;

  switch (puzzle.status) {
    case "solved":
    case "claimed":
      if (!hasHex) {
        report("STATUS_KEY_MISSING", "key.hex", `A ${puzzle.status} puzzle must have key.hex`);
      }
      break;
    case "unsolved":
      if (puzzle.solveDate !== undefined) {
        report("STATUS_UNSOLVED_FIELDS", "solveDate", "An unsolved puzzle must not have a solve date");
      }
      if (puzzle.solveTime !== undefined) {
        report("STATUS_UNSOLVED_FIELDS", "solveTime", "An unsolved puzzle must not have a solve time");
      }
      if (hasHex) {
        report("STATUS_UNSOLVED_FIELDS", "key.hex", "An unsolved puzzle must not have key.hex");
      }
      break;
    case "swept":
      break;
  }

  const solverAllowed = puzzle.status === "solved" || puzzle.status === "claimed";
  if (puzzle.solver !== undefined && !solverAllowed) {
    report("STATUS_SOLVER", "solver", `A ${puzzle.status} puzzle cannot have a solver`);
  }
  if (puzzle.claimer !== undefined && puzzle.status === "unsolved") {
    report("STATUS_SOLVER", "claimer", "An unsolved puzzle cannot have a claimer");
  }
}

/**
 * The address decodes for its chain to the declared kind and digests.
 * Returns the decoded form for the checks that build on it.
 */
export function checkAddress(puzzle: Puzzle, report: Report): DecodedAddress | undefined {
  const { address } = puzzle;

  if (address.chain !== puzzle.chain) {
    report("CHAIN_MISMATCH", "address.chain", `Address chain ${address.chain} differs from puzzle chain ${puzzle.chain}`);
  }

  const result = decodeAddress(address.value, puzzle.chain);
  if (!result.success) {
    report("ADDRESS_DECODE", "address.value", `Cannot decode ${address.value}: ${result.message}`);
    return undefined;
  }
  const decoded = result.address;

  if (decoded.kind !== address.kind) {
    report(
      "ADDRESS_KIND_MISMATCH",
      "address.kind",
      `Declared ${address.kind} but ${address.value} encodes ${decoded.kind}`
    );
  }

  const bitcoinLike = puzzle.chain === "bitcoin" || puzzle.chain === "litecoin";
  const needsHash160 = address.kind === "p2pkh" || address.kind === "p2wpkh" || address.kind === "p2sh";
  const segwitScript = address.kind === "p2wsh" || address.kind === "p2tr";

  if (address.hash160 !== undefined) {
    if (segwitScript) {
      report("HASH160_MISMATCH", "address.hash160", `A ${address.kind} address carries no hash160`);
    } else if (!isHex(address.hash160, 20)) {
      report("HASH160_MISMATCH", "address.hash160", "hash160 must be 40 hex characters");
    } else if (decoded.hash160 !== undefined && decoded.hash160 !== address.hash160) {
      report(
        "HASH160_MISMATCH",
        "address.hash160",
        `Declared ${address.hash160} but the address encodes ${decoded.hash160}`
      );
    }
  } else if (bitcoinLike && needsHash160) {
    report("HASH160_MISSING", "address.hash160", `A ${puzzle.chain} ${address.kind} address must declare its hash160`);
  }

  if (address.witnessProgram !== undefined) {
    if (decoded.witnessProgram === undefined) {
      report("WITNESS_PROGRAM_MISMATCH", "address.witnessProgram", `A ${decoded.kind} address has no witness program`);
    } else if (decoded.witnessProgram !== address.witnessProgram) {
      report(
        "WITNESS_PROGRAM_MISMATCH",
        "address.witnessProgram",
        `Declared ${address.witnessProgram} but the address encodes ${decoded.witnessProgram}`
      );
    }
  } else if (segwitScript) {
    report("WITNESS_PROGRAM_MISSING", "address.witnessProgram", `A ${address.kind} address must declare its witness program`);
  }

  return decoded;
}

/**
 * Compression of the key behind the address, when the record pins it down.
 */
function declaredCompression(puzzle: Puzzle): boolean | undefined {
  if (puzzle.pubkey !== undefined) {
    return puzzle.pubkey.format === "compressed";
  }
  const decrypted = puzzle.key?.wif?.decrypted;
  if (decrypted !== undefined) {
    const decoded = decodeWif(decrypted);
    if (decoded.success) {
      return decoded.wif.compressed;
    }
  }
  return undefined;
}

/**
 * Key material agrees with itself, the declared bit width and the address.
 */
export function checkKey(puzzle: Puzzle, report: Report): void {
  const key = puzzle.key;
  if (key === undefined) {
    return;
  }

  const range = key.bits !== undefined ? keyRange(key.bits) : undefined;
  if (key.bits !== undefined && range === undefined) {
    report("KEY_BITS_INVALID", "key.bits", `Bit width ${key.bits} is outside 1..256`);
  }

  let scalar: bigint | undefined;
  if (key.hex !== undefined) {
    // monero keys are ed25519 scalars; only the encoding is checked there
    scalar =
      puzzle.chain === "monero"
        ? isHex(key.hex, 32)
          ? BigInt(`0x${key.hex}`)
          : undefined
        : parsePrivateKey(key.hex);
    if (scalar === undefined) {
      report("KEY_FORMAT", "key.hex", "key.hex must be 64 hex characters encoding a valid secp256k1 key");
    }
  }

  if (scalar !== undefined && key.bits !== undefined && range !== undefined) {
    if (scalar < range.min || scalar > range.max) {
      report(
        "KEY_BITS_MISMATCH",
        "key.bits",
        `Key is ${bitLength(scalar)} bits, outside the declared ${key.bits}-bit range`
      );
    }
  }

  const decrypted = key.wif?.decrypted;
  if (decrypted !== undefined) {
    const wifVersion = chainInfo(puzzle.chain).wifVersion;
    const decoded = decodeWif(decrypted);
    if (!decoded.success) {
      report("WIF_INVALID", "key.wif.decrypted", decoded.message);
    } else if (wifVersion === undefined || decoded.wif.version !== wifVersion) {
      report(
        "WIF_INVALID",
        "key.wif.decrypted",
        `WIF version 0x${decoded.wif.version.toString(16)} is not valid for ${puzzle.chain}`
      );
    } else {
      if (key.hex !== undefined && decoded.wif.keyHex !== key.hex.toLowerCase()) {
        report("WIF_KEY_MISMATCH", "key.wif.decrypted", "Decrypted WIF encodes a different key than key.hex");
      }
      if (puzzle.pubkey !== undefined && decoded.wif.compressed !== (puzzle.pubkey.format === "compressed")) {
        report(
          "WIF_COMPRESSION_MISMATCH",
          "key.wif.decrypted",
          `WIF compression flag disagrees with the ${puzzle.pubkey.format} public key`
        );
      }
    }
  }

  if (scalar !== undefined && key.hex !== undefined && puzzle.chain !== "monero") {
    const derivable =
      puzzle.chain === "ethereum" ||
      ((puzzle.chain === "bitcoin" || puzzle.chain === "litecoin") &&
        (puzzle.address.kind === "p2pkh" || puzzle.address.kind === "p2wpkh"));
    if (derivable) {
      const match = keyControlsAddress(
        key.hex,
        puzzle.address.value,
        puzzle.chain,
        puzzle.address.kind,
        declaredCompression(puzzle)
      );
      if (match.success && !match.matches) {
        report(
          "KEY_ADDRESS_MISMATCH",
          "key.hex",
          `Key derives ${match.derived}, not ${puzzle.address.value}`
        );
      }
    }
  }

  const shares = key.shares;
  if (shares !== undefined) {
    if (shares.threshold < 1 || shares.threshold > shares.total) {
      report("SHARES_INVALID", "key.shares.threshold", `Threshold ${shares.threshold} must be within 1..${shares.total}`);
    }
    if (shares.shares.length > shares.total) {
      report("SHARES_INVALID", "key.shares.shares", `${shares.shares.length} shares listed but only ${shares.total} exist`);
    }
    const indexes = new Set<number>();
    for (const share of shares.shares) {
      if (share.index > shares.total || indexes.has(share.index)) {
        report("SHARES_INVALID", "key.shares.shares", `Share index ${share.index} is duplicated or exceeds ${shares.total}`);
      }
      indexes.add(share.index);
    }
  }
}

/**
 * Public key format, and its hash against the address.
 */
export function checkPubkey(puzzle: Puzzle, decoded: DecodedAddress | undefined, report: Report): void {
  const pubkey = puzzle.pubkey;
  if (pubkey === undefined) {
    return;
  }

  const value = pubkey.value.toLowerCase();
  const wellFormed =
    pubkey.format === "compressed"
      ? isHex(value, 33) && (value.startsWith("02") || value.startsWith("03"))
      : isHex(value, 65) && value.startsWith("04");
  if (!wellFormed) {
    report(
      "PUBKEY_FORMAT",
      "pubkey.value",
      pubkey.format === "compressed"
        ? "A compressed public key is 66 hex characters starting with 02 or 03"
        : "An uncompressed public key is 130 hex characters starting with 04"
    );
    return;
  }

  const hashed = puzzle.chain === "bitcoin" || puzzle.chain === "litecoin";
  const pubkeyHashKind = puzzle.address.kind === "p2pkh" || puzzle.address.kind === "p2wpkh";
  const expected = decoded?.hash160 ?? puzzle.address.hash160;
  if (hashed && pubkeyHashKind && expected !== undefined) {
    const actual = hash160Hex(value);
    if (actual !== expected) {
      report("PUBKEY_HASH_MISMATCH", "pubkey.value", `hash160 of the public key is ${actual}, address commits to ${expected}`);
    }
  }
}

/**
 * P2SH redeem script hashes to the script hash the address commits to.
 */
export function checkScript(puzzle: Puzzle, decoded: DecodedAddress | undefined, report: Report): void {
  const script = puzzle.address.redeemScript;
  if (script === undefined) {
    return;
  }
  if (puzzle.address.kind !== "p2sh") {
    report("SCRIPT_NOT_P2SH", "address.redeemScript", `A ${puzzle.address.kind} address cannot have a redeem script`);
    return;
  }
  if (!isHex(script.script)) {
    report("SCRIPT_HASH_MISMATCH", "address.redeemScript.script", "Redeem script must be hex");
    return;
  }

  const actual = hash160Hex(script.script);
  if (actual !== script.hash) {
    report("SCRIPT_HASH_MISMATCH", "address.redeemScript.hash", `Script hashes to ${actual}, declared ${script.hash}`);
  }
  const committed = decoded?.hash160 ?? puzzle.address.hash160;
  if (committed !== undefined && committed !== script.hash) {
    report("SCRIPT_HASH_MISMATCH", "address.redeemScript.hash", `Address commits to ${committed}, declared ${script.hash}`);
  }
}

/**
 * Date formats, solve after start, and a well-formed, ordered history.
 */
export function checkChronology(puzzle: Puzzle, report: Report): void {
  const start = puzzle.startDate !== undefined ? parsePuzzleDate(puzzle.startDate) : undefined;
  const solve = puzzle.solveDate !== undefined ? parsePuzzleDate(puzzle.solveDate) : undefined;

  if (puzzle.startDate !== undefined && start === undefined) {
    report("DATE_FORMAT", "startDate", `"${puzzle.startDate}" is not YYYY-MM-DD HH:MM:SS`);
  }
  if (puzzle.solveDate !== undefined && solve === undefined) {
    report("DATE_FORMAT", "solveDate", `"${puzzle.solveDate}" is not YYYY-MM-DD HH:MM:SS`);
  }
  if (start !== undefined && solve !== undefined && solve < start && !puzzle.preGenesis) {
    report("CHRONOLOGY", "solveDate", `Solve date ${puzzle.solveDate} is before start date ${puzzle.startDate}`);
  }

  let previous: number | undefined;
  puzzle.transactions.forEach((tx, i) => {
    const field = `transactions.${i}`;
    if (tx.txid !== undefined) {
      const pattern = puzzle.chain === "ethereum" ? ETH_TXID_PATTERN : TXID_PATTERN;
      if (!pattern.test(tx.txid)) {
        report(
          "TXID_FORMAT",
          `${field}.txid`,
          puzzle.chain === "ethereum" ? "Expected 0x followed by 64 hex characters" : "Expected 64 hex characters"
        );
      }
    }
    if (tx.amount !== undefined && !(tx.amount > 0)) {
      report("TX_AMOUNT", `${field}.amount`, `Amount must be positive, got ${tx.amount}`);
    }
    if (tx.date !== undefined) {
      const at = parsePuzzleDate(tx.date);
      if (at === undefined) {
        report("DATE_FORMAT", `${field}.date`, `"${tx.date}" is not YYYY-MM-DD HH:MM:SS`);
      } else {
        if (previous !== undefined && at < previous) {
          report("TX_ORDER", `${field}.date`, "Transactions must be listed in chronological order");
        }
        previous = at;
      }
    }
  });
}

/**
 * History completeness. Only applies once a record lists any transaction.
 */
export function checkHistory(puzzle: Puzzle, report: Report): void {
  const txs = puzzle.transactions;
  if (txs.length === 0) {
    return;
  }

  const funding = txs.find((tx) => tx.type === "funding");
  if (funding === undefined) {
    if (!puzzle.preGenesis) {
      report("FUNDING_TX_MISSING", "transactions", "No funding transaction listed", "warning");
    }
  } else if (puzzle.startDate !== undefined && funding.date !== undefined && funding.date !== puzzle.startDate) {
    report(
      "START_DATE_MISMATCH",
      "startDate",
      `Start date ${puzzle.startDate} differs from funding date ${funding.date}`,
      "warning"
    );
  }

  if ((puzzle.status === "solved" || puzzle.status === "claimed") && !txs.some((tx) => tx.type === "claim")) {
    report("CLAIM_TX_MISSING", "transactions", `A ${puzzle.status} puzzle should list its claim transaction`, "warning");
  }
  if (puzzle.status === "swept" && !txs.some((tx) => tx.type === "sweep")) {
    report("SWEEP_TX_MISSING", "transactions", "A swept puzzle should list its sweep transaction", "warning");
  }
}

function checkProfiles(person: Solver, field: string, report: Report): void {
  person.profiles.forEach((profile, i) => {
    if (!/^https?:\/\//.test(profile.url)) {
      report("PROFILE_URL", `${field}.profiles.${i}.url`, `Profile URL "${profile.url}" must use http or https`);
    }
  });
}

export function checkPeople(puzzle: Puzzle, report: Report): void {
  if (puzzle.solver !== undefined) {
    checkProfiles(puzzle.solver, "solver", report);
  }
  if (puzzle.claimer !== undefined) {
    checkProfiles(puzzle.claimer, "claimer", report);
  }
}

export function checkAssets(puzzle: Puzzle, assetRoot: string, report: Report): void {
  const assets = puzzle.assets;
  if (assets === undefined) {
    return;
  }
  const paths = [assets.puzzle, assets.solver, ...assets.hints].filter(
    (path): path is string => path !== undefined
  );
  for (const path of paths) {
    if (!existsSync(join(assetRoot, path))) {
      report("ASSET_MISSING", "assets", `Asset file not found: ${path}`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run every per-record check on one puzzle.
 */
export function validatePuzzle(puzzle: Puzzle, options: ValidateOptions = {}): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const report = collector(puzzleKey(puzzle), issues);

  checkStatus(puzzle, report);
  const decoded = checkAddress(puzzle, report);
  checkKey(puzzle, report);
  checkPubkey(puzzle, decoded, report);
  checkScript(puzzle, decoded, report);
  checkChronology(puzzle, report);
  checkHistory(puzzle, report);
  checkPeople(puzzle, report);
  if (options.assetRoot !== undefined) {
    checkAssets(puzzle, options.assetRoot, report);
  }

  return issues;
}

/**
 * (collection, id) pairs are unique across the dataset.
 *
 * Collection names and aliases share one namespace, and every puzzle must
 * name the collection that holds it.
 */
export function checkIdentity(dataset: CanonicalDataset): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const names = new Map<string, number>();
  const seen = new Map<string, string>();

  dataset.collections.forEach((collection, position) => {
    for (const name of [collection.name, ...collection.aliases]) {
      const owner = names.get(name);
      if (owner !== undefined) {
        issues.push({
          rule: "DUPLICATE_COLLECTION",
          severity: "error",
          puzzle: collection.name,
          field: name === collection.name ? "name" : "aliases",
          message: `Collection name "${name}" is already used by collections[${owner}]`,
        });
      } else {
        names.set(name, position);
      }
    }

    collection.puzzles.forEach((puzzle, index) => {
      const location = `collections[${position}].puzzles[${index}]`;
      if (puzzle.collection !== collection.name) {
        issues.push({
          rule: "COLLECTION_MISMATCH",
          severity: "error",
          puzzle: puzzleKey(puzzle),
          field: "collection",
          message: `Puzzle at ${location} names collection "${puzzle.collection}", not "${collection.name}"`,
        });
      }

      const key = `${collection.name}/${puzzle.id}`;
      const first = seen.get(key);
      if (first !== undefined) {
        issues.push({
          rule: "DUPLICATE_ID",
          severity: "error",
          puzzle: key,
          field: "id",
          message: `Duplicate puzzle "${key}" (first at ${first}, again at ${location})`,
        });
      } else {
        seen.set(key, location);
      }
    });
  });

  return issues;
}

/**
 * Validate a whole dataset, collecting every issue.
 */
export function validate(dataset: CanonicalDataset, options: ValidateOptions = {}): ValidationReport {
  const issues: ValidationIssue[] = [...checkIdentity(dataset)];
  let checked = 0;

  for (const collection of dataset.collections) {
    if (collection.author !== undefined) {
      checkProfiles(collection.author, "author", collector(collection.name, issues));
    }
    for (const puzzle of collection.puzzles) {
      issues.push(...validatePuzzle(puzzle, options));
      checked++;
    }
  }

  const errorCount = issues.filter((i) => i.severity === "error").length;
  return {
    valid: errorCount === 0,
    issues,
    errorCount,
    warningCount: issues.length - errorCount,
    checked,
  };
}

/**
 * Validate and throw when the dataset must not be published.
 *
 * @param strict - treat warnings as errors
 * @throws ValidationError listing every blocking issue
 */
export function validateOrThrow(
  dataset: CanonicalDataset,
  options: ValidateOptions & { strict?: boolean } = {}
): ValidationReport {
  const report = validate(dataset, options);
  const blocking = options.strict
    ? report.issues
    : report.issues.filter((i) => i.severity === "error");
  if (blocking.length > 0) {
    throw new ValidationError(`Dataset validation failed with ${blocking.length} issue(s)`, blocking);
  }
  return report;
}
