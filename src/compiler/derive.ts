/**
 * Derived values computed while compiling a puzzle description.
 *
 * Everything here is a pure function of the description. Inconsistent input
 * is not rejected at this stage: derivation skips what it cannot compute and
 * leaves the contradiction for the validator to report.
 */

import type {
  Address,
  Chain,
  Key,
  KeySource,
  Passphrase,
  PubkeyFormat,
  PuzzleStatus,
  Transaction,
} from "../puzzles/schema.js";
import { chainInfo, txExplorerUrl } from "../puzzles/chain.js";
import { parsePuzzleDate } from "../puzzles/helpers.js";
import { decodeWif, encodeWif } from "../crypto/wif.js";
import { parsePrivateKey } from "../crypto/keys.js";
import type { RawPuzzle } from "../ingest/descriptions.js";

type RawKey = NonNullable<RawPuzzle["key"]>;

/**
 * Seconds from funding to solve, for solved and claimed puzzles only.
 */
export function deriveSolveTime(
  status: PuzzleStatus,
  startDate: string | undefined,
  solveDate: string | undefined
): number | undefined {
  if (status !== "solved" && status !== "claimed") {
    return undefined;
  }
  if (startDate === undefined || solveDate === undefined) {
    return undefined;
  }
  const start = parsePuzzleDate(startDate);
  const solve = parsePuzzleDate(solveDate);
  if (start === undefined || solve === undefined || solve < start) {
    return undefined;
  }
  return solve - start;
}

export function deriveTransactions(
  chain: Chain,
  transactions: RawPuzzle["transactions"]
): Transaction[] {
  return transactions.map((tx) => ({
    type: tx.type,
    txid: tx.txid,
    date: tx.date,
    amount: tx.amount,
    url: tx.txid !== undefined ? txExplorerUrl(chain, tx.txid) : undefined,
  }));
}

function toPassphrase(raw: "required" | { known: string }): Passphrase {
  return raw === "required" ? { state: "required" } : { state: "known", value: raw.known };
}

/**
 * Canonical key with missing hex / decrypted WIF filled in from each other.
 *
 * Completion only happens on chains with a WIF version byte, and only from
 * material that decodes cleanly.
 */
export function deriveKey(raw: RawKey, chain: Chain, pubkeyFormat: PubkeyFormat | undefined): Key {
  const wifVersion = chainInfo(chain).wifVersion;
  let hex = raw.hex?.toLowerCase();
  let decrypted = raw.wif?.decrypted;

  if (wifVersion !== undefined) {
    if (hex === undefined && decrypted !== undefined) {
      const decoded = decodeWif(decrypted);
      if (decoded.success && decoded.wif.version === wifVersion) {
        hex = decoded.wif.keyHex;
      }
    } else if (hex !== undefined && decrypted === undefined && parsePrivateKey(hex) !== undefined) {
      decrypted = encodeWif(hex, wifVersion, pubkeyFormat !== "uncompressed");
    }
  }

  const wif =
    raw.wif !== undefined || decrypted !== undefined
      ? {
          decrypted,
          encrypted: raw.wif?.encrypted,
          passphrase: raw.wif?.passphrase,
        }
      : undefined;

  const entropy = raw.seed?.entropy;

  return {
    hex,
    wif,
    seed:
      raw.seed !== undefined
        ? {
            phrase: raw.seed.phrase,
            path: raw.seed.path,
            xpub: raw.seed.xpub,
            entropy:
              entropy !== undefined
                ? {
                    hash: entropy.hash,
                    source: entropy.source,
                    passphrase:
                      entropy.passphrase !== undefined ? toPassphrase(entropy.passphrase) : undefined,
                  }
                : undefined,
          }
        : undefined,
    mini: raw.mini,
    bits: raw.bits,
    shares: raw.shares,
  };
}

/**
 * How the key relates to the address, when the description does not say.
 */
export function inferKeySource(key: Key | undefined, address: Address): KeySource {
  if (key !== undefined) {
    if (key.hex !== undefined || key.wif?.decrypted !== undefined || key.mini !== undefined) {
      return "direct";
    }
    if (
      key.seed?.phrase !== undefined ||
      key.seed?.xpub !== undefined ||
      key.seed?.entropy !== undefined
    ) {
      return "derived";
    }
  }
  if (address.redeemScript !== undefined) {
    return "script";
  }
  return "unknown";
}

/**
 * Asset path relative to the repository root.
 */
export function assetPath(collection: string, file: string): string {
  return `assets/${collection}/${file}`;
}

/**
 * Recursively drop keys whose value is undefined, so that absent fields are
 * absent rather than present-and-undefined.
 */
export function pruneUndefined<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) {
      pruneUndefined(item);
    }
    return value;
  }
  if (value !== null && typeof value === "object") {
    for (const [name, child] of Object.entries(value)) {
      if (child === undefined) {
        Reflect.deleteProperty(value, name);
      } else {
        pruneUndefined(child);
      }
    }
  }
  return value;
}
