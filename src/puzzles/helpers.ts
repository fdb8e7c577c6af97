/**
 * Pure helpers over canonical puzzle records.
 */

import type { Puzzle, Transaction } from "./schema.js";

/**
 * Inclusive numeric range of a key with the given bit width:
 * [2^(bits-1), 2^bits - 1]. Undefined outside 1..256.
 */
export function keyRange(bits: number): { min: bigint; max: bigint } | undefined {
  if (!Number.isInteger(bits) || bits < 1 || bits > 256) {
    return undefined;
  }
  const width = BigInt(bits);
  return { min: 1n << (width - 1n), max: (1n << width) - 1n };
}

export function fundingTransaction(puzzle: Puzzle): Transaction | undefined {
  return puzzle.transactions.find((tx) => tx.type === "funding");
}

export function claimTransaction(puzzle: Puzzle): Transaction | undefined {
  return puzzle.transactions.find((tx) => tx.type === "claim");
}

export function hasPrivateKey(puzzle: Puzzle): boolean {
  return puzzle.key?.hex !== undefined;
}

/**
 * Remote URL of the main puzzle asset, when a base URL is configured.
 */
export function assetUrl(puzzle: Puzzle, baseUrl: string | undefined): string | undefined {
  const path = puzzle.assets?.puzzle;
  if (path === undefined || baseUrl === undefined || baseUrl === "") {
    return undefined;
  }
  return `${baseUrl.replace(/\/+$/, "")}/${path}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// DATES & DURATIONS
// ═══════════════════════════════════════════════════════════════════════════

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse a "YYYY-MM-DD HH:MM:SS" UTC timestamp into epoch seconds.
 * Returns undefined for anything else, including impossible calendar dates.
 */
export function parsePuzzleDate(value: string): number | undefined {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(millis);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return millis / 1000;
}

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const MONTH = 30 * DAY;
const YEAR = 365 * DAY;

/**
 * Human-readable duration, e.g. "9y 8mo 3d 4h 52m".
 * Months are 30 days and years 365 days; durations under a minute print as "Ns".
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  let remaining = total;
  const units: Array<[number, string]> = [
    [YEAR, "y"],
    [MONTH, "mo"],
    [DAY, "d"],
    [HOUR, "h"],
    [MINUTE, "m"],
  ];

  const parts: string[] = [];
  for (const [size, suffix] of units) {
    const count = Math.floor(remaining / size);
    remaining %= size;
    if (count > 0) {
      parts.push(`${count}${suffix}`);
    }
  }

  return parts.length > 0 ? parts.join(" ") : `${total}s`;
}
