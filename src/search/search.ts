/**
 * Puzzle search.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUBSTRING / EXACT MATCH OVER A FIXED FIELD LIST
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every puzzle is checked against the same ordered list of fields. A puzzle
 * matches when at least one field does. Hits are ranked by:
 *
 *   score = 100 × distinct matched fields
 *         + max(0, 100 − byte offset of the match in the first matched field)
 *
 * where "first" follows the field order below. Sorting is stable, so equal
 * scores keep declaration order, and the same query always gives the same
 * result. Scores only order hits; they are not meant to be stored.
 */

import type { Puzzle } from "../puzzles/schema.js";
import { chainDisplayName } from "../puzzles/chain.js";
import type { PuzzleRegistry } from "../registry/registry.js";

/**
 * Field labels in match order.
 */
export const SEARCH_FIELDS = [
  "id",
  "address.value",
  "address.hash160",
  "address.witness_program",
  "pubkey.value",
  "key.hex",
  "key.wif.encrypted",
  "key.wif.decrypted",
  "key.seed.phrase",
  "key.mini",
  "solver.name",
  "solver.addresses",
  "transactions.txid",
  "chain",
] as const;
export type SearchField = (typeof SEARCH_FIELDS)[number];

export interface SearchOptions {
  /** Whole-value equality instead of substring containment */
  exact?: boolean;
  caseSensitive?: boolean;
  /** Maximum number of hits, applied after ranking; 0 yields no hits */
  limit?: number;
  /** Restrict to one collection (name or alias) */
  collection?: string;
}

export interface SearchHit {
  puzzle: Readonly<Puzzle>;
  /** Distinct labels that matched, sorted alphabetically */
  matchedFields: SearchField[];
  score: number;
}

export type InvalidQueryReason = "empty_query" | "unknown_collection" | "invalid_limit";

export interface InvalidQuery {
  kind: "invalid_query";
  reason: InvalidQueryReason;
  message: string;
}

export type SearchResult =
  | { success: true; hits: SearchHit[] }
  | { success: false; error: InvalidQuery };

export class InvalidQueryError extends Error {
  public readonly reason: InvalidQueryReason;

  constructor(error: InvalidQuery) {
    super(error.message);
    this.name = "InvalidQueryError";
    this.reason = error.reason;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Searchable values of one field. Array-valued fields yield every entry.
 */
function fieldValues(puzzle: Readonly<Puzzle>, field: SearchField, qualifiedId: boolean): string[] {
  const present = (value: string | undefined): string[] => (value !== undefined ? [value] : []);

  switch (field) {
    case "id":
      return [qualifiedId ? `${puzzle.collection}/${puzzle.id}` : puzzle.id];
    case "address.value":
      return [puzzle.address.value];
    case "address.hash160":
      return present(puzzle.address.hash160);
    case "address.witness_program":
      return present(puzzle.address.witnessProgram);
    case "pubkey.value":
      return present(puzzle.pubkey?.value);
    case "key.hex":
      return present(puzzle.key?.hex);
    case "key.wif.encrypted":
      return present(puzzle.key?.wif?.encrypted);
    case "key.wif.decrypted":
      return present(puzzle.key?.wif?.decrypted);
    case "key.seed.phrase":
      return present(puzzle.key?.seed?.phrase);
    case "key.mini":
      return present(puzzle.key?.mini);
    case "solver.name":
      return present(puzzle.solver?.name);
    case "solver.addresses":
      return puzzle.solver !== undefined ? [...puzzle.solver.addresses] : [];
    case "transactions.txid":
      return puzzle.transactions.flatMap((tx) => present(tx.txid));
    case "chain":
      return [chainDisplayName(puzzle.chain)];
  }
}

const encoder = new TextEncoder();

/** Byte offset of the first match, or undefined when the value does not match */
type Matcher = (value: string) => number | undefined;

function createMatcher(query: string, exact: boolean, caseSensitive: boolean): Matcher {
  const needle = caseSensitive ? query : query.toLowerCase();
  return (value) => {
    const haystack = caseSensitive ? value : value.toLowerCase();
    if (exact) {
      return haystack === needle ? 0 : undefined;
    }
    const index = haystack.indexOf(needle);
    if (index === -1) {
      return undefined;
    }
    return encoder.encode(haystack.slice(0, index)).length;
  };
}

/**
 * Match one puzzle against every field; undefined when nothing matched.
 */
function scorePuzzle(
  puzzle: Readonly<Puzzle>,
  matcher: Matcher,
  qualifiedId: boolean
): SearchHit | undefined {
  const matched: SearchField[] = [];
  let firstPosition: number | undefined;

  for (const field of SEARCH_FIELDS) {
    for (const value of fieldValues(puzzle, field, qualifiedId)) {
      const position = matcher(value);
      if (position !== undefined) {
        matched.push(field);
        firstPosition ??= position;
        break;
      }
    }
  }

  if (firstPosition === undefined) {
    return undefined;
  }
  return {
    puzzle,
    matchedFields: matched.sort(),
    score: 100 * matched.length + Math.max(0, 100 - firstPosition),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════

function invalid(reason: InvalidQueryReason, message: string): SearchResult {
  return { success: false, error: { kind: "invalid_query", reason, message } };
}

/**
 * Search the registry.
 *
 * @example
 *   const result = search(registry, "gsmg");
 *   if (result.success) {
 *     for (const hit of result.hits) {
 *       console.log(hit.puzzle.id, hit.matchedFields.join(", "));
 *     }
 *   }
 */
export function search(
  registry: PuzzleRegistry,
  query: string,
  options: SearchOptions = {}
): SearchResult {
  if (query.trim() === "") {
    return invalid("empty_query", "Search query must not be empty");
  }
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    return invalid("invalid_limit", `Limit must be a non-negative integer, got ${options.limit}`);
  }

  const candidates = registry.all(options.collection);
  if (!candidates.success) {
    return invalid("unknown_collection", candidates.error.message);
  }

  const matcher = createMatcher(query, options.exact ?? false, options.caseSensitive ?? false);
  const qualifiedId = query.includes("/");
  const hits: SearchHit[] = [];
  for (const puzzle of candidates.puzzles) {
    const hit = scorePuzzle(puzzle, matcher, qualifiedId);
    if (hit !== undefined) {
      hits.push(hit);
    }
  }

  // Array.prototype.sort is stable: equal scores keep declaration order
  hits.sort((a, b) => b.score - a.score);

  return {
    success: true,
    hits: options.limit !== undefined ? hits.slice(0, options.limit) : hits,
  };
}

/**
 * @throws InvalidQueryError for an empty query, bad limit or unknown collection
 */
export function searchOrThrow(
  registry: PuzzleRegistry,
  query: string,
  options: SearchOptions = {}
): SearchHit[] {
  const result = search(registry, query, options);
  if (!result.success) {
    throw new InvalidQueryError(result.error);
  }
  return result.hits;
}
