/**
 * Puzzle Search Tests
 *
 * Run with: node --import tsx --test src/search/search.test.ts
 *
 * These tests verify:
 *   1. Substring, exact and case-sensitive matching
 *   2. Ranking by matched fields and match position
 *   3. Collection scoping, result limits and repeatability
 *   4. Invalid queries are rejected with a reason
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";
import { compileOrThrow } from "../compiler/compiler.js";
import { readDescriptionSources } from "../ingest/loader.js";
import type { Puzzle } from "../puzzles/schema.js";
import { PuzzleRegistry } from "../registry/registry.js";
import { InvalidQueryError, search, searchOrThrow, type SearchHit } from "./search.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const DATA_DIR = fileURLToPath(new URL("../../data", import.meta.url));
const registry = PuzzleRegistry.create(compileOrThrow(readDescriptionSources(DATA_DIR)));

function named(id: string, solverName?: string): Puzzle {
  return {
    id,
    collection: "people",
    chain: "bitcoin",
    address: {
      value: "1BY8GQbnueYofwSuFAT3USAhGjPrkxDdW9",
      chain: "bitcoin",
      kind: "p2pkh",
      hash160: "739437bb3dd6d1983e66629c5f08c70e52769371",
    },
    status: "unsolved",
    ...(solverName !== undefined
      ? { solver: { id: "s", name: solverName, addresses: [], profiles: [] } }
      : {}),
    transactions: [],
    keySource: "unknown",
    preGenesis: false,
  };
}

const people = PuzzleRegistry.create({
  collections: [
    {
      name: "people",
      aliases: [],
      puzzles: [
        named("c", "the alpha"),
        named("b", "alpha"),
        named("d"),
        named("e", "ü alpha"),
        named("alpha", "Zed Alpha"),
      ],
    },
  ],
  version: { dataHash: "00000000", builtAt: "2024-10-01T00:00:00.000Z" },
});

function hitsOf(result: ReturnType<typeof search>): SearchHit[] {
  assert.ok(result.success, "expected search to succeed");
  return result.hits;
}

function keys(hits: SearchHit[]): string[] {
  return hits.map((hit) => `${hit.puzzle.collection}/${hit.puzzle.id}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════

test("Substring match on id", () => {
  const hits = hitsOf(search(registry, "sha256"));
  assert.equal(hits.length, 1);
  assert.equal(keys(hits)[0], "hash_collision/sha256");
  assert.deepEqual(hits[0]?.matchedFields, ["id"]);
  assert.equal(hits[0]?.score, 200);
});

test("Matches are case-insensitive by default", () => {
  const hits = hitsOf(search(registry, "gsmg"));
  assert.deepEqual(keys(hits), ["gsmg/gsmg"]);
  assert.deepEqual(hits[0]?.matchedFields, ["address.value", "id"]);
  assert.equal(hits[0]?.score, 300);
});

test("Case-sensitive matching respects letter case", () => {
  const upper = hitsOf(search(registry, "GSMG", { caseSensitive: true }));
  assert.deepEqual(upper[0]?.matchedFields, ["address.value"]);
  // "1GSMG1..." matches at byte 1
  assert.equal(upper[0]?.score, 199);

  assert.deepEqual(hitsOf(search(registry, "Gsmg", { caseSensitive: true })), []);
});

test("Digests are searchable", () => {
  const hits = hitsOf(search(registry, "751E76E8199196D4"));
  assert.deepEqual(keys(hits), ["b1000/1"]);
  assert.deepEqual(hits[0]?.matchedFields, ["address.hash160"]);
});

test("Exact mode compares whole values", () => {
  assert.deepEqual(keys(hitsOf(search(registry, "6", { exact: true }))), ["b1000/6"]);
  assert.deepEqual(hitsOf(search(registry, "sha", { exact: true })), []);
});

test("A query containing '/' matches qualified ids", () => {
  assert.deepEqual(keys(hitsOf(search(registry, "b1000/6"))), [
    "b1000/6",
    "b1000/66",
    "b1000/67",
    "b1000/68",
  ]);
  assert.deepEqual(keys(hitsOf(search(registry, "b1000/66", { exact: true }))), ["b1000/66"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// RANKING
// ═══════════════════════════════════════════════════════════════════════════

test("Hits rank by matched fields, then by match position", () => {
  const hits = hitsOf(search(people, "alpha"));
  assert.deepEqual(
    hits.map((hit) => [hit.puzzle.id, hit.score]),
    [
      ["alpha", 300],
      ["b", 200],
      ["e", 197],
      ["c", 196],
    ]
  );
  assert.deepEqual(hits[0]?.matchedFields, ["id", "solver.name"]);
});

test("Equal scores keep declaration order", () => {
  const hits = hitsOf(search(registry, "bitcoin", { limit: 3 }));
  assert.deepEqual(keys(hits), ["b1000/1", "b1000/2", "b1000/3"]);
  assert.deepEqual(
    hits.map((hit) => hit.score),
    [200, 200, 200]
  );
});

test("Searches can be scoped to a collection or alias", () => {
  const hits = hitsOf(search(registry, "bitcoin", { collection: "peter_todd" }));
  assert.deepEqual(keys(hits), [
    "hash_collision/ripemd160",
    "hash_collision/sha256",
    "hash_collision/hash160",
    "hash_collision/hash256",
  ]);
});

test("Repeated searches return identical results", () => {
  const queries: [string, Parameters<typeof search>[2]][] = [
    ["1", {}],
    ["bitcoin", { limit: 5 }],
    ["GSMG", { caseSensitive: true }],
    ["b1000/6", { exact: false, collection: "btc_puzzle" }],
  ];
  for (const [query, options] of queries) {
    const first = search(registry, query, options);
    assert.ok(first.success);
    assert.ok(first.hits.length > 0, query);
    assert.deepEqual(search(registry, query, options), first);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// INVALID QUERIES
// ═══════════════════════════════════════════════════════════════════════════

test("Empty queries are rejected", () => {
  assert.deepEqual(search(registry, "   "), {
    success: false,
    error: { kind: "invalid_query", reason: "empty_query", message: "Search query must not be empty" },
  });
});

test("A zero limit truncates to no hits", () => {
  assert.deepEqual(search(registry, "bitcoin", { limit: 0 }), { success: true, hits: [] });
});

test("Negative and fractional limits are rejected", () => {
  assert.deepEqual(search(registry, "1", { limit: -1 }), {
    success: false,
    error: {
      kind: "invalid_query",
      reason: "invalid_limit",
      message: "Limit must be a non-negative integer, got -1",
    },
  });
  assert.equal(search(registry, "1", { limit: 1.5 }).success, false);
});

test("Unknown collections are rejected", () => {
  assert.deepEqual(search(registry, "1", { collection: "nope" }), {
    success: false,
    error: {
      kind: "invalid_query",
      reason: "unknown_collection",
      message: 'Unknown collection "nope"',
    },
  });
});

test("searchOrThrow raises InvalidQueryError", () => {
  assert.equal(searchOrThrow(registry, "gsmg").length, 1);
  assert.throws(
    () => searchOrThrow(registry, ""),
    (err: unknown) => err instanceof InvalidQueryError && err.reason === "empty_query"
  );
});
