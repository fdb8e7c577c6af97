/**
 * Description Ingestion Tests
 *
 * Run with: node --import tsx --test src/ingest/loader.test.ts
 *
 * These tests verify:
 *   1. Collection documents parse in declaration order, with defaults
 *   2. Invalid records fail with located, classified issues
 *   3. Empty strings and empty objects never stand in for absent values
 *   4. The solver table parses and reports missing fields
 *   5. Directory reading is sorted and fails on incomplete layouts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseCollectionDocument, parseSolverTable } from "./descriptions.js";
import { DescriptionLoadError, readDescriptionSources } from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function doc(name: string, value: unknown): { name: string; text: string } {
  return { name, text: JSON.stringify(value) };
}

const UNSOLVED = {
  address: { value: "1BY8GQbnueYofwSuFAT3USAhGjPrkxDdW9", kind: "p2pkh" },
  status: "unsolved",
  key: { bits: 67 },
};

const SOLVED = {
  address: { value: "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH", kind: "p2pkh" },
  status: "solved",
  key: { hex: "01", bits: 1 },
};

// ═══════════════════════════════════════════════════════════════════════════
// COLLECTION DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

test("Collection document keeps record order and fills defaults", () => {
  const result = parseCollectionDocument(
    doc("sample", { collection: "sample", chain: "bitcoin", puzzles: [UNSOLVED, SOLVED] })
  );
  assert.ok(result.success);
  const { header, puzzles, single } = result.value;
  assert.equal(single, false);
  assert.deepEqual(header.aliases, []);
  assert.deepEqual(
    puzzles.map((p) => p.address.value),
    ["1BY8GQbnueYofwSuFAT3USAhGjPrkxDdW9", "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH"]
  );
  assert.equal(puzzles[0]?.pre_genesis, false);
  assert.deepEqual(puzzles[0]?.transactions, []);
});

test("Single-puzzle form is flagged as single", () => {
  const result = parseCollectionDocument(doc("solo", { collection: "solo", puzzle: UNSOLVED }));
  assert.ok(result.success);
  assert.equal(result.value.single, true);
  assert.equal(result.value.puzzles.length, 1);
});

test("A missing required field is located by record index", () => {
  const result = parseCollectionDocument(
    doc("sample", { collection: "sample", puzzles: [UNSOLVED, { status: "solved" }] })
  );
  assert.ok(!result.success);
  assert.deepEqual(result.issues, [
    {
      kind: "missing_field",
      document: "sample",
      index: 1,
      field: "puzzles.1.address",
      message: "Required",
    },
  ]);
});

test("An invalid enum value is a schema issue", () => {
  const result = parseCollectionDocument(
    doc("solo", { collection: "solo", puzzle: { ...UNSOLVED, status: "lost" } })
  );
  assert.ok(!result.success);
  assert.equal(result.issues.length, 1);
  assert.equal(result.issues[0]?.kind, "schema");
  assert.equal(result.issues[0]?.field, "puzzle.status");
  assert.equal(result.issues[0]?.index, 0);
});

test("Every bad record is reported, not just the first", () => {
  const result = parseCollectionDocument(
    doc("sample", {
      collection: "sample",
      puzzles: [{ status: "solved" }, UNSOLVED, { ...SOLVED, status: "lost" }],
    })
  );
  assert.ok(!result.success);
  assert.deepEqual(
    result.issues.map((i) => i.field),
    ["puzzles.0.address", "puzzles.2.status"]
  );
});

test("Documents need exactly one of puzzles or puzzle", () => {
  const neither = parseCollectionDocument(doc("empty", { collection: "empty" }));
  assert.ok(!neither.success);
  assert.deepEqual(neither.issues, [
    {
      kind: "schema",
      document: "empty",
      field: "puzzles",
      message: 'Exactly one of "puzzles" or "puzzle" must be present',
    },
  ]);

  const both = parseCollectionDocument(
    doc("both", { collection: "both", puzzles: [UNSOLVED], puzzle: UNSOLVED })
  );
  assert.ok(!both.success);
});

test("Empty strings are not accepted for absent values", () => {
  const result = parseCollectionDocument(
    doc("sample", {
      collection: "sample",
      puzzles: [{ ...UNSOLVED, key: { bits: 67, seed: { phrase: "" }, mini: "" }, source_url: "" }],
    })
  );
  assert.ok(!result.success);
  assert.deepEqual(
    result.issues.map((i) => [i.kind, i.index, i.field]),
    [
      ["schema", 0, "puzzles.0.key.seed.phrase"],
      ["schema", 0, "puzzles.0.key.mini"],
      ["schema", 0, "puzzles.0.source_url"],
    ]
  );
});

test("An empty key object is rejected", () => {
  const result = parseCollectionDocument(
    doc("sample", { collection: "sample", puzzles: [{ ...UNSOLVED, key: {} }] })
  );
  assert.ok(!result.success);
  assert.deepEqual(result.issues, [
    {
      kind: "schema",
      document: "sample",
      index: 0,
      field: "puzzles.0.key",
      message: "Must hold at least one field; omit it instead",
    },
  ]);
});

test("Collection names are lowercase identifiers", () => {
  const result = parseCollectionDocument(doc("Bad", { collection: "Bad-Name", puzzles: [] }));
  assert.ok(!result.success);
  assert.equal(result.issues[0]?.field, "collection");
  assert.equal(
    result.issues[0]?.message,
    "Collection names use lowercase letters, digits and underscores"
  );
});

test("Malformed JSON is a parse issue", () => {
  const result = parseCollectionDocument({ name: "broken", text: "{ not json" });
  assert.ok(!result.success);
  assert.equal(result.issues[0]?.kind, "parse");
  assert.equal(result.issues[0]?.field, "(root)");
});

// ═══════════════════════════════════════════════════════════════════════════
// SOLVER TABLE
// ═══════════════════════════════════════════════════════════════════════════

test("Solver table fills empty address and profile lists", () => {
  const result = parseSolverTable(doc("solvers", { solvers: { alice: { name: "Alice" } } }));
  assert.ok(result.success);
  assert.deepEqual(result.value.solvers["alice"], { name: "Alice", addresses: [], profiles: [] });
});

test("Solver table without a solvers map reports a missing field", () => {
  const result = parseSolverTable(doc("solvers", {}));
  assert.ok(!result.success);
  assert.deepEqual(result.issues, [
    { kind: "missing_field", document: "solvers", field: "solvers", message: "Required" },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY READING
// ═══════════════════════════════════════════════════════════════════════════

test("readDescriptionSources returns collections sorted by file name", () => {
  const root = mkdtempSync(join(tmpdir(), "puzzle-ingest-"));
  try {
    mkdirSync(join(root, "collections"));
    writeFileSync(join(root, "collections", "zeta.json"), "{}");
    writeFileSync(join(root, "collections", "alpha.json"), "{}");
    writeFileSync(join(root, "collections", "notes.txt"), "ignored");
    writeFileSync(join(root, "solvers.json"), '{"solvers":{}}');

    const sources = readDescriptionSources(root);
    assert.deepEqual(
      sources.collections.map((s) => s.name),
      ["alpha", "zeta"]
    );
    assert.equal(sources.solvers.name, "solvers");
    assert.equal(sources.solvers.text, '{"solvers":{}}');
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test("readDescriptionSources fails when the solver table is missing", () => {
  const root = mkdtempSync(join(tmpdir(), "puzzle-ingest-"));
  try {
    mkdirSync(join(root, "collections"));
    assert.throws(
      () => readDescriptionSources(root),
      (err: unknown) =>
        err instanceof DescriptionLoadError && err.path === join(root, "solvers.json")
    );
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
