/**
 * Puzzle description compiler.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RAW DESCRIPTIONS → CANONICAL DATASET
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. Parse the solver table and every collection document.
 * 2. Order collections by name; keep each document's record order.
 * 3. Resolve solver, claimer and author references against the table.
 * 4. Compute derived fields (ids, solve time, explorer URLs, key
 *    completion, key source, asset paths).
 *
 * Compilation is all-or-nothing: any issue means no dataset. Issues are
 * collected across all documents before failing so authors see every
 * problem at once.
 *
 * The output is structurally complete but not yet trusted; run the
 * validator before publishing it.
 */

import type {
  Address,
  CanonicalDataset,
  Collection,
  Puzzle,
  Solver,
} from "../puzzles/schema.js";
import { sha256Hex } from "../crypto/hash.js";
import {
  parseCollectionDocument,
  parseSolverTable,
  type DocumentIssue,
  type RawCollectionDocument,
  type RawPuzzle,
  type RawSolverTable,
} from "../ingest/descriptions.js";
import type { DescriptionSources } from "../ingest/loader.js";
import { CompileError, type CompileIssue } from "./errors.js";
import {
  assetPath,
  deriveKey,
  deriveSolveTime,
  deriveTransactions,
  inferKeySource,
  pruneUndefined,
} from "./derive.js";

export interface CompileOptions {
  /** Build timestamp recorded in the dataset version; defaults to now */
  builtAt?: string;
}

export type CompileResult =
  | { success: true; dataset: CanonicalDataset }
  | { success: false; issues: CompileIssue[] };

function fromDocumentIssue(issue: DocumentIssue): CompileIssue {
  return {
    kind: issue.kind,
    collection: issue.document,
    ...(issue.index !== undefined ? { index: issue.index } : {}),
    field: issue.field,
    message: issue.message,
  };
}

/**
 * Resolves solver ids against the shared table, recording unknown ones.
 */
class SolverResolver {
  constructor(
    private readonly table: RawSolverTable,
    private readonly issues: CompileIssue[]
  ) {}

  resolve(
    id: string | undefined,
    collection: string,
    field: string,
    index?: number
  ): Solver | undefined {
    if (id === undefined) {
      return undefined;
    }
    const entry = Object.hasOwn(this.table.solvers, id) ? this.table.solvers[id] : undefined;
    if (entry === undefined) {
      this.issues.push({
        kind: "unknown_reference",
        collection,
        ...(index !== undefined ? { index } : {}),
        field,
        message: `Unknown solver id "${id}"`,
      });
      return undefined;
    }
    return {
      id,
      name: entry.name,
      addresses: [...entry.addresses],
      profiles: entry.profiles.map((p) => ({ ...p })),
    };
  }
}

function puzzleId(raw: RawPuzzle, doc: RawCollectionDocument): string | undefined {
  if (raw.name !== undefined) {
    return raw.name;
  }
  if (doc.single) {
    return doc.header.collection;
  }
  return raw.key?.bits !== undefined ? String(raw.key.bits) : undefined;
}

function compilePuzzle(
  raw: RawPuzzle,
  index: number,
  doc: RawCollectionDocument,
  solvers: SolverResolver,
  issues: CompileIssue[]
): Puzzle | undefined {
  const collection = doc.header.collection;
  const before = issues.length;

  const id = puzzleId(raw, doc);
  if (id === undefined) {
    issues.push({
      kind: "missing_field",
      collection,
      index,
      field: "name",
      message: "Puzzle has neither a name nor key.bits to derive its id from",
    });
  }

  const chain = raw.chain ?? doc.header.chain;
  if (chain === undefined) {
    issues.push({
      kind: "missing_field",
      collection,
      index,
      field: "chain",
      message: "Puzzle has no chain and the collection declares no default",
    });
  }

  const solver = solvers.resolve(raw.solver, collection, "solver", index);
  const claimer = solvers.resolve(raw.claimer, collection, "claimer", index);

  if (id === undefined || chain === undefined || issues.length > before) {
    return undefined;
  }

  const address: Address = {
    value: raw.address.value,
    chain,
    kind: raw.address.kind,
    hash160: raw.address.hash160?.toLowerCase(),
    witnessProgram: raw.address.witness_program?.toLowerCase(),
    redeemScript:
      raw.address.redeem_script !== undefined
        ? {
            script: raw.address.redeem_script.script.toLowerCase(),
            hash: raw.address.redeem_script.hash.toLowerCase(),
          }
        : undefined,
  };

  const key = raw.key !== undefined ? deriveKey(raw.key, chain, raw.pubkey?.format) : undefined;

  return {
    id,
    collection,
    chain,
    address,
    status: raw.status,
    prize: raw.prize,
    key,
    pubkey: raw.pubkey !== undefined ? { ...raw.pubkey } : undefined,
    solver,
    claimer,
    transactions: deriveTransactions(chain, raw.transactions),
    startDate: raw.start_date,
    solveDate: raw.solve_date,
    solveTime: deriveSolveTime(raw.status, raw.start_date, raw.solve_date),
    keySource: raw.key?.source ?? inferKeySource(key, address),
    preGenesis: raw.pre_genesis,
    sourceUrl: raw.source_url ?? doc.header.source_url,
    assets:
      raw.assets !== undefined
        ? {
            puzzle:
              raw.assets.puzzle !== undefined ? assetPath(collection, raw.assets.puzzle) : undefined,
            solver:
              raw.assets.solver !== undefined ? assetPath(collection, raw.assets.solver) : undefined,
            hints: raw.assets.hints.map((hint) => assetPath(collection, hint)),
            sourceUrl: raw.assets.source_url,
          }
        : undefined,
  };
}

function compileCollection(
  doc: RawCollectionDocument,
  solvers: SolverResolver,
  issues: CompileIssue[]
): Collection {
  const { header } = doc;
  const puzzles: Puzzle[] = [];

  doc.puzzles.forEach((raw, index) => {
    const puzzle = compilePuzzle(raw, index, doc, solvers, issues);
    if (puzzle !== undefined) {
      puzzles.push(puzzle);
    }
  });

  return {
    name: header.collection,
    description: header.description,
    sourceUrl: header.source_url,
    author: solvers.resolve(header.author, header.collection, "author"),
    aliases: [...header.aliases],
    puzzles,
  };
}

/**
 * Names and aliases must not collide with one another.
 */
function checkCollectionNames(docs: RawCollectionDocument[], issues: CompileIssue[]): void {
  const owners = new Map<string, string>();

  for (const doc of docs) {
    const name = doc.header.collection;
    const labels: Array<[string, string]> = [
      [name, "collection"],
      ...doc.header.aliases.map((alias): [string, string] => [alias, "aliases"]),
    ];
    for (const [label, field] of labels) {
      const owner = owners.get(label);
      if (owner !== undefined) {
        issues.push({
          kind: "duplicate_collection",
          collection: name,
          field,
          message: `"${label}" is already used by collection "${owner}"`,
        });
      } else {
        owners.set(label, name);
      }
    }
  }
}

/**
 * Compile description documents into a canonical dataset.
 */
export function compile(sources: DescriptionSources, options: CompileOptions = {}): CompileResult {
  const issues: CompileIssue[] = [];

  const table = parseSolverTable(sources.solvers);
  if (!table.success) {
    issues.push(...table.issues.map(fromDocumentIssue));
  }

  const docs: RawCollectionDocument[] = [];
  for (const source of sources.collections) {
    const parsed = parseCollectionDocument(source);
    if (!parsed.success) {
      issues.push(...parsed.issues.map(fromDocumentIssue));
      continue;
    }
    if (parsed.value.header.collection !== source.name) {
      issues.push({
        kind: "schema",
        collection: source.name,
        field: "collection",
        message: `Document declares collection "${parsed.value.header.collection}" but is named "${source.name}"`,
      });
      continue;
    }
    docs.push(parsed.value);
  }

  docs.sort((a, b) =>
    a.header.collection < b.header.collection ? -1 : a.header.collection > b.header.collection ? 1 : 0
  );
  checkCollectionNames(docs, issues);

  if (!table.success) {
    return { success: false, issues };
  }

  const solvers = new SolverResolver(table.value, issues);
  const collections = docs.map((doc) => compileCollection(doc, solvers, issues));

  if (issues.length > 0) {
    return { success: false, issues };
  }

  const orderedSources = [...sources.collections].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  const digestInput = [sources.solvers, ...orderedSources].map((s) => s.text).join("\n");

  const dataset: CanonicalDataset = {
    collections,
    version: {
      dataHash: sha256Hex(new TextEncoder().encode(digestInput)).slice(0, 8),
      builtAt: options.builtAt ?? new Date().toISOString(),
    },
  };
  return { success: true, dataset: pruneUndefined(dataset) };
}

/**
 * Compile and throw on failure.
 *
 * @throws CompileError with every issue found
 */
export function compileOrThrow(
  sources: DescriptionSources,
  options: CompileOptions = {}
): CanonicalDataset {
  const result = compile(sources, options);
  if (!result.success) {
    throw new CompileError(
      `Compilation failed with ${result.issues.length} issue(s)`,
      result.issues
    );
  }
  return result.dataset;
}
