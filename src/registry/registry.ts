/**
 * Puzzle registry with declaration-order indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * READ-ONLY QUERY SURFACE OVER A VALIDATED DATASET
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The PuzzleRegistry is the only way callers reach puzzle data. It provides:
 *
 * 1. IDENTIFIER LOOKUP: "<collection>/<id>", or "<collection>" alone for
 *    collections with exactly one member. Aliases resolve to their collection.
 *
 * 2. ORDERED ITERATION: collections in compile order, puzzles in the order
 *    their document declared them. Every index keeps that order, so
 *    order-dependent rules (the first owner of a shared asset) still hold.
 *
 * 3. IMMUTABILITY: records are deep-frozen on construction and nothing
 *    mutates them afterwards. Any number of readers can share one instance.
 *
 * Lookups never throw; they return typed results. The `...OrThrow` variants
 * exist for callers that prefer exceptions.
 */

import type {
  AddressKind,
  CanonicalDataset,
  Chain,
  CollectionInfo,
  DatasetVersion,
  KeySource,
  Puzzle,
  PuzzleStatus,
} from "../puzzles/schema.js";
import { Chain as ChainEnum } from "../puzzles/schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS & ERRORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Which part of an identifier failed to resolve.
 */
export type NotFoundSegment = "collection" | "puzzle";

export interface NotFound {
  kind: "not_found";
  segment: NotFoundSegment;
  identifier: string;
  message: string;
}

export type GetResult =
  | { success: true; puzzle: Readonly<Puzzle> }
  | { success: false; error: NotFound };

export type AllResult =
  | { success: true; puzzles: Iterable<Readonly<Puzzle>> }
  | { success: false; error: NotFound };

export type StatsResult =
  | { success: true; stats: RegistryStats }
  | { success: false; error: NotFound };

export class NotFoundError extends Error {
  public readonly segment: NotFoundSegment;
  public readonly identifier: string;

  constructor(error: NotFound) {
    super(error.message);
    this.name = "NotFoundError";
    this.segment = error.segment;
    this.identifier = error.identifier;
  }
}

/**
 * Puzzle filter options. All criteria are AND-combined.
 */
export interface PuzzleFilter {
  /** Collection name or alias */
  collection?: string;
  status?: PuzzleStatus;
  chain?: Chain;
  keySource?: KeySource;
  addressKind?: AddressKind;
  /** Only puzzles with (true) or without (false) a revealed public key */
  withPubkey?: boolean;
  /** Only puzzles with (true) or without (false) a known private key */
  withKey?: boolean;
  /** Only puzzles with (true) or without (false) listed transactions */
  withTransactions?: boolean;
}

/**
 * Aggregate counts over one or all collections.
 */
export interface RegistryStats {
  total: number;
  byStatus: Record<PuzzleStatus, number>;
  byChain: Record<Chain, number>;
  byKeySource: Record<KeySource, number>;
  byAddressKind: Record<AddressKind, number>;
  withPubkey: number;
  withKey: number;
  /** Sum of prizes per chain, in that chain's native unit */
  totalPrize: Record<Chain, number>;
  /** Sum of prizes still claimable per chain */
  unsolvedPrize: Record<Chain, number>;
}

function chainCounts(): Record<Chain, number> {
  return { bitcoin: 0, ethereum: 0, litecoin: 0, monero: 0, decred: 0 };
}

function roundPrize(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

interface CollectionEntry {
  info: Readonly<CollectionInfo>;
  puzzles: ReadonlyArray<Readonly<Puzzle>>;
  byId: ReadonlyMap<string, Readonly<Puzzle>>;
}

/**
 * Immutable puzzle registry.
 *
 * @example
 *   validateOrThrow(dataset);
 *   const registry = PuzzleRegistry.create(dataset);
 *
 *   const result = registry.get("b1000/66");
 *   if (result.success) {
 *     console.log(result.puzzle.address.value);
 *   }
 *
 *   // Unsolved puzzles with a revealed public key
 *   const targets = registry.filter({ status: "unsolved", withPubkey: true });
 */
export class PuzzleRegistry {
  /**
   * Every puzzle, collections in compile order, records in declaration order.
   */
  private readonly _puzzles: ReadonlyArray<Readonly<Puzzle>>;

  /**
   * Index: collection name -> entry.
   */
  private readonly _collections: ReadonlyMap<string, CollectionEntry>;

  /**
   * Index: alias -> collection name.
   */
  private readonly _aliases: ReadonlyMap<string, string>;

  private readonly _version: Readonly<DatasetVersion>;

  private constructor(dataset: CanonicalDataset) {
    const frozen = deepFreeze(structuredClone(dataset));

    const collections = new Map<string, CollectionEntry>();
    const aliases = new Map<string, string>();
    const puzzles: Readonly<Puzzle>[] = [];

    for (const collection of frozen.collections) {
      const byId = new Map<string, Readonly<Puzzle>>();
      for (const puzzle of collection.puzzles) {
        byId.set(puzzle.id, puzzle);
        puzzles.push(puzzle);
      }
      const { puzzles: members, ...info } = collection;
      collections.set(collection.name, {
        info: Object.freeze({ ...info, size: members.length }),
        puzzles: members,
        byId,
      });
      for (const alias of collection.aliases) {
        aliases.set(alias, collection.name);
      }
    }

    this._puzzles = Object.freeze(puzzles);
    this._collections = collections;
    this._aliases = aliases;
    this._version = frozen.version;
  }

  /**
   * Create a registry from a dataset that has already passed validate().
   * No invariant is checked here; duplicate identities silently shadow each
   * other. Use createRegistry() for data that has not been validated.
   *
   * The dataset is copied; later changes to the argument do not reach the
   * registry.
   */
  static create(dataset: CanonicalDataset): PuzzleRegistry {
    return new PuzzleRegistry(dataset);
  }

  // ============================================================
  // Lookup
  // ============================================================

  get version(): Readonly<DatasetVersion> {
    return this._version;
  }

  get size(): number {
    return this._puzzles.length;
  }

  /**
   * Resolve a collection name or alias to its canonical name.
   */
  resolveCollection(name: string): string | undefined {
    if (this._collections.has(name)) {
      return name;
    }
    return this._aliases.get(name);
  }

  /**
   * Look up a puzzle by "<collection>/<id>".
   *
   * The identifier is split on the first "/". Without a "/", the name must
   * be a collection holding exactly one puzzle.
   */
  get(identifier: string): GetResult {
    const slash = identifier.indexOf("/");
    const collectionName = slash === -1 ? identifier : identifier.slice(0, slash);
    const resolved = this.resolveCollection(collectionName);
    const entry = resolved !== undefined ? this._collections.get(resolved) : undefined;

    if (entry === undefined) {
      return notFound("collection", identifier, `Unknown collection "${collectionName}"`);
    }

    if (slash === -1) {
      const only = entry.puzzles.length === 1 ? entry.puzzles[0] : undefined;
      if (only === undefined) {
        return notFound(
          "puzzle",
          identifier,
          `Collection "${collectionName}" has ${entry.puzzles.length} puzzles; use "${collectionName}/<id>"`
        );
      }
      return { success: true, puzzle: only };
    }

    const id = identifier.slice(slash + 1);
    const puzzle = entry.byId.get(id);
    if (puzzle === undefined) {
      return notFound("puzzle", identifier, `No puzzle "${id}" in collection "${collectionName}"`);
    }
    return { success: true, puzzle };
  }

  /**
   * @throws NotFoundError when either segment does not resolve
   */
  getOrThrow(identifier: string): Readonly<Puzzle> {
    const result = this.get(identifier);
    if (!result.success) {
      throw new NotFoundError(result.error);
    }
    return result.puzzle;
  }

  /**
   * Puzzles of one collection, or of all collections, in declaration order.
   * Each iteration of the returned iterable starts from the beginning.
   */
  all(collection?: string): AllResult {
    if (collection === undefined) {
      const puzzles = this._puzzles;
      return { success: true, puzzles: { [Symbol.iterator]: () => puzzles.values() } };
    }
    const entry = this.collectionEntry(collection);
    if (entry === undefined) {
      return notFound("collection", collection, `Unknown collection "${collection}"`);
    }
    const puzzles = entry.puzzles;
    return { success: true, puzzles: { [Symbol.iterator]: () => puzzles.values() } };
  }

  /**
   * Collection metadata, in compile order.
   */
  collections(): ReadonlyArray<Readonly<CollectionInfo>> {
    return Object.freeze([...this._collections.values()].map((entry) => entry.info));
  }

  /**
   * The first puzzle, in declaration order, that references an asset path.
   */
  assetOwner(path: string): Readonly<Puzzle> | undefined {
    return this._puzzles.find((puzzle) => {
      const assets = puzzle.assets;
      if (assets === undefined) {
        return false;
      }
      return assets.puzzle === path || assets.solver === path || assets.hints.includes(path);
    });
  }

  // ============================================================
  // Filtering & statistics
  // ============================================================

  /**
   * Filter puzzles by multiple criteria, keeping declaration order.
   * An unknown collection yields no results.
   */
  filter(filter: PuzzleFilter): ReadonlyArray<Readonly<Puzzle>> {
    let results: Readonly<Puzzle>[];

    if (filter.collection !== undefined) {
      const entry = this.collectionEntry(filter.collection);
      results = entry !== undefined ? [...entry.puzzles] : [];
    } else {
      results = [...this._puzzles];
    }

    if (filter.status !== undefined) {
      results = results.filter((p) => p.status === filter.status);
    }

    if (filter.chain !== undefined) {
      results = results.filter((p) => p.chain === filter.chain);
    }

    if (filter.keySource !== undefined) {
      results = results.filter((p) => p.keySource === filter.keySource);
    }

    if (filter.addressKind !== undefined) {
      results = results.filter((p) => p.address.kind === filter.addressKind);
    }

    if (filter.withPubkey !== undefined) {
      results = results.filter((p) => (p.pubkey !== undefined) === filter.withPubkey);
    }

    if (filter.withKey !== undefined) {
      results = results.filter((p) => (p.key?.hex !== undefined) === filter.withKey);
    }

    if (filter.withTransactions !== undefined) {
      results = results.filter((p) => (p.transactions.length > 0) === filter.withTransactions);
    }

    return Object.freeze(results);
  }

  /**
   * Aggregate counts over one collection or the whole dataset.
   */
  stats(collection?: string): StatsResult {
    const all = this.all(collection);
    if (!all.success) {
      return all;
    }

    const byStatus: Record<PuzzleStatus, number> = {
      solved: 0,
      unsolved: 0,
      claimed: 0,
      swept: 0,
    };
    const byChain = chainCounts();
    const byKeySource: Record<KeySource, number> = {
      unknown: 0,
      direct: 0,
      derived: 0,
      script: 0,
    };
    const byAddressKind: Record<AddressKind, number> = {
      p2pkh: 0,
      p2sh: 0,
      p2wpkh: 0,
      p2wsh: 0,
      p2tr: 0,
    };
    const totalPrize = chainCounts();
    const unsolvedPrize = chainCounts();
    let total = 0;
    let withPubkey = 0;
    let withKey = 0;

    for (const puzzle of all.puzzles) {
      total++;
      byStatus[puzzle.status]++;
      byChain[puzzle.chain]++;
      byKeySource[puzzle.keySource]++;
      byAddressKind[puzzle.address.kind]++;
      if (puzzle.pubkey !== undefined) {
        withPubkey++;
      }
      if (puzzle.key?.hex !== undefined) {
        withKey++;
      }
      if (puzzle.prize !== undefined) {
        totalPrize[puzzle.chain] += puzzle.prize;
        if (puzzle.status === "unsolved") {
          unsolvedPrize[puzzle.chain] += puzzle.prize;
        }
      }
    }

    for (const chain of ChainEnum.options) {
      totalPrize[chain] = roundPrize(totalPrize[chain]);
      unsolvedPrize[chain] = roundPrize(unsolvedPrize[chain]);
    }

    return {
      success: true,
      stats: {
        total,
        byStatus,
        byChain,
        byKeySource,
        byAddressKind,
        withPubkey,
        withKey,
        totalPrize,
        unsolvedPrize,
      },
    };
  }

  private collectionEntry(name: string): CollectionEntry | undefined {
    const resolved = this.resolveCollection(name);
    return resolved !== undefined ? this._collections.get(resolved) : undefined;
  }
}

function notFound(
  segment: NotFoundSegment,
  identifier: string,
  message: string
): { success: false; error: NotFound } {
  return { success: false, error: { kind: "not_found", segment, identifier, message } };
}
