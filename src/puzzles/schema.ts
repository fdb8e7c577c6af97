/**
 * Puzzle schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CANONICAL PUZZLE RECORD
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A Puzzle is one funded challenge: a target address whose private key is
 * (or was) unknown. Records are produced once by the compiler, checked by
 * the validator and never mutated afterwards.
 *
 * Closed variants (status, chain, key source, address kind) are zod enums so
 * the validator can reason exhaustively about allowed field combinations.
 *
 * Absent values are always `undefined` (the key is omitted), never an empty
 * string or zero.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

/**
 * Lifecycle state of a puzzle.
 */
export const PuzzleStatus = z.enum([
  "solved", // Key found and funds moved by the solver
  "unsolved", // Funds still waiting at the address
  "claimed", // Key found, funds claimed by someone other than the solver
  "swept", // Funds withdrawn by the author before a solve
]);
export type PuzzleStatus = z.infer<typeof PuzzleStatus>;

/**
 * Network hosting the puzzle address.
 */
export const Chain = z.enum(["bitcoin", "ethereum", "litecoin", "monero", "decred"]);
export type Chain = z.infer<typeof Chain>;

/**
 * How a revealed key relates to the address.
 */
export const KeySource = z.enum([
  "unknown",
  "direct", // Published raw key, WIF or mini key
  "derived", // Derived from a seed phrase, xpub or external entropy
  "script", // Spendable through a redeem script rather than a key
]);
export type KeySource = z.infer<typeof KeySource>;

/**
 * Pay-to-* address categories.
 */
export const AddressKind = z.enum(["p2pkh", "p2sh", "p2wpkh", "p2wsh", "p2tr"]);
export type AddressKind = z.infer<typeof AddressKind>;

export const PubkeyFormat = z.enum(["compressed", "uncompressed"]);
export type PubkeyFormat = z.infer<typeof PubkeyFormat>;

export const TransactionType = z.enum([
  "funding",
  "increase",
  "decrease",
  "sweep",
  "claim",
  "pubkey_reveal",
]);
export type TransactionType = z.infer<typeof TransactionType>;

// ═══════════════════════════════════════════════════════════════════════════
// ADDRESS
// ═══════════════════════════════════════════════════════════════════════════

export const RedeemScriptSchema = z.object({
  /** Script bytes in hex */
  script: z.string().min(1),
  /** hash160 of the script */
  hash: z.string().min(1),
});
export type RedeemScript = z.infer<typeof RedeemScriptSchema>;

export const AddressSchema = z.object({
  /** Chain-native encoded address */
  value: z.string().min(1),
  chain: Chain,
  kind: AddressKind,
  /** 20-byte digest identifying P2PKH/P2WPKH/P2SH targets (hex) */
  hash160: z.string().min(1).optional(),
  /** Witness program for segregated-witness kinds (hex) */
  witnessProgram: z.string().min(1).optional(),
  redeemScript: RedeemScriptSchema.optional(),
});
export type Address = z.infer<typeof AddressSchema>;

export const PubkeySchema = z.object({
  value: z.string().min(1),
  format: PubkeyFormat,
});
export type Pubkey = z.infer<typeof PubkeySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// KEY MATERIAL
// ═══════════════════════════════════════════════════════════════════════════

export const WifSchema = z.object({
  /** Standard WIF (5, K or L prefix on bitcoin) */
  decrypted: z.string().min(1).optional(),
  /** BIP38 encrypted WIF (6P prefix) */
  encrypted: z.string().min(1).optional(),
  /** BIP38 passphrase */
  passphrase: z.string().min(1).optional(),
});
export type Wif = z.infer<typeof WifSchema>;

/**
 * BIP-39 passphrase state for entropy-based seeds.
 */
export const PassphraseSchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("known"), value: z.string().min(1) }),
  z.object({ state: z.literal("required") }),
]);
export type Passphrase = z.infer<typeof PassphraseSchema>;

export const EntropySchema = z.object({
  /** sha256 of the entropy data */
  hash: z.string().min(1),
  source: z
    .object({
      url: z.string().min(1).optional(),
      description: z.string().min(1).optional(),
    })
    .optional(),
  passphrase: PassphraseSchema.optional(),
});
export type Entropy = z.infer<typeof EntropySchema>;

export const SeedSchema = z.object({
  /** BIP-39 mnemonic */
  phrase: z.string().min(1).optional(),
  /** HD derivation path, e.g. m/84'/0'/0'/0/0 */
  path: z.string().min(1).optional(),
  xpub: z.string().min(1).optional(),
  entropy: EntropySchema.optional(),
});
export type Seed = z.infer<typeof SeedSchema>;

export const ShareSchema = z.object({
  index: z.number().int().min(1),
  data: z.string().min(1),
});
export type Share = z.infer<typeof ShareSchema>;

export const SharesSchema = z.object({
  threshold: z.number().int(),
  total: z.number().int().min(1),
  shares: z.array(ShareSchema),
});
export type Shares = z.infer<typeof SharesSchema>;

export const KeySchema = z.object({
  /** Raw private key, 64 hex chars */
  hex: z.string().min(1).optional(),
  wif: WifSchema.optional(),
  seed: SeedSchema.optional(),
  /** Mini private key (S prefix) */
  mini: z.string().min(1).optional(),
  /** Key lies in [2^(bits-1), 2^bits - 1] */
  bits: z.number().int().optional(),
  shares: SharesSchema.optional(),
});
export type Key = z.infer<typeof KeySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// PEOPLE, HISTORY, ASSETS
// ═══════════════════════════════════════════════════════════════════════════

export const ProfileSchema = z.object({
  /** Platform name, e.g. github, bitcointalk */
  name: z.string().min(1),
  url: z.string().min(1),
});
export type Profile = z.infer<typeof ProfileSchema>;

/**
 * Solver or author, resolved from the shared solver table.
 */
export const SolverSchema = z.object({
  /** Key in the solver table */
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  addresses: z.array(z.string().min(1)),
  profiles: z.array(ProfileSchema),
});
export type Solver = z.infer<typeof SolverSchema>;

export const TransactionSchema = z.object({
  type: TransactionType,
  txid: z.string().min(1).optional(),
  /** UTC, "YYYY-MM-DD HH:MM:SS" */
  date: z.string().min(1).optional(),
  amount: z.number().optional(),
  /** Block explorer link, derived from chain + txid */
  url: z.string().min(1).optional(),
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const AssetsSchema = z.object({
  /** Main puzzle image, "assets/<collection>/<file>" */
  puzzle: z.string().min(1).optional(),
  /** Solution explanation image */
  solver: z.string().min(1).optional(),
  hints: z.array(z.string().min(1)),
  sourceUrl: z.string().min(1).optional(),
});
export type Assets = z.infer<typeof AssetsSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// PUZZLE
// ═══════════════════════════════════════════════════════════════════════════

export const PuzzleSchema = z.object({
  /** Unique within the collection */
  id: z.string().min(1),
  collection: z.string().min(1),
  chain: Chain,
  address: AddressSchema,
  status: PuzzleStatus,
  /** Nominal value in the chain's native unit */
  prize: z.number().optional(),
  key: KeySchema.optional(),
  pubkey: PubkeySchema.optional(),
  solver: SolverSchema.optional(),
  claimer: SolverSchema.optional(),
  transactions: z.array(TransactionSchema),
  startDate: z.string().min(1).optional(),
  solveDate: z.string().min(1).optional(),
  /** Seconds between startDate and solveDate; derived, never authored */
  solveTime: z.number().int().optional(),
  keySource: KeySource,
  /** Key became known before the funding transaction existed */
  preGenesis: z.boolean(),
  sourceUrl: z.string().min(1).optional(),
  assets: AssetsSchema.optional(),
});
export type Puzzle = z.infer<typeof PuzzleSchema>;

export const CollectionInfoSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1).optional(),
  sourceUrl: z.string().min(1).optional(),
  author: SolverSchema.optional(),
  aliases: z.array(z.string().min(1)),
  /** Number of puzzles, in declaration order */
  size: z.number().int().min(0),
});
export type CollectionInfo = z.infer<typeof CollectionInfoSchema>;

export const CollectionSchema = CollectionInfoSchema.omit({ size: true }).extend({
  puzzles: z.array(PuzzleSchema),
});
export type Collection = z.infer<typeof CollectionSchema>;

export const DatasetVersionSchema = z.object({
  /** First 8 hex chars of sha256 over the source documents */
  dataHash: z.string(),
  builtAt: z.string(),
});
export type DatasetVersion = z.infer<typeof DatasetVersionSchema>;

/**
 * Output of the compiler: every collection in declaration order.
 */
export const CanonicalDatasetSchema = z.object({
  collections: z.array(CollectionSchema),
  version: DatasetVersionSchema,
});
export type CanonicalDataset = z.infer<typeof CanonicalDatasetSchema>;

/**
 * Canonical identifier: "<collection>/<id>".
 */
export function puzzleKey(puzzle: Pick<Puzzle, "collection" | "id">): string {
  return `${puzzle.collection}/${puzzle.id}`;
}
