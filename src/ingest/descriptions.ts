/**
 * Description document schemas.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXTERNALLY AUTHORED INPUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Two kinds of JSON documents feed the compiler:
 *
 *   data/collections/<name>.json   one per collection, snake_case keys
 *   data/solvers.json              shared solver/author table
 *
 * These schemas check shape only. Cross-references (solver ids), derived
 * values and cryptographic consistency are the compiler's and validator's
 * business. Array order is preserved exactly as authored.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z, type ZodIssue } from "zod";
import {
  AddressKind,
  Chain,
  KeySource,
  PubkeyFormat,
  PuzzleStatus,
  TransactionType,
} from "../puzzles/schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// PUZZLE DESCRIPTION
// ═══════════════════════════════════════════════════════════════════════════

// Absent values are omitted, never written as "" or {}
function hasAnyField(value: Record<string, unknown>): boolean {
  return Object.values(value).some((field) => field !== undefined);
}

const EMPTY_OBJECT = { message: "Must hold at least one field; omit it instead" };

const RawAddress = z.object({
  value: z.string().min(1),
  kind: AddressKind,
  hash160: z.string().min(1).optional(),
  witness_program: z.string().min(1).optional(),
  redeem_script: z
    .object({
      script: z.string().min(1),
      hash: z.string().min(1),
    })
    .optional(),
});

const RawPassphrase = z.union([
  z.literal("required"),
  z.object({ known: z.string().min(1) }),
]);

const RawSeed = z.object({
  phrase: z.string().min(1).optional(),
  path: z.string().min(1).optional(),
  xpub: z.string().min(1).optional(),
  entropy: z
    .object({
      hash: z.string().min(1),
      source: z
        .object({
          url: z.string().min(1).optional(),
          description: z.string().min(1).optional(),
        })
        .optional(),
      passphrase: RawPassphrase.optional(),
    })
    .optional(),
}).refine(hasAnyField, EMPTY_OBJECT);

const RawKey = z.object({
  hex: z.string().min(1).optional(),
  wif: z
    .object({
      decrypted: z.string().min(1).optional(),
      encrypted: z.string().min(1).optional(),
      passphrase: z.string().min(1).optional(),
    })
    .refine(hasAnyField, EMPTY_OBJECT)
    .optional(),
  seed: RawSeed.optional(),
  mini: z.string().min(1).optional(),
  bits: z.number().int().optional(),
  shares: z
    .object({
      threshold: z.number().int(),
      total: z.number().int().min(1),
      shares: z
        .array(
          z.object({
            index: z.number().int().min(1),
            data: z.string().min(1),
          })
        )
        .default([]),
    })
    .optional(),
  /** Explicit key source; inferred from the material when absent */
  source: KeySource.optional(),
}).refine(hasAnyField, EMPTY_OBJECT);

const RawTransaction = z.object({
  type: TransactionType,
  txid: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
  amount: z.number().optional(),
});

export const RawPuzzleSchema = z.object({
  /** Puzzle id; defaults to the key's bit width */
  name: z.string().min(1).optional(),
  chain: Chain.optional(),
  address: RawAddress,
  status: PuzzleStatus,
  prize: z.number().optional(),
  pubkey: z
    .object({
      value: z.string().min(1),
      format: PubkeyFormat,
    })
    .optional(),
  key: RawKey.optional(),
  /** Solver table id */
  solver: z.string().min(1).optional(),
  /** Solver table id of whoever moved the funds, when not the solver */
  claimer: z.string().min(1).optional(),
  transactions: z.array(RawTransaction).default([]),
  start_date: z.string().min(1).optional(),
  solve_date: z.string().min(1).optional(),
  pre_genesis: z.boolean().default(false),
  source_url: z.string().min(1).optional(),
  assets: z
    .object({
      puzzle: z.string().min(1).optional(),
      solver: z.string().min(1).optional(),
      hints: z.array(z.string().min(1)).default([]),
      source_url: z.string().min(1).optional(),
    })
    .optional(),
});
export type RawPuzzle = z.infer<typeof RawPuzzleSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COLLECTION DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Collection header. Puzzles are parsed one by one afterwards so that a bad
 * record is reported with its index.
 */
export const RawCollectionHeaderSchema = z
  .object({
    collection: z
      .string()
      .regex(/^[a-z0-9_]+$/, "Collection names use lowercase letters, digits and underscores"),
    description: z.string().min(1).optional(),
    source_url: z.string().min(1).optional(),
    author: z.string().min(1).optional(),
    chain: Chain.optional(),
    aliases: z.array(z.string().min(1)).default([]),
    puzzles: z.array(z.unknown()).optional(),
    puzzle: z.unknown().optional(),
  })
  .refine((doc) => (doc.puzzles === undefined) !== (doc.puzzle === undefined), {
    message: 'Exactly one of "puzzles" or "puzzle" must be present',
    path: ["puzzles"],
  });
export type RawCollectionHeader = z.infer<typeof RawCollectionHeaderSchema>;

export interface RawCollectionDocument {
  header: RawCollectionHeader;
  /** Records in declaration order */
  puzzles: RawPuzzle[];
  /** True when the document used the single "puzzle" form */
  single: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// SOLVER TABLE
// ═══════════════════════════════════════════════════════════════════════════

export const RawSolverSchema = z.object({
  name: z.string().min(1).optional(),
  addresses: z.array(z.string().min(1)).default([]),
  profiles: z
    .array(
      z.object({
        name: z.string().min(1),
        url: z.string().min(1),
      })
    )
    .default([]),
});
export type RawSolver = z.infer<typeof RawSolverSchema>;

export const RawSolverTableSchema = z.object({
  solvers: z.record(z.string(), RawSolverSchema),
});
export type RawSolverTable = z.infer<typeof RawSolverTableSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A source document as read from disk (or built in memory by tests).
 */
export interface SourceDocument {
  /** Base name without extension, e.g. "b1000" or "solvers" */
  name: string;
  text: string;
}

export type DocumentIssueKind = "parse" | "schema" | "missing_field";

export interface DocumentIssue {
  kind: DocumentIssueKind;
  /** Document name */
  document: string;
  /** Record index within the document, for puzzle records */
  index?: number;
  /** Dotted path of the offending field */
  field: string;
  message: string;
}

export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; issues: DocumentIssue[] };

function parseJson(source: SourceDocument): ParseResult<unknown> {
  try {
    return { success: true, value: JSON.parse(source.text) };
  } catch (err) {
    return {
      success: false,
      issues: [
        {
          kind: "parse",
          document: source.name,
          field: "(root)",
          message: err instanceof Error ? err.message : String(err),
        },
      ],
    };
  }
}

/**
 * Convert zod issues into document issues. A required field that is absent
 * is reported as "missing_field"; everything else as "schema".
 */
function toDocumentIssues(
  zodIssues: ZodIssue[],
  document: string,
  prefix: (string | number)[],
  index?: number
): DocumentIssue[] {
  return zodIssues.map((issue): DocumentIssue => {
    const path = [...prefix, ...issue.path].filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    );
    const missing = issue.code === "invalid_type" && issue.received === "undefined";
    return {
      kind: missing ? "missing_field" : "schema",
      document,
      ...(index !== undefined ? { index } : {}),
      field: path.length > 0 ? path.join(".") : "(root)",
      message: issue.message,
    };
  });
}

/**
 * Parse one collection document, keeping record order.
 * All record-level problems are collected before failing.
 */
export function parseCollectionDocument(source: SourceDocument): ParseResult<RawCollectionDocument> {
  const json = parseJson(source);
  if (!json.success) {
    return json;
  }

  const header = RawCollectionHeaderSchema.safeParse(json.value);
  if (!header.success) {
    return {
      success: false,
      issues: toDocumentIssues(header.error.issues, source.name, []),
    };
  }

  const single = header.data.puzzles === undefined;
  const rawRecords: unknown[] = header.data.puzzles ?? [header.data.puzzle];
  const puzzles: RawPuzzle[] = [];
  const issues: DocumentIssue[] = [];

  rawRecords.forEach((record, index) => {
    const parsed = RawPuzzleSchema.safeParse(record);
    if (parsed.success) {
      puzzles.push(parsed.data);
    } else {
      const prefix = single ? ["puzzle"] : ["puzzles", index];
      issues.push(...toDocumentIssues(parsed.error.issues, source.name, prefix, index));
    }
  });

  if (issues.length > 0) {
    return { success: false, issues };
  }
  return { success: true, value: { header: header.data, puzzles, single } };
}

export function parseSolverTable(source: SourceDocument): ParseResult<RawSolverTable> {
  const json = parseJson(source);
  if (!json.success) {
    return json;
  }
  const parsed = RawSolverTableSchema.safeParse(json.value);
  if (!parsed.success) {
    return {
      success: false,
      issues: toDocumentIssues(parsed.error.issues, source.name, []),
    };
  }
  return { success: true, value: parsed.data };
}
