/**
 * Address decoding and encoding.
 *
 * Decoding recovers the committed digest (hash160 or witness program) and the
 * address kind, so the validator can compare them with what a record declares.
 *
 *   bitcoin / litecoin  base58check (P2PKH, P2SH), bech32 v0 (P2WPKH, P2WSH),
 *                       bech32m v1 (P2TR)
 *   ethereum            0x + 40 hex, no embedded hash160
 *   decred              base58, Ds (P2PKH) / Dc (P2SH) prefixes; the
 *                       blake256 checksum is not verified
 *   monero              base58 alphabet and length only
 */

import { base58, bech32, bech32m } from "@scure/base";
import type { AddressKind, Chain } from "../puzzles/schema.js";
import { chainInfo } from "../puzzles/chain.js";
import { bytesToHex, hash256 } from "./hash.js";

export interface DecodedAddress {
  kind: AddressKind;
  /** hex; set for P2PKH, P2SH and P2WPKH */
  hash160?: string;
  /** hex; set for segwit kinds */
  witnessProgram?: string;
  witnessVersion?: number;
}

export type AddressDecodeResult =
  | { success: true; address: DecodedAddress }
  | { success: false; message: string };

function fail(message: string): AddressDecodeResult {
  return { success: false, message };
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE58CHECK
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Append the 4-byte double-sha256 checksum and base58-encode.
 */
export function base58checkEncode(payload: Uint8Array): string {
  const checksum = hash256(payload).slice(0, 4);
  const data = new Uint8Array(payload.length + 4);
  data.set(payload);
  data.set(checksum, payload.length);
  return base58.encode(data);
}

export type Base58CheckResult =
  | { success: true; payload: Uint8Array }
  | { success: false; message: string };

export function base58checkDecode(value: string): Base58CheckResult {
  let data: Uint8Array;
  try {
    data = base58.decode(value);
  } catch (err) {
    return { success: false, message: `invalid base58: ${String(err)}` };
  }
  if (data.length < 5) {
    return { success: false, message: "base58 payload too short" };
  }
  const payload = data.slice(0, -4);
  const checksum = data.slice(-4);
  const expected = hash256(payload).slice(0, 4);
  if (!checksum.every((byte, i) => byte === expected[i])) {
    return { success: false, message: "base58 checksum mismatch" };
  }
  return { success: true, payload };
}

// ═══════════════════════════════════════════════════════════════════════════
// SEGWIT
// ═══════════════════════════════════════════════════════════════════════════

interface SegwitDecoded {
  hrp: string;
  version: number;
  program: Uint8Array;
}

function hasSeparator(value: string): value is `${string}1${string}` {
  return value.includes("1");
}

function decodeSegwit(value: string): SegwitDecoded | string {
  const lowered = value.toLowerCase();
  if (value !== lowered && value !== value.toUpperCase()) {
    return "mixed-case bech32 address";
  }
  if (!hasSeparator(lowered)) {
    return "missing bech32 separator";
  }

  // v0 programs use bech32, v1+ use bech32m
  for (const [codec, modern] of [
    [bech32, false],
    [bech32m, true],
  ] as const) {
    let prefix: string;
    let words: number[];
    try {
      ({ prefix, words } = codec.decode(lowered));
    } catch {
      continue;
    }
    const [version, ...programWords] = words;
    if (version === undefined || version > 16) {
      return "invalid witness version";
    }
    if ((version === 0) === modern) {
      return `witness version ${version} encoded with the wrong checksum variant`;
    }
    let program: Uint8Array;
    try {
      program = codec.fromWords(programWords);
    } catch (err) {
      return `invalid witness program: ${String(err)}`;
    }
    return { hrp: prefix, version, program };
  }
  return "invalid bech32 checksum";
}

/**
 * Encode a witness program as a segwit address.
 */
export function encodeSegwit(hrp: string, version: number, program: Uint8Array): string {
  const words = [version, ...bech32.toWords(program)];
  return version === 0 ? bech32.encode(hrp, words) : bech32m.encode(hrp, words);
}

// ═══════════════════════════════════════════════════════════════════════════
// PER-CHAIN DECODING
// ═══════════════════════════════════════════════════════════════════════════

function decodeBitcoinLike(value: string, chain: Chain): AddressDecodeResult {
  const info = chainInfo(chain);

  if (info.bech32Hrp !== undefined && value.toLowerCase().startsWith(`${info.bech32Hrp}1`)) {
    const segwit = decodeSegwit(value);
    if (typeof segwit === "string") {
      return fail(segwit);
    }
    if (segwit.hrp !== info.bech32Hrp) {
      return fail(`unexpected bech32 prefix "${segwit.hrp}"`);
    }
    const programHex = bytesToHex(segwit.program);
    if (segwit.version === 0 && segwit.program.length === 20) {
      return {
        success: true,
        address: { kind: "p2wpkh", hash160: programHex, witnessProgram: programHex, witnessVersion: 0 },
      };
    }
    if (segwit.version === 0 && segwit.program.length === 32) {
      return {
        success: true,
        address: { kind: "p2wsh", witnessProgram: programHex, witnessVersion: 0 },
      };
    }
    if (segwit.version === 1 && segwit.program.length === 32) {
      return {
        success: true,
        address: { kind: "p2tr", witnessProgram: programHex, witnessVersion: 1 },
      };
    }
    return fail(
      `unsupported witness program (version ${segwit.version}, ${segwit.program.length} bytes)`
    );
  }

  const decoded = base58checkDecode(value);
  if (!decoded.success) {
    return fail(decoded.message);
  }
  const { payload } = decoded;
  if (payload.length !== 21) {
    return fail(`expected 21-byte payload, got ${payload.length}`);
  }
  const version = payload[0];
  const hash = bytesToHex(payload.slice(1));
  if (version === info.p2pkhVersion) {
    return { success: true, address: { kind: "p2pkh", hash160: hash } };
  }
  if (version !== undefined && info.p2shVersions?.includes(version)) {
    return { success: true, address: { kind: "p2sh", hash160: hash } };
  }
  return fail(`unknown version byte 0x${(version ?? 0).toString(16).padStart(2, "0")}`);
}

const DECRED_P2PKH = 0x073f;
const DECRED_P2SH = 0x071a;

function decodeDecred(value: string): AddressDecodeResult {
  let data: Uint8Array;
  try {
    data = base58.decode(value);
  } catch (err) {
    return fail(`invalid base58: ${String(err)}`);
  }
  if (data.length !== 26) {
    return fail(`expected 26 bytes, got ${data.length}`);
  }
  const prefix = ((data[0] ?? 0) << 8) | (data[1] ?? 0);
  const hash = bytesToHex(data.slice(2, 22));
  if (prefix === DECRED_P2PKH) {
    return { success: true, address: { kind: "p2pkh", hash160: hash } };
  }
  if (prefix === DECRED_P2SH) {
    return { success: true, address: { kind: "p2sh", hash160: hash } };
  }
  return fail(`unknown decred prefix 0x${prefix.toString(16)}`);
}

const ETHEREUM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const MONERO_ADDRESS = /^[48][1-9A-HJ-NP-Za-km-z]{94}$/;

/**
 * Decode an address for the given chain.
 */
export function decodeAddress(value: string, chain: Chain): AddressDecodeResult {
  switch (chain) {
    case "bitcoin":
    case "litecoin":
      return decodeBitcoinLike(value, chain);
    case "decred":
      return decodeDecred(value);
    case "ethereum":
      return ETHEREUM_ADDRESS.test(value)
        ? { success: true, address: { kind: "p2pkh" } }
        : fail("expected 0x followed by 40 hex characters");
    case "monero":
      return MONERO_ADDRESS.test(value)
        ? { success: true, address: { kind: "p2pkh" } }
        : fail("expected a 95-character base58 address starting with 4 or 8");
  }
}

/**
 * Encode a hash160 as a base58check address with the given version byte.
 */
export function encodeBase58Address(version: number, hash: Uint8Array): string {
  const payload = new Uint8Array(1 + hash.length);
  payload[0] = version;
  payload.set(hash, 1);
  return base58checkEncode(payload);
}
