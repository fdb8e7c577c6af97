/**
 * Private key to address derivation.
 *
 * Used by the validator to confirm that a revealed key actually controls the
 * puzzle address. Supported: bitcoin and litecoin P2PKH/P2WPKH, ethereum.
 */

import { getPublicKey } from "@noble/secp256k1";
import type { AddressKind, Chain } from "../puzzles/schema.js";
import { chainInfo } from "../puzzles/chain.js";
import { encodeBase58Address, encodeSegwit } from "./address.js";
import { bytesToHex, hash160, isHex, keccak256 } from "./hash.js";

const CURVE_ORDER = 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/**
 * Parse a private key as a scalar in [1, n-1]; undefined otherwise.
 */
export function parsePrivateKey(keyHex: string): bigint | undefined {
  if (!isHex(keyHex, 32)) {
    return undefined;
  }
  const scalar = BigInt(`0x${keyHex}`);
  return scalar > 0n && scalar < CURVE_ORDER ? scalar : undefined;
}

/**
 * SEC1 public key for a private key, as lowercase hex.
 */
export function derivePublicKey(keyHex: string, compressed: boolean): string | undefined {
  const scalar = parsePrivateKey(keyHex);
  if (scalar === undefined) {
    return undefined;
  }
  return bytesToHex(getPublicKey(scalar, compressed));
}

export type DeriveResult =
  | { success: true; address: string }
  | { success: false; message: string };

/**
 * Address controlled by `keyHex` for the given chain and address kind.
 */
export function deriveAddress(
  keyHex: string,
  chain: Chain,
  kind: AddressKind,
  compressed: boolean
): DeriveResult {
  const scalar = parsePrivateKey(keyHex);
  if (scalar === undefined) {
    return { success: false, message: "key is not a valid secp256k1 scalar" };
  }

  if (chain === "ethereum") {
    const uncompressed = getPublicKey(scalar, false);
    const digest = keccak256(uncompressed.slice(1));
    return { success: true, address: `0x${bytesToHex(digest.slice(12))}` };
  }

  const info = chainInfo(chain);
  const pubkeyHash = hash160(getPublicKey(scalar, compressed));

  if (kind === "p2pkh" && info.p2pkhVersion !== undefined) {
    return { success: true, address: encodeBase58Address(info.p2pkhVersion, pubkeyHash) };
  }
  if (kind === "p2wpkh" && info.bech32Hrp !== undefined) {
    return { success: true, address: encodeSegwit(info.bech32Hrp, 0, pubkeyHash) };
  }
  return {
    success: false,
    message: `derivation not supported for ${chain} ${kind} addresses`,
  };
}

export type AddressMatch =
  | { success: true; matches: boolean; derived: string }
  | { success: false; message: string };

/**
 * Whether a key derives `address`, trying the given compression or both.
 * Ethereum addresses compare case-insensitively (checksum casing).
 */
export function keyControlsAddress(
  keyHex: string,
  address: string,
  chain: Chain,
  kind: AddressKind,
  compressed?: boolean
): AddressMatch {
  const candidates = compressed === undefined ? [true, false] : [compressed];
  let derived = "";

  for (const flag of candidates) {
    const result = deriveAddress(keyHex, chain, kind, flag);
    if (!result.success) {
      return result;
    }
    derived = result.address;
    const same =
      chain === "ethereum" ? derived.toLowerCase() === address.toLowerCase() : derived === address;
    if (same) {
      return { success: true, matches: true, derived };
    }
  }
  return { success: true, matches: false, derived };
}
