/**
 * Hash primitives shared by address decoding, WIF handling and validation.
 */

import { sha256 } from "@noble/hashes/sha256";
import { ripemd160 } from "@noble/hashes/ripemd160";
import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export { bytesToHex, hexToBytes };

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * True when `value` is even-length hex, optionally of an exact byte length.
 */
export function isHex(value: string, byteLength?: number): boolean {
  if (value.length % 2 !== 0 || !HEX_PATTERN.test(value)) {
    return false;
  }
  return byteLength === undefined || value.length === byteLength * 2;
}

/** RIPEMD160(SHA256(data)) */
export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

/** SHA256(SHA256(data)) */
export function hash256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

/** hash160 of hex input, as lowercase hex. */
export function hash160Hex(hex: string): string {
  return bytesToHex(hash160(hexToBytes(hex)));
}

export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}
