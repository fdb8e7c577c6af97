/**
 * Wallet Import Format.
 *
 *   version byte | 32-byte key | 0x01 if compressed | 4-byte checksum
 */

import { base58checkDecode, base58checkEncode } from "./address.js";
import { bytesToHex, hexToBytes, isHex } from "./hash.js";

export interface DecodedWif {
  version: number;
  /** 64 hex chars, lowercase */
  keyHex: string;
  compressed: boolean;
}

export type WifDecodeResult =
  | { success: true; wif: DecodedWif }
  | { success: false; message: string };

export function decodeWif(wif: string): WifDecodeResult {
  const decoded = base58checkDecode(wif);
  if (!decoded.success) {
    return { success: false, message: decoded.message };
  }
  const { payload } = decoded;

  if (payload.length !== 33 && payload.length !== 34) {
    return {
      success: false,
      message: `invalid WIF length: ${payload.length} bytes (expected 33 or 34)`,
    };
  }
  const compressed = payload.length === 34;
  if (compressed && payload[33] !== 0x01) {
    return { success: false, message: "invalid WIF compression flag" };
  }

  return {
    success: true,
    wif: {
      version: payload[0] ?? 0,
      keyHex: bytesToHex(payload.slice(1, 33)),
      compressed,
    },
  };
}

export function encodeWif(keyHex: string, version: number, compressed: boolean): string {
  if (!isHex(keyHex, 32)) {
    throw new Error(`WIF encoding needs a 32-byte hex key, got "${keyHex}"`);
  }
  const payload = new Uint8Array(compressed ? 34 : 33);
  payload[0] = version;
  payload.set(hexToBytes(keyHex), 1);
  if (compressed) {
    payload[33] = 0x01;
  }
  return base58checkEncode(payload);
}
