/**
 * Hashing, address codecs, WIF and key derivation.
 */

export { hash160, hash256, hash160Hex, sha256Hex, keccak256, isHex, bytesToHex, hexToBytes } from "./hash.js";
export {
  decodeAddress,
  encodeBase58Address,
  encodeSegwit,
  base58checkEncode,
  base58checkDecode,
  type DecodedAddress,
  type AddressDecodeResult,
  type Base58CheckResult,
} from "./address.js";
export { decodeWif, encodeWif, type DecodedWif, type WifDecodeResult } from "./wif.js";
export {
  parsePrivateKey,
  derivePublicKey,
  deriveAddress,
  keyControlsAddress,
  type DeriveResult,
  type AddressMatch,
} from "./keys.js";
