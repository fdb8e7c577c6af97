/**
 * Crypto Primitive Tests
 *
 * Run with: node --import tsx --test src/crypto/crypto.test.ts
 *
 * These tests verify:
 *   1. Address decoding per chain and kind
 *   2. WIF decoding and encoding
 *   3. Key to address derivation
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { decodeAddress, base58checkDecode } from "./address.js";
import { decodeWif, encodeWif } from "./wif.js";
import {
  deriveAddress,
  derivePublicKey,
  keyControlsAddress,
  parsePrivateKey,
} from "./keys.js";
import { hash160Hex, isHex } from "./hash.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const KEY_ONE = "0000000000000000000000000000000000000000000000000000000000000001";
const KEY_THREE = "0000000000000000000000000000000000000000000000000000000000000003";
const KEY_ONE_HASH160 = "751e76e8199196d454941c45d1b3a323f1433bd6";

// ═══════════════════════════════════════════════════════════════════════════
// HASHING
// ═══════════════════════════════════════════════════════════════════════════

test("isHex checks parity, alphabet and byte length", () => {
  assert.equal(isHex("00ff"), true);
  assert.equal(isHex("0f0"), false);
  assert.equal(isHex("zz"), false);
  assert.equal(isHex(KEY_ONE, 32), true);
  assert.equal(isHex(KEY_ONE, 33), false);
});

test("hash160Hex of a compressed public key gives its address hash", () => {
  assert.equal(
    hash160Hex("0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798"),
    KEY_ONE_HASH160
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ADDRESS DECODING
// ═══════════════════════════════════════════════════════════════════════════

test("Bitcoin P2PKH decodes to its hash160", () => {
  const result = decodeAddress("1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH", "bitcoin");
  assert.deepEqual(result, {
    success: true,
    address: { kind: "p2pkh", hash160: KEY_ONE_HASH160 },
  });
});

test("Bitcoin P2SH decodes to the script hash", () => {
  const result = decodeAddress("35Snmmy3uhaer2gTboc81ayCip4m9DT4ko", "bitcoin");
  assert.deepEqual(result, {
    success: true,
    address: { kind: "p2sh", hash160: "292fb39df7cd619a396069383928e6bfb74ebec5" },
  });
});

test("Bech32 addresses decode to P2WPKH and P2WSH", () => {
  assert.deepEqual(decodeAddress("bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4", "bitcoin"), {
    success: true,
    address: {
      kind: "p2wpkh",
      hash160: KEY_ONE_HASH160,
      witnessProgram: KEY_ONE_HASH160,
      witnessVersion: 0,
    },
  });

  const wsh = decodeAddress(
    "bc1qrp33g0q5c5txsp9arysrx4k6zdkfs4nce4xj0gdcccefvpysxf3qccfmv3",
    "bitcoin"
  );
  assert.ok(wsh.success);
  assert.equal(wsh.address.kind, "p2wsh");
  assert.equal(
    wsh.address.witnessProgram,
    "1863143c14c5166804bd19203356da136c985678cd4d27a1b8c6329604903262"
  );
  assert.equal(wsh.address.hash160, undefined);
});

test("Bech32m address decodes to P2TR", () => {
  const result = decodeAddress(
    "bc1p5d7rjq7g6rdk2yhzks9smlaqtedr4dekq08ge8ztwac72sfr9rusxg3297",
    "bitcoin"
  );
  assert.ok(result.success);
  assert.equal(result.address.kind, "p2tr");
  assert.equal(result.address.witnessVersion, 1);
  assert.equal(
    result.address.witnessProgram,
    "a37c3903c8d0db6512e2b40b0dffa05e5a3ab73603ce8c9c4b7771e5412328f9"
  );
});

test("Litecoin addresses use litecoin version bytes and prefix", () => {
  const legacy = decodeAddress("LVuDpNCSSj6pQ7t9Pv6d6sUkLKoqDEVUnJ", "litecoin");
  assert.ok(legacy.success);
  assert.equal(legacy.address.kind, "p2pkh");
  assert.equal(legacy.address.hash160, KEY_ONE_HASH160);

  const segwit = decodeAddress("ltc1qw508d6qejxtdg4y5r3zarvary0c5xw7kgmn4n9", "litecoin");
  assert.ok(segwit.success);
  assert.equal(segwit.address.kind, "p2wpkh");

  // a bitcoin P2PKH address is not a litecoin address
  assert.equal(decodeAddress("1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH", "litecoin").success, false);
});

test("Corrupted addresses fail to decode", () => {
  const result = decodeAddress("1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMJ", "bitcoin");
  assert.deepEqual(result, { success: false, message: "base58 checksum mismatch" });
  assert.equal(
    decodeAddress("bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t5", "bitcoin").success,
    false
  );
  assert.equal(decodeAddress("0OIl", "bitcoin").success, false);
});

test("Ethereum addresses are checked by format only", () => {
  assert.deepEqual(decodeAddress("0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf", "ethereum"), {
    success: true,
    address: { kind: "p2pkh" },
  });
  assert.equal(decodeAddress("0x7e5f45", "ethereum").success, false);
});

test("base58checkDecode returns the version-prefixed payload", () => {
  const result = base58checkDecode("1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH");
  assert.ok(result.success);
  assert.equal(result.payload.length, 21);
  assert.equal(result.payload[0], 0x00);
});

// ═══════════════════════════════════════════════════════════════════════════
// WIF
// ═══════════════════════════════════════════════════════════════════════════

test("decodeWif reads version, key and compression flag", () => {
  assert.deepEqual(decodeWif("KwDiBf89QgGbjEhKnhXJuH7LrciVrZi3qYjgd9M7rFU73sVHnoWn"), {
    success: true,
    wif: { version: 0x80, keyHex: KEY_ONE, compressed: true },
  });
  assert.deepEqual(decodeWif("5HpHagT65TZzG1PH3CSu63k8DbpvD8s5ip4nEB3kEsreAnchuDf"), {
    success: true,
    wif: { version: 0x80, keyHex: KEY_ONE, compressed: false },
  });
});

test("encodeWif produces bitcoin and litecoin WIFs", () => {
  assert.equal(
    encodeWif(KEY_THREE, 0x80, true),
    "KwDiBf89QgGbjEhKnhXJuH7LrciVrZi3qYjgd9M7rFU74sHUHy8S"
  );
  assert.equal(
    encodeWif(KEY_ONE, 0xb0, true),
    "T33ydQRKp4FCW5LCLLUB7deioUMoveiwekdwUwyfRDeGZm76aUjV"
  );
  assert.throws(() => encodeWif("01", 0x80, true), /32-byte hex key/);
});

test("decodeWif rejects payloads of the wrong length", () => {
  // a P2PKH address is valid base58check but carries 21 bytes
  const result = decodeWif("1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH");
  assert.deepEqual(result, {
    success: false,
    message: "invalid WIF length: 21 bytes (expected 33 or 34)",
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// KEY DERIVATION
// ═══════════════════════════════════════════════════════════════════════════

test("parsePrivateKey accepts scalars in [1, n-1] only", () => {
  assert.equal(parsePrivateKey(KEY_ONE), 1n);
  assert.equal(parsePrivateKey("0".repeat(64)), undefined);
  assert.equal(
    parsePrivateKey("fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141"),
    undefined
  );
  assert.equal(parsePrivateKey("01"), undefined);
});

test("derivePublicKey gives SEC1 encodings", () => {
  assert.equal(
    derivePublicKey(KEY_THREE, true),
    "02f9308a019258c31049344f85f89d5229b531c845836f99b08601f113bce036f9"
  );
  assert.equal(derivePublicKey(KEY_ONE, false)?.slice(0, 4), "0479");
});

test("deriveAddress covers P2PKH, P2WPKH and ethereum", () => {
  assert.deepEqual(deriveAddress(KEY_ONE, "bitcoin", "p2pkh", true), {
    success: true,
    address: "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH",
  });
  assert.deepEqual(deriveAddress(KEY_ONE, "bitcoin", "p2pkh", false), {
    success: true,
    address: "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm",
  });
  assert.deepEqual(deriveAddress(KEY_ONE, "bitcoin", "p2wpkh", true), {
    success: true,
    address: "bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4",
  });
  assert.deepEqual(deriveAddress(KEY_ONE, "litecoin", "p2pkh", true), {
    success: true,
    address: "LVuDpNCSSj6pQ7t9Pv6d6sUkLKoqDEVUnJ",
  });
  assert.deepEqual(deriveAddress(KEY_ONE, "ethereum", "p2pkh", true), {
    success: true,
    address: "0x7e5f4552091a69125d5dfcb7b8c2659029395bdf",
  });
});

test("deriveAddress refuses kinds it cannot derive", () => {
  assert.deepEqual(deriveAddress(KEY_ONE, "bitcoin", "p2sh", true), {
    success: false,
    message: "derivation not supported for bitcoin p2sh addresses",
  });
});

test("keyControlsAddress tries both compressions when none is declared", () => {
  const uncompressed = keyControlsAddress(
    KEY_ONE,
    "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm",
    "bitcoin",
    "p2pkh"
  );
  assert.deepEqual(uncompressed, {
    success: true,
    matches: true,
    derived: "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm",
  });

  const pinned = keyControlsAddress(
    KEY_ONE,
    "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm",
    "bitcoin",
    "p2pkh",
    true
  );
  assert.deepEqual(pinned, {
    success: true,
    matches: false,
    derived: "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH",
  });
});

test("keyControlsAddress compares ethereum addresses case-insensitively", () => {
  const result = keyControlsAddress(
    "0000000000000000000000000000000000000000000000000000000000000002",
    "0x2B5AD5c4795c026514f8317c7a215E218DcCD6cF",
    "ethereum",
    "p2pkh"
  );
  assert.ok(result.success);
  assert.equal(result.matches, true);
});
