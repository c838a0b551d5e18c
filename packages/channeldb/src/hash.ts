/**
 * Payment hash primitive.
 *
 * payment_hash = SHA256(payment_preimage), 32 bytes.
 * Hex is lowercase, 64 chars, same as LND's r_hash_str.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { toBytes32, type Bytes32 } from "./bytes32.js";

export function paymentHash(preimage: Bytes32): Bytes32 {
  return toBytes32(sha256(preimage));
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

/** Parse a 64-char hex string into a Bytes32. Throws on bad hex or length. */
export function bytes32FromHex(hex: string): Bytes32 {
  return toBytes32(hexToBytes(hex));
}
