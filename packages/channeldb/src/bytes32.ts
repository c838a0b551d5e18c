/**
 * Fixed 32-byte values (preimages, payment hashes).
 *
 * The brand only exists at the type level; the length check in
 * isBytes32/toBytes32 is what earns it.
 */

declare const bytes32Brand: unique symbol;

export type Bytes32 = Uint8Array & { readonly [bytes32Brand]: true };

export function isBytes32(bytes: Uint8Array): bytes is Bytes32 {
  return bytes.length === 32;
}

export function toBytes32(bytes: Uint8Array): Bytes32 {
  if (!isBytes32(bytes)) {
    throw new RangeError(`expected 32 bytes, got ${bytes.length}`);
  }
  return bytes;
}
