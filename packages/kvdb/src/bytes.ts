/**
 * Byte helpers shared by both engines.
 */

import { KvError } from "./types.js";

/** Lexicographic byte comparison (memcmp order, shorter prefix first). */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = a[i] - b[i];
    if (d !== 0) return d;
  }
  return a.length - b.length;
}

export function assertKey(key: Uint8Array): void {
  if (key.length === 0) {
    throw new KvError("key must not be empty");
  }
}
