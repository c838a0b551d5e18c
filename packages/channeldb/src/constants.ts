/**
 * Record limits and bucket layout.
 *
 * Changing any of these changes the on-disk format.
 */

// ── Field caps ─────────────────────────────────────────────────────
export const MAX_MEMO_SIZE = 1024;
export const MAX_RECEIPT_SIZE = 1024;
export const MAX_TIMESTAMP_SIZE = 300;

// ── Fixed widths ───────────────────────────────────────────────────
export const PREIMAGE_SIZE = 32;
export const PAYMENT_HASH_SIZE = 32;
export const INVOICE_KEY_SIZE = 4; // uint32 big-endian
export const VALUE_SIZE = 8; // int64 big-endian

export const MAX_INVOICE_ID = 0xffff_ffff;
export const MIN_VALUE = -(2n ** 63n);
export const MAX_VALUE = 2n ** 63n - 1n;

// ── Buckets ────────────────────────────────────────────────────────
const ascii = (s: string): Uint8Array => new TextEncoder().encode(s);

/** Top-level bucket: invoice id → encoded invoice. */
export const INVOICE_BUCKET = ascii("invoices");
/** Nested in INVOICE_BUCKET: payment hash → invoice id, plus the counter. */
export const PAYMENT_HASH_INDEX_BUCKET = ascii("paymenthashes");
/** Key in the index bucket holding the next invoice id. */
export const NEXT_INVOICE_ID_KEY = ascii("nik");
