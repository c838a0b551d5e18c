/**
 * Payment hash index + invoice id counter.
 *
 * Lives in the `paymenthashes` bucket nested under `invoices`:
 *   "nik"          → next invoice id (uint32 BE), absent = 0
 *   payment_hash   → invoice id (uint32 BE)
 *
 * The counter is only ever read and written inside the same write
 * transaction that stores the invoice it numbers.
 */

import type { ReadBucket, WriteBucket } from "@invoicedb/kvdb";
import type { Bytes32 } from "./bytes32.js";
import { INVOICE_KEY_SIZE, MAX_INVOICE_ID, NEXT_INVOICE_ID_KEY } from "./constants.js";
import {
  DuplicatePaymentHashError,
  InvoiceIdsExhaustedError,
  MalformedRecordError,
} from "./errors.js";
import { toHex } from "./hash.js";

/** Primary key for an invoice id: 4 bytes big-endian. */
export function invoiceKey(id: number): Uint8Array {
  const key = new Uint8Array(INVOICE_KEY_SIZE);
  new DataView(key.buffer).setUint32(0, id);
  return key;
}

/** Inverse of invoiceKey(). Undefined for anything that isn't 4 bytes. */
export function invoiceIdFromKey(key: Uint8Array): number | undefined {
  if (key.length !== INVOICE_KEY_SIZE) return undefined;
  return new DataView(key.buffer, key.byteOffset, key.byteLength).getUint32(0);
}

function readId(bytes: Uint8Array, field: string): number {
  const id = invoiceIdFromKey(bytes);
  if (id === undefined) {
    throw new MalformedRecordError(`${field}: expected ${INVOICE_KEY_SIZE} bytes, got ${bytes.length}`);
  }
  return id;
}

/** Id the next invoice will get. Does not advance the counter. */
export function nextInvoiceId(index: ReadBucket): number {
  const counter = index.get(NEXT_INVOICE_ID_KEY);
  return counter ? readId(counter, "invoice counter") : 0;
}

/** Invoice id indexed under the payment hash, or undefined. */
export function resolvePaymentHash(index: ReadBucket, hash: Bytes32): number | undefined {
  const id = index.get(hash);
  return id ? readId(id, "payment hash index entry") : undefined;
}

/** Map payment hash → id. The index must stay injective. */
export function reservePaymentHash(index: WriteBucket, hash: Bytes32, id: number): void {
  if (index.get(hash) !== undefined) {
    throw new DuplicatePaymentHashError(toHex(hash));
  }
  index.put(hash, invoiceKey(id));
}

/** Record that `id` has been handed out: the counter becomes id + 1. */
export function advanceInvoiceCounter(index: WriteBucket, id: number): void {
  if (id >= MAX_INVOICE_ID) {
    throw new InvoiceIdsExhaustedError();
  }
  index.put(NEXT_INVOICE_ID_KEY, invoiceKey(id + 1));
}
