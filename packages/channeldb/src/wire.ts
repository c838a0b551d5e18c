/**
 * Conversions between Invoice and its JSON wire form.
 */

import { randomBytes } from "@noble/hashes/utils";
import { toBytes32, type Bytes32 } from "./bytes32.js";
import { paymentHash, toHex } from "./hash.js";
import type { InvoiceJson } from "./schemas/invoice.js";
import type { Invoice } from "./types.js";

export interface NewInvoiceParams {
  value: bigint;
  memo?: string;
  receipt?: Uint8Array;
  /** Generated (32 random bytes) when omitted. */
  paymentPreimage?: Bytes32;
  /** Defaults to now. */
  creationTime?: Date;
}

/** Build an unsettled invoice ready for InvoiceStore.addInvoice(). */
export function newInvoice(params: NewInvoiceParams): Invoice {
  return {
    memo: new TextEncoder().encode(params.memo ?? ""),
    receipt: params.receipt ?? new Uint8Array(0),
    creationTime: params.creationTime ?? new Date(),
    terms: {
      paymentPreimage: params.paymentPreimage ?? toBytes32(randomBytes(32)),
      value: params.value,
      settled: false,
    },
  };
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Memo as text, or undefined when the bytes are not valid UTF-8. */
function memoText(memo: Uint8Array): string | undefined {
  try {
    return utf8.decode(memo);
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

export function invoiceToJson(invoice: Invoice): InvoiceJson {
  return {
    payment_hash: toHex(paymentHash(invoice.terms.paymentPreimage)),
    payment_preimage: toHex(invoice.terms.paymentPreimage),
    value: invoice.terms.value.toString(),
    settled: invoice.terms.settled,
    memo: memoText(invoice.memo),
    memo_hex: toHex(invoice.memo),
    receipt: toHex(invoice.receipt),
    creation_time: invoice.creationTime.toISOString(),
  };
}
