/**
 * Invoice records as held in memory.
 */

import type { Bytes32 } from "./bytes32.js";

/** Conditions that must hold before the invoice counts as paid. */
export interface ContractTerm {
  /** Revealed by the payer; its SHA256 is the invoice's payment hash. */
  paymentPreimage: Bytes32;
  /** Expected amount in the smallest currency unit (signed 64-bit). */
  value: bigint;
  /** Flipped to true once by settleInvoice(); never back. */
  settled: boolean;
}

export interface Invoice {
  /** Free-form description, at most MAX_MEMO_SIZE bytes. Empty = none. */
  memo: Uint8Array;
  /** Opaque proof-of-payment material, at most MAX_RECEIPT_SIZE bytes. Empty = none. */
  receipt: Uint8Array;
  creationTime: Date;
  terms: ContractTerm;
}
