/**
 * Invoice store — add, look up, enumerate and settle invoices.
 *
 * Layout inside the KvDb:
 *   invoices/                       invoice id (uint32 BE) → encoded invoice
 *   invoices/paymenthashes/         payment hash → invoice id, "nik" → next id
 *
 * Every payment hash maps to exactly one invoice. Ids start at 0, grow by
 * one per invoice and are never reused. Invoices are never deleted; the
 * only mutation is settled: false → true.
 *
 * Each operation is one KvDb transaction. If anything throws, nothing
 * it wrote is kept.
 */

import { pino, type BaseLogger } from "pino";
import type { KvDb, ReadBucket } from "@invoicedb/kvdb";
import type { Bytes32 } from "./bytes32.js";
import { decodeInvoice, encodeInvoice } from "./codec.js";
import {
  INVOICE_BUCKET,
  MAX_MEMO_SIZE,
  MAX_RECEIPT_SIZE,
  MAX_VALUE,
  MIN_VALUE,
  PAYMENT_HASH_INDEX_BUCKET,
  PREIMAGE_SIZE,
} from "./constants.js";
import {
  DuplicateInvoiceError,
  InvalidInvoiceError,
  InvoiceNotFoundError,
  NoInvoicesCreatedError,
} from "./errors.js";
import { paymentHash, toHex } from "./hash.js";
import {
  advanceInvoiceCounter,
  invoiceKey,
  nextInvoiceId,
  reservePaymentHash,
  resolvePaymentHash,
} from "./payment-index.js";
import type { Invoice } from "./types.js";

/** The slice of a pino logger the store writes to; Fastify's app.log fits. */
export type InvoiceStoreLogger = Pick<BaseLogger, "info" | "debug">;

export interface InvoiceStoreOptions {
  /** Defaults to a silent pino logger. */
  logger?: InvoiceStoreLogger;
}

/** Checks run before any transaction is opened. */
export function validateInvoice(invoice: Invoice): void {
  if (invoice.memo.length > MAX_MEMO_SIZE) {
    throw new InvalidInvoiceError(
      `max length of a memo is ${MAX_MEMO_SIZE}, got ${invoice.memo.length}`,
    );
  }
  if (invoice.receipt.length > MAX_RECEIPT_SIZE) {
    throw new InvalidInvoiceError(
      `max length of a receipt is ${MAX_RECEIPT_SIZE}, got ${invoice.receipt.length}`,
    );
  }
  if (invoice.terms.paymentPreimage.length !== PREIMAGE_SIZE) {
    throw new InvalidInvoiceError(
      `payment preimage must be ${PREIMAGE_SIZE} bytes, got ${invoice.terms.paymentPreimage.length}`,
    );
  }
  if (invoice.terms.value < MIN_VALUE || invoice.terms.value > MAX_VALUE) {
    throw new InvalidInvoiceError(`value ${invoice.terms.value} does not fit in int64`);
  }
  if (Number.isNaN(invoice.creationTime.getTime())) {
    throw new InvalidInvoiceError("creation time is not a valid date");
  }
}

/** Resolve a payment hash and decode the invoice it points at. */
function fetchByHash(
  invoices: ReadBucket,
  index: ReadBucket,
  hash: Bytes32,
): { key: Uint8Array; invoice: Invoice } {
  const id = resolvePaymentHash(index, hash);
  if (id === undefined) {
    throw new InvoiceNotFoundError(toHex(hash));
  }
  const key = invoiceKey(id);
  const record = invoices.get(key);
  if (!record) {
    throw new InvoiceNotFoundError(toHex(hash));
  }
  return { key, invoice: decodeInvoice(record) };
}

export class InvoiceStore {
  private readonly log: InvoiceStoreLogger;

  constructor(
    private readonly db: KvDb,
    opts: InvoiceStoreOptions = {},
  ) {
    this.log = opts.logger ?? pino({ level: "silent" });
  }

  /**
   * Insert a new invoice and return its id.
   * Rejects any invoice whose payment hash is already indexed.
   */
  addInvoice(invoice: Invoice): number {
    validateInvoice(invoice);

    const { id, hash } = this.db.update((tx) => {
      const invoices = tx.createBucketIfNotExists(INVOICE_BUCKET);
      const index = invoices.createBucketIfNotExists(PAYMENT_HASH_INDEX_BUCKET);

      const hash = paymentHash(invoice.terms.paymentPreimage);
      if (resolvePaymentHash(index, hash) !== undefined) {
        throw new DuplicateInvoiceError(toHex(hash));
      }

      const id = nextInvoiceId(index);
      reservePaymentHash(index, hash, id);
      advanceInvoiceCounter(index, id);
      invoices.put(invoiceKey(id), encodeInvoice(invoice));
      return { id, hash };
    });

    this.log.info({ id, payment_hash: toHex(hash) }, "invoice added");
    return id;
  }

  /**
   * Invoice paying to `hash`. Callers should still check the terms
   * (value, settled) before accepting an incoming payment.
   */
  lookupInvoice(hash: Bytes32): Invoice {
    const invoice = this.db.view((tx) => {
      const invoices = tx.bucket(INVOICE_BUCKET);
      const index = invoices?.bucket(PAYMENT_HASH_INDEX_BUCKET);
      if (!invoices || !index) {
        throw new InvoiceNotFoundError(toHex(hash));
      }
      return fetchByHash(invoices, index, hash).invoice;
    });
    this.log.debug({ payment_hash: toHex(hash) }, "invoice looked up");
    return invoice;
  }

  /**
   * Every stored invoice in id order. With pendingOnly, settled ones are
   * skipped. A record that fails to decode fails the whole call.
   */
  fetchAllInvoices(pendingOnly: boolean): Invoice[] {
    const result = this.db.view((tx) => {
      const invoices = tx.bucket(INVOICE_BUCKET);
      if (!invoices) {
        throw new NoInvoicesCreatedError();
      }

      const out: Invoice[] = [];
      invoices.forEach((_key, value) => {
        // Nested buckets (the payment hash index) have no value.
        if (value === undefined || value.length === 0) return;
        const invoice = decodeInvoice(value);
        if (pendingOnly && invoice.terms.settled) return;
        out.push(invoice);
      });
      return out;
    });
    this.log.debug({ count: result.length, pendingOnly }, "invoices fetched");
    return result;
  }

  /**
   * Mark the invoice paying to `hash` as settled and return it.
   * Settling twice is a no-op. The index is never touched.
   */
  settleInvoice(hash: Bytes32): Invoice {
    const settled = this.db.update((tx) => {
      const invoices = tx.bucket(INVOICE_BUCKET);
      const index = invoices?.bucket(PAYMENT_HASH_INDEX_BUCKET);
      if (!invoices || !index) {
        throw new InvoiceNotFoundError(toHex(hash));
      }

      const { key, invoice } = fetchByHash(invoices, index, hash);
      invoice.terms.settled = true;
      invoices.put(key, encodeInvoice(invoice));
      return invoice;
    });

    this.log.info({ payment_hash: toHex(hash) }, "invoice settled");
    return settled;
  }

  /** Id the next added invoice will receive (0 on an empty store). */
  nextInvoiceId(): number {
    return this.db.view((tx) => {
      const index = tx.bucket(INVOICE_BUCKET)?.bucket(PAYMENT_HASH_INDEX_BUCKET);
      return index ? nextInvoiceId(index) : 0;
    });
  }
}
