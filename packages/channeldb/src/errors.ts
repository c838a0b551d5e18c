/**
 * Invoice store error kinds.
 *
 * Every error carries a stable `code` so transports can map it without
 * instanceof checks. Nothing here is retried by the store.
 */

export type InvoiceDbErrorCode =
  | "invalid_invoice"
  | "duplicate_invoice"
  | "duplicate_payment_hash"
  | "invoice_not_found"
  | "no_invoices_created"
  | "malformed_record"
  | "invoice_ids_exhausted";

export class InvoiceDbError extends Error {
  constructor(
    readonly code: InvoiceDbErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "InvoiceDbError";
  }
}

/** Memo/receipt over their cap, bad preimage length, value outside int64. */
export class InvalidInvoiceError extends InvoiceDbError {
  constructor(message: string) {
    super("invalid_invoice", message);
    this.name = "InvalidInvoiceError";
  }
}

/** An invoice paying to this payment hash already exists. */
export class DuplicateInvoiceError extends InvoiceDbError {
  constructor(readonly paymentHashHex: string) {
    super("duplicate_invoice", `invoice with payment hash ${paymentHashHex} already exists`);
    this.name = "DuplicateInvoiceError";
  }
}

/** Index entry already present when reserving a payment hash. */
export class DuplicatePaymentHashError extends InvoiceDbError {
  constructor(readonly paymentHashHex: string) {
    super("duplicate_payment_hash", `payment hash ${paymentHashHex} is already indexed`);
    this.name = "DuplicatePaymentHashError";
  }
}

export class InvoiceNotFoundError extends InvoiceDbError {
  constructor(readonly paymentHashHex: string) {
    super("invoice_not_found", `no invoice for payment hash ${paymentHashHex}`);
    this.name = "InvoiceNotFoundError";
  }
}

export class NoInvoicesCreatedError extends InvoiceDbError {
  constructor() {
    super("no_invoices_created", "no invoices have been created");
    this.name = "NoInvoicesCreatedError";
  }
}

/** Stored bytes do not decode as an invoice. */
export class MalformedRecordError extends InvoiceDbError {
  constructor(message: string) {
    super("malformed_record", `malformed invoice record: ${message}`);
    this.name = "MalformedRecordError";
  }
}

export class InvoiceIdsExhaustedError extends InvoiceDbError {
  constructor() {
    super("invoice_ids_exhausted", "invoice identifier space exhausted");
    this.name = "InvoiceIdsExhaustedError";
  }
}
