/**
 * @invoicedb/channeldb — durable invoice storage for a Lightning node.
 *
 * Invoices are keyed by a monotonically increasing uint32 id and indexed
 * by payment hash (SHA256 of the preimage). Storage goes through the
 * @invoicedb/kvdb transactional bucket interface.
 */

// Store
export {
  InvoiceStore,
  validateInvoice,
  type InvoiceStoreOptions,
  type InvoiceStoreLogger,
} from "./invoice-store.js";

// Record types
export type { Invoice, ContractTerm } from "./types.js";
export { isBytes32, toBytes32, type Bytes32 } from "./bytes32.js";

// Codec
export {
  encodeInvoice,
  decodeInvoice,
  encodeTimestamp,
  decodeTimestamp,
} from "./codec.js";

// Index
export {
  nextInvoiceId,
  resolvePaymentHash,
  reservePaymentHash,
  advanceInvoiceCounter,
  invoiceKey,
  invoiceIdFromKey,
} from "./payment-index.js";

// Hashing
export { paymentHash, toHex, fromHex, bytes32FromHex } from "./hash.js";

// Wire form
export { newInvoice, invoiceToJson, type NewInvoiceParams } from "./wire.js";
export {
  InvoiceJson,
  AddInvoiceRequest,
  PaymentHashParams,
  ListInvoicesQuery,
} from "./schemas/invoice.js";

// Errors
export {
  InvoiceDbError,
  InvalidInvoiceError,
  DuplicateInvoiceError,
  DuplicatePaymentHashError,
  InvoiceNotFoundError,
  NoInvoicesCreatedError,
  MalformedRecordError,
  InvoiceIdsExhaustedError,
  type InvoiceDbErrorCode,
} from "./errors.js";

// Constants
export * from "./constants.js";
