/**
 * invoicedb lookup <payment_hash>
 * invoicedb settle <payment_hash>
 */

import { bytes32FromHex, invoiceToJson, type InvoiceStore } from "@invoicedb/channeldb";
import { formatInvoice } from "../lib/format.js";

function parseHash(hash: string) {
  if (!/^[0-9a-f]{64}$/.test(hash)) {
    throw new Error(`Invalid payment hash: must be 64-char hex. Got: ${hash}`);
  }
  return bytes32FromHex(hash);
}

export function lookupCommand(store: InvoiceStore, hash: string): void {
  const invoice = store.lookupInvoice(parseHash(hash));
  for (const line of formatInvoice(invoiceToJson(invoice))) console.log(line);
}

export function settleCommand(store: InvoiceStore, hash: string): void {
  const invoice = store.settleInvoice(parseHash(hash));
  console.log("Invoice settled");
  for (const line of formatInvoice(invoiceToJson(invoice))) console.log(line);
}
