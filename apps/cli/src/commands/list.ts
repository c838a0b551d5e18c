/**
 * invoicedb list [--pending]
 */

import { invoiceToJson, type InvoiceStore } from "@invoicedb/channeldb";
import { formatInvoiceLine } from "../lib/format.js";

export function listCommand(store: InvoiceStore, opts: { pending?: boolean }): void {
  const invoices = store.fetchAllInvoices(opts.pending ?? false);
  if (invoices.length === 0) {
    console.log(opts.pending ? "No pending invoices" : "No invoices");
    return;
  }
  for (const invoice of invoices) {
    console.log(formatInvoiceLine(invoiceToJson(invoice)));
  }
}
