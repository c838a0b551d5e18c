/**
 * Terminal rendering of invoices.
 */

import type { InvoiceJson } from "@invoicedb/channeldb";

/** One line: hash, value, state, memo. */
export function formatInvoiceLine(inv: InvoiceJson): string {
  const state = inv.settled ? "settled" : "pending";
  const memo = inv.memo ? `  ${inv.memo}` : "";
  return `${inv.payment_hash}  ${inv.value.padStart(12)}  ${state}${memo}`;
}

/** Multi-line detail block for a single invoice. */
export function formatInvoice(inv: InvoiceJson): string[] {
  const lines = [
    `  payment_hash:     ${inv.payment_hash}`,
    `  payment_preimage: ${inv.payment_preimage}`,
    `  value:            ${inv.value}`,
    `  settled:          ${inv.settled ? "yes" : "no"}`,
    `  created:          ${inv.creation_time}`,
  ];
  if (inv.memo) lines.push(`  memo:             ${inv.memo}`);
  else if (inv.memo_hex) lines.push(`  memo (hex):       ${inv.memo_hex}`);
  if (inv.receipt) lines.push(`  receipt:          ${inv.receipt}`);
  return lines;
}
