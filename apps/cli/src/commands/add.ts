/**
 * invoicedb add <value>
 *
 * Build an invoice (random preimage unless --preimage is given) and store it.
 */

import {
  bytes32FromHex,
  fromHex,
  invoiceToJson,
  newInvoice,
  type InvoiceStore,
} from "@invoicedb/channeldb";
import { formatInvoice } from "../lib/format.js";

export interface AddOptions {
  memo?: string;
  receipt?: string;
  preimage?: string;
}

export function addCommand(store: InvoiceStore, value: string, opts: AddOptions): void {
  if (!/^-?[0-9]+$/.test(value)) {
    throw new Error(`Invalid value: must be an integer. Got: ${value}`);
  }
  if (opts.receipt !== undefined && !/^([0-9a-f]{2})*$/.test(opts.receipt)) {
    throw new Error(`Invalid receipt: must be hex. Got: ${opts.receipt}`);
  }
  if (opts.preimage !== undefined && !/^[0-9a-f]{64}$/.test(opts.preimage)) {
    throw new Error(`Invalid preimage: must be 64-char hex. Got: ${opts.preimage}`);
  }

  const invoice = newInvoice({
    value: BigInt(value),
    memo: opts.memo,
    receipt: opts.receipt !== undefined ? fromHex(opts.receipt) : undefined,
    paymentPreimage: opts.preimage !== undefined ? bytes32FromHex(opts.preimage) : undefined,
  });
  const id = store.addInvoice(invoice);

  console.log(`Invoice ${id} added`);
  for (const line of formatInvoice(invoiceToJson(invoice))) console.log(line);
}
