/**
 * JSON wire form of invoices.
 *
 * Bytes travel as lowercase hex, the amount as a decimal string (it is
 * a signed 64-bit integer and does not fit a JSON number), time as ISO-8601.
 * The memo is raw bytes: memo_hex always carries them, memo only when they
 * are valid UTF-8.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
const Hex = Type.String({ pattern: "^([0-9a-f]{2})*$" });
const Int64String = Type.String({ pattern: "^-?[0-9]{1,19}$" });

export const InvoiceJson = Type.Object(
  {
    payment_hash: Hex32,
    payment_preimage: Hex32,
    value: Int64String,
    settled: Type.Boolean(),
    memo: Type.Optional(Type.String()),
    memo_hex: Hex,
    receipt: Hex,
    creation_time: Type.String(),
  },
  { additionalProperties: false },
);

export type InvoiceJson = Static<typeof InvoiceJson>;

export const AddInvoiceRequest = Type.Object(
  {
    value: Int64String,
    memo: Type.Optional(Type.String()),
    receipt: Type.Optional(Hex),
    /** Omit to have one generated. */
    payment_preimage: Type.Optional(Hex32),
  },
  { additionalProperties: false },
);

export type AddInvoiceRequest = Static<typeof AddInvoiceRequest>;

export const PaymentHashParams = Type.Object({
  hash: Type.String(),
});

export type PaymentHashParams = Static<typeof PaymentHashParams>;

export const ListInvoicesQuery = Type.Object({
  pending: Type.Optional(Type.Boolean()),
});

export type ListInvoicesQuery = Static<typeof ListInvoicesQuery>;
