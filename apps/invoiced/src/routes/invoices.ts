/**
 * Invoice routes.
 *
 *   POST /invoices                   — add (preimage generated if omitted)
 *   GET  /invoices?pending=true      — list, optionally unsettled only
 *   GET  /invoices/:hash             — look up by payment hash
 *   POST /invoices/:hash/settle      — mark settled
 *
 * Store errors are turned into responses by the app's error handler.
 */

import type { FastifyInstance } from "fastify";
import {
  AddInvoiceRequest,
  ListInvoicesQuery,
  PaymentHashParams,
  bytes32FromHex,
  fromHex,
  invoiceToJson,
  newInvoice,
  type InvoiceStore,
} from "@invoicedb/channeldb";

const HASH_RE = /^[0-9a-f]{64}$/;

export function invoiceRoutes(app: FastifyInstance, store: InvoiceStore): void {
  app.post<{ Body: AddInvoiceRequest }>(
    "/invoices",
    { schema: { body: AddInvoiceRequest } },
    async (request, reply) => {
      const { value, memo, receipt, payment_preimage } = request.body;

      const invoice = newInvoice({
        value: BigInt(value),
        memo,
        receipt: receipt !== undefined ? fromHex(receipt) : undefined,
        paymentPreimage:
          payment_preimage !== undefined ? bytes32FromHex(payment_preimage) : undefined,
      });
      const id = store.addInvoice(invoice);
      const json = invoiceToJson(invoice);

      return reply.status(201).send({
        id,
        payment_hash: json.payment_hash,
        invoice: json,
      });
    },
  );

  app.get<{ Querystring: ListInvoicesQuery }>(
    "/invoices",
    { schema: { querystring: ListInvoicesQuery } },
    async (request, reply) => {
      const invoices = store.fetchAllInvoices(request.query.pending ?? false);
      return reply.send({ invoices: invoices.map(invoiceToJson) });
    },
  );

  app.get<{ Params: PaymentHashParams }>(
    "/invoices/:hash",
    async (request, reply) => {
      const { hash } = request.params;
      if (!HASH_RE.test(hash)) {
        return reply.status(400).send({ error: "invalid_payment_hash" });
      }
      return reply.send(invoiceToJson(store.lookupInvoice(bytes32FromHex(hash))));
    },
  );

  app.post<{ Params: PaymentHashParams }>(
    "/invoices/:hash/settle",
    async (request, reply) => {
      const { hash } = request.params;
      if (!HASH_RE.test(hash)) {
        return reply.status(400).send({ error: "invalid_payment_hash" });
      }
      return reply.send(invoiceToJson(store.settleInvoice(bytes32FromHex(hash))));
    },
  );
}
