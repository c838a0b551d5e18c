/**
 * GET /health — liveness plus a read through the store.
 */

import type { FastifyInstance } from "fastify";
import type { InvoiceStore } from "@invoicedb/channeldb";

export function healthRoutes(app: FastifyInstance, store: InvoiceStore): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      next_invoice_id: store.nextInvoiceId(),
      timestamp: Date.now(),
    });
  });
}
