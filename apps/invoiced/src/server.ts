/**
 * invoiced — HTTP front for the invoice store.
 *
 * Routes:
 *   POST /invoices               — create an invoice
 *   GET  /invoices               — list invoices (?pending=true for unsettled only)
 *   GET  /invoices/:hash         — look up by payment hash
 *   POST /invoices/:hash/settle  — settle by payment hash
 *   GET  /health                 — health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import { SqliteKvDb, type KvDb } from "@invoicedb/kvdb";
import {
  InvoiceDbError,
  InvoiceStore,
  type InvoiceDbErrorCode,
} from "@invoicedb/channeldb";
import { config } from "./config.js";
import { invoiceRoutes } from "./routes/invoices.js";
import { healthRoutes } from "./routes/health.js";

const STATUS_BY_CODE: Record<InvoiceDbErrorCode, number> = {
  invalid_invoice: 400,
  duplicate_invoice: 409,
  duplicate_payment_hash: 409,
  invoice_not_found: 404,
  no_invoices_created: 404,
  malformed_record: 500,
  invoice_ids_exhausted: 507,
};

export interface InvoicedDeps {
  /** Storage engine. Defaults to SQLite at config.dbPath. */
  db?: KvDb;
}

export async function buildApp(deps?: InvoicedDeps) {
  const app = Fastify({ logger: { level: config.logLevel } });

  const db = deps?.db ?? SqliteKvDb.open(config.dbPath);
  const store = new InvoiceStore(db, { logger: app.log });

  app.addHook("onClose", async () => {
    db.close();
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof InvoiceDbError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) request.log.error({ err }, "invoice store failure");
      return reply.status(status).send({ error: err.code, message: err.message });
    }
    if (err.validation) {
      return reply.status(400).send({ error: "invalid_request", message: err.message });
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });

  invoiceRoutes(app, store);
  healthRoutes(app, store);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── invoiced config ───");
  console.log(`  port:      ${config.port}`);
  console.log(`  db_path:   ${config.dbPath}`);
  console.log(`  log_level: ${config.logLevel}`);
  console.log("───────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
