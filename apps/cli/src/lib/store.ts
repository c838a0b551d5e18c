/**
 * Open the invoice store for one command and close it afterwards.
 */

import { SqliteKvDb } from "@invoicedb/kvdb";
import { InvoiceStore } from "@invoicedb/channeldb";
import type { CliConfig } from "./config.js";

export function withStore<T>(config: CliConfig, fn: (store: InvoiceStore) => T): T {
  const db = SqliteKvDb.open(config.dbPath);
  try {
    return fn(new InvoiceStore(db));
  } finally {
    db.close();
  }
}
