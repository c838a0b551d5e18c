#!/usr/bin/env node
/**
 * invoicedb CLI — inspect and drive a local invoice database.
 *
 * Commands:
 *   add <value>             Create an invoice (--memo, --receipt, --preimage)
 *   lookup <payment_hash>   Show one invoice
 *   list [--pending]        List invoices in id order
 *   settle <payment_hash>   Mark an invoice settled
 *
 * Global: --db <path> (default $INVOICE_DB_PATH or ./data/invoices.db)
 */

import { Command } from "commander";
import { loadConfig } from "./lib/config.js";
import { withStore } from "./lib/store.js";
import { addCommand, type AddOptions } from "./commands/add.js";
import { lookupCommand, settleCommand } from "./commands/lookup.js";
import { listCommand } from "./commands/list.js";

const program = new Command();

program
  .name("invoicedb")
  .description("Durable Lightning invoice storage")
  .version("0.1.0")
  .option("--db <path>", "Invoice database file");

function config() {
  return loadConfig(program.opts<{ db?: string }>());
}

// ── add ─────────────────────────────────────────────────────────────

program
  .command("add")
  .description("Create an invoice for <value> (smallest currency unit)")
  .argument("<value>", "Amount, signed 64-bit integer")
  .option("-m, --memo <text>", "Free-form description (≤ 1024 bytes)")
  .option("-r, --receipt <hex>", "Receipt bytes, hex (≤ 1024 bytes)")
  .option("-p, --preimage <hex>", "32-byte payment preimage, hex (default: random)")
  .action((value: string, opts: AddOptions) => {
    withStore(config(), (store) => addCommand(store, value, opts));
  });

// ── lookup ──────────────────────────────────────────────────────────

program
  .command("lookup")
  .description("Show the invoice paying to <payment_hash>")
  .argument("<payment_hash>", "64-char hex SHA256 of the preimage")
  .action((hash: string) => {
    withStore(config(), (store) => lookupCommand(store, hash));
  });

// ── list ────────────────────────────────────────────────────────────

program
  .command("list")
  .description("List invoices in creation order")
  .option("--pending", "Only unsettled invoices")
  .action((opts: { pending?: boolean }) => {
    withStore(config(), (store) => listCommand(store, opts));
  });

// ── settle ──────────────────────────────────────────────────────────

program
  .command("settle")
  .description("Mark the invoice paying to <payment_hash> as settled")
  .argument("<payment_hash>", "64-char hex SHA256 of the preimage")
  .action((hash: string) => {
    withStore(config(), (store) => settleCommand(store, hash));
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
