/**
 * Invoice store on the SQLite engine — ids and index survive a restart.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SqliteKvDb } from "@invoicedb/kvdb";
import { InvoiceStore } from "../src/invoice-store.js";
import { DuplicateInvoiceError } from "../src/errors.js";
import { paymentHash } from "../src/hash.js";
import { newInvoice } from "../src/wire.js";
import { toBytes32 } from "../src/bytes32.js";

const p1 = toBytes32(new Uint8Array(32).fill(1));
const p2 = toBytes32(new Uint8Array(32).fill(2));
const p3 = toBytes32(new Uint8Array(32).fill(3));

describe("InvoiceStore over SqliteKvDb", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "channeldb-sqlite-test-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("continues numbering from the persisted counter after reopening", () => {
    const path = join(tmpDir, "invoices.db");

    const db1 = SqliteKvDb.open(path);
    const store1 = new InvoiceStore(db1);
    expect(store1.addInvoice(newInvoice({ value: 1000n, memo: "coffee", paymentPreimage: p1 }))).toBe(0);
    expect(store1.addInvoice(newInvoice({ value: 2000n, paymentPreimage: p2 }))).toBe(1);
    store1.settleInvoice(paymentHash(p1));
    db1.close();

    const db2 = SqliteKvDb.open(path);
    const store2 = new InvoiceStore(db2);
    expect(store2.nextInvoiceId()).toBe(2);
    expect(store2.lookupInvoice(paymentHash(p1)).terms.settled).toBe(true);
    expect(() => store2.addInvoice(newInvoice({ value: 1n, paymentPreimage: p2 }))).toThrow(
      DuplicateInvoiceError,
    );
    expect(store2.addInvoice(newInvoice({ value: 3000n, paymentPreimage: p3 }))).toBe(2);
    expect(store2.fetchAllInvoices(true).map((inv) => inv.terms.value)).toEqual([2000n, 3000n]);
    db2.close();
  });
});
