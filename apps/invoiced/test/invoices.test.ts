/**
 * invoiced routes — exercised through app.inject on an in-memory store.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { MemoryKvDb } from "@invoicedb/kvdb";
import { bytes32FromHex, paymentHash, toHex } from "@invoicedb/channeldb";

const P1 = "01".repeat(32);
const H1 = "72cd6e8422c407fb6d098690f1130b7ded7ec2f7f5e1d30bd9d521f015363793";
const P2 = "02".repeat(32);
const H2 = "75877bb41d393b5fb8455ce60ecd8dda001d06316496b14dfa7f895656eeca4a";

let buildApp: typeof import("../src/server.js").buildApp;
let app: FastifyInstance;

describe("invoiced", () => {
  beforeAll(async () => {
    process.env.LOG_LEVEL = "silent";
    ({ buildApp } = await import("../src/server.js"));
  });

  beforeEach(async () => {
    app = await buildApp({ db: new MemoryKvDb() });
  });

  afterEach(async () => {
    await app.close();
  });

  async function add(payload: Record<string, unknown>) {
    return app.inject({ method: "POST", url: "/invoices", payload });
  }

  // ── POST /invoices ───────────────────────────────────────────

  it("creates an invoice and returns its id and payment hash", async () => {
    const res = await add({ value: "1000", memo: "coffee", payment_preimage: P1 });

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.id).toBe(0);
    expect(body.payment_hash).toBe(H1);
    expect(body.invoice).toMatchObject({
      payment_hash: H1,
      payment_preimage: P1,
      value: "1000",
      settled: false,
      memo: "coffee",
      receipt: "",
    });
  });

  it("numbers invoices from 0 upwards", async () => {
    expect((await add({ value: "1000", payment_preimage: P1 })).json().id).toBe(0);
    expect((await add({ value: "2000", payment_preimage: P2 })).json().id).toBe(1);
  });

  it("generates a preimage when none is given", async () => {
    const res = await add({ value: "5" });
    expect(res.statusCode).toBe(201);
    const { invoice } = res.json();
    expect(invoice.payment_preimage).toMatch(/^[0-9a-f]{64}$/);
    expect(invoice.payment_hash).toBe(
      toHex(paymentHash(bytes32FromHex(invoice.payment_preimage))),
    );
  });

  it("returns 409 for a duplicate preimage", async () => {
    await add({ value: "1000", payment_preimage: P1 });
    const res = await add({ value: "1", payment_preimage: P1 });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: "duplicate_invoice",
      message: `invoice with payment hash ${H1} already exists`,
    });
  });

  it("returns 400 for a memo over 1024 bytes", async () => {
    const res = await add({ value: "1", memo: "m".repeat(1025) });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_invoice");
  });

  it("returns 400 for a value that does not fit in int64", async () => {
    const res = await add({ value: "9223372036854775808" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_invoice");
  });

  it("rejects a body that fails the schema", async () => {
    const res = await add({ value: "ten" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  // ── GET /invoices/:hash ──────────────────────────────────────

  it("looks an invoice up by payment hash", async () => {
    await add({ value: "1000", memo: "coffee", payment_preimage: P1 });
    const res = await app.inject({ method: "GET", url: `/invoices/${H1}` });
    expect(res.statusCode).toBe(200);
    expect(res.json().value).toBe("1000");
    expect(res.json().settled).toBe(false);
  });

  it("returns 404 for an unknown payment hash", async () => {
    const res = await app.inject({ method: "GET", url: `/invoices/${H2}` });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("invoice_not_found");
  });

  it("returns 400 for a malformed payment hash", async () => {
    const res = await app.inject({ method: "GET", url: "/invoices/not-a-hash" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "invalid_payment_hash" });
  });

  // ── settle + list ────────────────────────────────────────────

  it("settles, then lists only pending invoices", async () => {
    await add({ value: "1000", memo: "coffee", payment_preimage: P1 });
    await add({ value: "2000", payment_preimage: P2 });

    const settle = await app.inject({ method: "POST", url: `/invoices/${H1}/settle` });
    expect(settle.statusCode).toBe(200);
    expect(settle.json().settled).toBe(true);

    const again = await app.inject({ method: "POST", url: `/invoices/${H1}/settle` });
    expect(again.statusCode).toBe(200);

    const lookup = await app.inject({ method: "GET", url: `/invoices/${H1}` });
    expect(lookup.json().settled).toBe(true);

    const pending = await app.inject({ method: "GET", url: "/invoices?pending=true" });
    expect(pending.statusCode).toBe(200);
    expect(pending.json().invoices.map((i: { payment_hash: string }) => i.payment_hash)).toEqual([H2]);

    const all = await app.inject({ method: "GET", url: "/invoices" });
    expect(all.json().invoices).toHaveLength(2);
  });

  it("returns 404 settling an unknown invoice", async () => {
    const res = await app.inject({ method: "POST", url: `/invoices/${H1}/settle` });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("invoice_not_found");
  });

  it("returns 404 listing before any invoice exists", async () => {
    const res = await app.inject({ method: "GET", url: "/invoices" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: "no_invoices_created",
      message: "no invoices have been created",
    });
  });

  // ── health ───────────────────────────────────────────────────

  it("reports the next invoice id", async () => {
    await add({ value: "1", payment_preimage: P1 });
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("ok");
    expect(res.json().next_invoice_id).toBe(1);
  });
});
