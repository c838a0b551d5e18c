import { describe, it, expect } from "vitest";
import { toBytes32 } from "../src/bytes32.js";
import { paymentHash, toHex } from "../src/hash.js";
import { invoiceToJson, newInvoice } from "../src/wire.js";

describe("newInvoice", () => {
  it("builds an unsettled invoice from params", () => {
    const preimage = toBytes32(new Uint8Array(32).fill(1));
    const inv = newInvoice({
      value: 1000n,
      memo: "coffee",
      paymentPreimage: preimage,
      creationTime: new Date(0),
    });
    expect(inv).toEqual({
      memo: new TextEncoder().encode("coffee"),
      receipt: new Uint8Array(0),
      creationTime: new Date(0),
      terms: { paymentPreimage: preimage, value: 1000n, settled: false },
    });
  });

  it("generates distinct 32-byte preimages when none is given", () => {
    const a = newInvoice({ value: 1n }).terms.paymentPreimage;
    const b = newInvoice({ value: 1n }).terms.paymentPreimage;
    expect(a).toHaveLength(32);
    expect(toHex(a)).not.toBe(toHex(b));
  });
});

describe("invoiceToJson", () => {
  it("hex-encodes bytes and stringifies the amount", () => {
    const preimage = toBytes32(new Uint8Array(32).fill(1));
    const json = invoiceToJson({
      memo: new TextEncoder().encode("coffee"),
      receipt: new Uint8Array([0xde, 0xad]),
      creationTime: new Date(1_700_000_000_000),
      terms: { paymentPreimage: preimage, value: -42n, settled: true },
    });
    expect(json).toEqual({
      payment_hash: "72cd6e8422c407fb6d098690f1130b7ded7ec2f7f5e1d30bd9d521f015363793",
      payment_preimage: "01".repeat(32),
      value: "-42",
      settled: true,
      memo: "coffee",
      memo_hex: "636f66666565",
      receipt: "dead",
      creation_time: "2023-11-14T22:13:20.000Z",
    });
  });

  it("leaves memo out when its bytes are not UTF-8, keeping them in memo_hex", () => {
    const inv = newInvoice({ value: 1n, paymentPreimage: toBytes32(new Uint8Array(32).fill(1)) });
    inv.memo = new Uint8Array([0x63, 0xff, 0xfe]);
    const json = invoiceToJson(inv);
    expect(json.memo).toBeUndefined();
    expect(json.memo_hex).toBe("63fffe");
  });

  it("derives payment_hash from the preimage", () => {
    const preimage = toBytes32(new Uint8Array(32).fill(2));
    const json = invoiceToJson(newInvoice({ value: 1n, paymentPreimage: preimage }));
    expect(json.payment_hash).toBe(toHex(paymentHash(preimage)));
  });
});
