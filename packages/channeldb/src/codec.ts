/**
 * Invoice record codec.
 *
 * Layout (all multi-byte integers big-endian unless noted):
 *   var_bytes(memo)             ≤ 1024
 *   var_bytes(receipt)          ≤ 1024
 *   var_bytes(timestamp)        ≤ 300
 *   payment_preimage            32 bytes
 *   value                       8 bytes, two's complement
 *   settled                     1 byte, 0x01 = true
 *
 * var_bytes = CompactSize length (little-endian, minimal) || bytes.
 * timestamp = 0x01 || int64 milliseconds since the Unix epoch.
 *
 * Same invoice → identical bytes, always. Trailing bytes after the
 * settled flag are ignored on decode.
 */

import { toBytes32 } from "./bytes32.js";
import {
  MAX_MEMO_SIZE,
  MAX_RECEIPT_SIZE,
  MAX_TIMESTAMP_SIZE,
  PREIMAGE_SIZE,
  VALUE_SIZE,
} from "./constants.js";
import { MalformedRecordError } from "./errors.js";
import type { Invoice } from "./types.js";

const TIMESTAMP_VERSION = 0x01;
const TIMESTAMP_SIZE = 9;
/** Largest |ms| a Date can hold (ECMA-262 time value range). */
const MAX_DATE_MS = 8_640_000_000_000_000n;

// ── Writer ─────────────────────────────────────────────────────────

class RecordWriter {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;

  raw(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.size += bytes.length;
  }

  compactSize(n: number): void {
    if (n < 0xfd) {
      this.raw(Uint8Array.of(n));
    } else if (n <= 0xffff) {
      const buf = new Uint8Array(3);
      buf[0] = 0xfd;
      new DataView(buf.buffer).setUint16(1, n, true);
      this.raw(buf);
    } else if (n <= 0xffff_ffff) {
      const buf = new Uint8Array(5);
      buf[0] = 0xfe;
      new DataView(buf.buffer).setUint32(1, n, true);
      this.raw(buf);
    } else {
      const buf = new Uint8Array(9);
      buf[0] = 0xff;
      new DataView(buf.buffer).setBigUint64(1, BigInt(n), true);
      this.raw(buf);
    }
  }

  varBytes(bytes: Uint8Array): void {
    this.compactSize(bytes.length);
    this.raw(bytes);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

// ── Reader ─────────────────────────────────────────────────────────

class RecordReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private need(n: number, field: string): number {
    const remaining = this.bytes.length - this.offset;
    if (remaining < n) {
      throw new MalformedRecordError(
        `${field}: need ${n} bytes, ${remaining} remain`,
      );
    }
    const start = this.offset;
    this.offset += n;
    return start;
  }

  take(n: number, field: string): Uint8Array {
    const start = this.need(n, field);
    return this.bytes.slice(start, start + n);
  }

  private fixed(n: number, field: string): DataView {
    const start = this.need(n, field);
    return new DataView(this.view.buffer, this.view.byteOffset + start, n);
  }

  /** CompactSize length, rejecting non-minimal encodings. */
  compactSize(field: string): bigint {
    const prefix = this.fixed(1, field).getUint8(0);
    let n: bigint;
    let min: bigint;
    switch (prefix) {
      case 0xfd:
        n = BigInt(this.fixed(2, field).getUint16(0, true));
        min = 0xfdn;
        break;
      case 0xfe:
        n = BigInt(this.fixed(4, field).getUint32(0, true));
        min = 0x1_0000n;
        break;
      case 0xff:
        n = this.fixed(8, field).getBigUint64(0, true);
        min = 0x1_0000_0000n;
        break;
      default:
        return BigInt(prefix);
    }
    if (n < min) {
      throw new MalformedRecordError(`${field}: non-canonical length prefix`);
    }
    return n;
  }

  varBytes(cap: number, field: string): Uint8Array {
    const length = this.compactSize(field);
    if (length > BigInt(cap)) {
      throw new MalformedRecordError(
        `${field}: length ${length} exceeds maximum ${cap}`,
      );
    }
    return this.take(Number(length), field);
  }

  int64(field: string): bigint {
    return this.fixed(VALUE_SIZE, field).getBigInt64(0);
  }

  uint8(field: string): number {
    return this.fixed(1, field).getUint8(0);
  }
}

// ── Timestamp ──────────────────────────────────────────────────────

export function encodeTimestamp(date: Date): Uint8Array {
  const buf = new Uint8Array(TIMESTAMP_SIZE);
  buf[0] = TIMESTAMP_VERSION;
  new DataView(buf.buffer).setBigInt64(1, BigInt(date.getTime()));
  return buf;
}

export function decodeTimestamp(bytes: Uint8Array): Date {
  if (bytes.length !== TIMESTAMP_SIZE) {
    throw new MalformedRecordError(
      `timestamp: expected ${TIMESTAMP_SIZE} bytes, got ${bytes.length}`,
    );
  }
  if (bytes[0] !== TIMESTAMP_VERSION) {
    throw new MalformedRecordError(`timestamp: unknown version ${bytes[0]}`);
  }
  const ms = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigInt64(1);
  if (ms > MAX_DATE_MS || ms < -MAX_DATE_MS) {
    throw new MalformedRecordError(`timestamp: ${ms}ms is out of range`);
  }
  return new Date(Number(ms));
}

// ── Invoice ────────────────────────────────────────────────────────

/** Serialize an invoice. Expects an invoice that passed validateInvoice(). */
export function encodeInvoice(invoice: Invoice): Uint8Array {
  const w = new RecordWriter();
  w.varBytes(invoice.memo);
  w.varBytes(invoice.receipt);
  w.varBytes(encodeTimestamp(invoice.creationTime));
  w.raw(invoice.terms.paymentPreimage);

  const value = new Uint8Array(VALUE_SIZE);
  new DataView(value.buffer).setBigInt64(0, invoice.terms.value);
  w.raw(value);

  w.raw(Uint8Array.of(invoice.terms.settled ? 1 : 0));
  return w.finish();
}

/** Deserialize a stored invoice. Throws MalformedRecordError. */
export function decodeInvoice(bytes: Uint8Array): Invoice {
  const r = new RecordReader(bytes);

  const memo = r.varBytes(MAX_MEMO_SIZE, "memo");
  const receipt = r.varBytes(MAX_RECEIPT_SIZE, "receipt");
  const creationTime = decodeTimestamp(r.varBytes(MAX_TIMESTAMP_SIZE, "timestamp"));
  const paymentPreimage = toBytes32(r.take(PREIMAGE_SIZE, "payment_preimage"));
  const value = r.int64("value");
  const settled = r.uint8("settled") === 1;

  return {
    memo,
    receipt,
    creationTime,
    terms: { paymentPreimage, value, settled },
  };
}
