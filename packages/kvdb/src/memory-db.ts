/**
 * In-memory KvDb for tests and dev mode.
 *
 * Copy-on-write: a write transaction works on a clone of the bucket tree
 * and swaps it in only when the callback returns. Readers keep whatever
 * tree was current when they started, so they never see a partial write.
 * Nothing survives process exit.
 */

import { compareBytes, assertKey } from "./bytes.js";
import {
  KvError,
  type KvDb,
  type ReadBucket,
  type ReadTx,
  type WriteBucket,
  type WriteTx,
} from "./types.js";

interface BucketNode {
  values: Map<string, Uint8Array>;
  buckets: Map<string, BucketNode>;
}

interface TxState {
  open: boolean;
  writable: boolean;
}

function emptyNode(): BucketNode {
  return { values: new Map(), buckets: new Map() };
}

function cloneNode(node: BucketNode): BucketNode {
  const buckets = new Map<string, BucketNode>();
  for (const [name, child] of node.buckets) {
    buckets.set(name, cloneNode(child));
  }
  // Stored values are never mutated in place, so sharing them is safe.
  return { values: new Map(node.values), buckets };
}

function keyOf(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

function bytesOf(key: string): Uint8Array {
  return new Uint8Array(Buffer.from(key, "hex"));
}

class MemoryBucket implements WriteBucket {
  constructor(
    private readonly node: BucketNode,
    private readonly state: TxState,
  ) {}

  private check(write: boolean): void {
    if (!this.state.open) throw new KvError("transaction has ended");
    if (write && !this.state.writable) {
      throw new KvError("write attempted in a read-only transaction");
    }
  }

  get(key: Uint8Array): Uint8Array | undefined {
    this.check(false);
    const value = this.node.values.get(keyOf(key));
    return value ? value.slice() : undefined;
  }

  bucket(name: Uint8Array): MemoryBucket | undefined {
    this.check(false);
    const child = this.node.buckets.get(keyOf(name));
    return child ? new MemoryBucket(child, this.state) : undefined;
  }

  forEach(fn: (key: Uint8Array, value: Uint8Array | undefined) => void): void {
    this.check(false);
    const entries: Array<[Uint8Array, Uint8Array | undefined]> = [];
    for (const [k, v] of this.node.values) entries.push([bytesOf(k), v]);
    for (const k of this.node.buckets.keys()) entries.push([bytesOf(k), undefined]);
    entries.sort((a, b) => compareBytes(a[0], b[0]));
    for (const [k, v] of entries) {
      fn(k, v ? v.slice() : undefined);
    }
  }

  put(key: Uint8Array, value: Uint8Array): void {
    this.check(true);
    assertKey(key);
    const k = keyOf(key);
    if (this.node.buckets.has(k)) {
      throw new KvError(`key ${k} is a bucket`);
    }
    this.node.values.set(k, value.slice());
  }

  createBucketIfNotExists(name: Uint8Array): MemoryBucket {
    this.check(true);
    assertKey(name);
    const k = keyOf(name);
    if (this.node.values.has(k)) {
      throw new KvError(`bucket name ${k} is already a key`);
    }
    let child = this.node.buckets.get(k);
    if (!child) {
      child = emptyNode();
      this.node.buckets.set(k, child);
    }
    return new MemoryBucket(child, this.state);
  }
}

export class MemoryKvDb implements KvDb {
  private root: BucketNode = emptyNode();
  private writing = false;
  private readers = 0;
  private closed = false;

  view<T>(fn: (tx: ReadTx) => T): T {
    this.assertOpen();
    const state: TxState = { open: true, writable: false };
    const top = new MemoryBucket(this.root, state);
    this.readers++;
    try {
      return fn({ bucket: (name) => top.bucket(name) });
    } finally {
      state.open = false;
      this.readers--;
    }
  }

  update<T>(fn: (tx: WriteTx) => T): T {
    this.assertOpen();
    if (this.writing) {
      throw new KvError("write transaction already in progress");
    }
    if (this.readers > 0) {
      throw new KvError("cannot begin a write transaction inside a read transaction");
    }
    this.writing = true;
    const draft = cloneNode(this.root);
    const state: TxState = { open: true, writable: true };
    const top = new MemoryBucket(draft, state);
    try {
      const result = fn({
        bucket: (name) => top.bucket(name),
        createBucketIfNotExists: (name) => top.createBucketIfNotExists(name),
      });
      this.root = draft;
      return result;
    } finally {
      state.open = false;
      this.writing = false;
    }
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new KvError("database is closed");
  }
}
