/**
 * Transactional bucket store interface — abstraction over the storage engine.
 *
 * Buckets are named keyspaces that nest. Keys and values are raw bytes.
 * Handles returned by a transaction are only valid until it ends.
 * Swap SqliteKvDb for MemoryKvDb in tests.
 */

export interface ReadBucket {
  /** Value stored under key, or undefined (also for nested bucket names). */
  get(key: Uint8Array): Uint8Array | undefined;
  /** Nested bucket by name, or undefined. */
  bucket(name: Uint8Array): ReadBucket | undefined;
  /**
   * Visit every key in ascending byte order.
   * Nested buckets are visited with value === undefined.
   */
  forEach(fn: (key: Uint8Array, value: Uint8Array | undefined) => void): void;
}

export interface WriteBucket extends ReadBucket {
  bucket(name: Uint8Array): WriteBucket | undefined;
  put(key: Uint8Array, value: Uint8Array): void;
  createBucketIfNotExists(name: Uint8Array): WriteBucket;
}

export interface ReadTx {
  bucket(name: Uint8Array): ReadBucket | undefined;
}

export interface WriteTx {
  bucket(name: Uint8Array): WriteBucket | undefined;
  createBucketIfNotExists(name: Uint8Array): WriteBucket;
}

export interface KvDb {
  /** Run fn in a read-only transaction over a consistent snapshot. */
  view<T>(fn: (tx: ReadTx) => T): T;
  /**
   * Run fn in the single write transaction. Commits if fn returns,
   * rolls back every write if it throws. Throws KvError when called
   * from inside another update or from inside a view callback.
   */
  update<T>(fn: (tx: WriteTx) => T): T;
  close(): void;
}

/** Engine-level failure: misuse of a handle, key/bucket collision, closed db. */
export class KvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KvError";
  }
}
