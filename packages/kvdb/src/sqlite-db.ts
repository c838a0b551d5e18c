/**
 * SQLite-backed KvDb (better-sqlite3).
 *
 * Layout:
 *   kv_buckets(id, parent_id, name)      — bucket tree, parent_id 0 = top level
 *   kv_entries(bucket_id, key, value)    — values, one row per key
 *
 * Writes run under BEGIN IMMEDIATE so there is a single writer at a time.
 * Reads run in deferred transactions; with WAL they see a stable snapshot.
 * SQLite orders BLOBs by memcmp, which gives forEach its byte order.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { assertKey } from "./bytes.js";
import {
  KvError,
  type KvDb,
  type ReadTx,
  type WriteBucket,
  type WriteTx,
} from "./types.js";

const ROOT_BUCKET_ID = 0;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS kv_buckets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    parent_id INTEGER NOT NULL,
    name BLOB NOT NULL,
    UNIQUE (parent_id, name)
  );
  CREATE TABLE IF NOT EXISTS kv_entries (
    bucket_id INTEGER NOT NULL,
    key BLOB NOT NULL,
    value BLOB NOT NULL,
    PRIMARY KEY (bucket_id, key)
  ) WITHOUT ROWID;
`;

interface TxState {
  open: boolean;
  writable: boolean;
}

interface EntryRow {
  key: Buffer;
  value: Buffer | null;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export class SqliteKvDb implements KvDb {
  private writing = false;
  private readers = 0;
  private readonly getValueStmt: Database.Statement<[number, Buffer], { value: Buffer }>;
  private readonly getBucketStmt: Database.Statement<[number, Buffer], { id: number }>;
  private readonly insertBucketStmt: Database.Statement<[number, Buffer]>;
  private readonly putValueStmt: Database.Statement<[number, Buffer, Buffer]>;
  private readonly iterateStmt: Database.Statement<[number, number], EntryRow>;

  constructor(private readonly db: Database.Database) {
    db.exec(SCHEMA);
    this.getValueStmt = db.prepare<[number, Buffer], { value: Buffer }>(
      "SELECT value FROM kv_entries WHERE bucket_id = ? AND key = ?",
    );
    this.getBucketStmt = db.prepare<[number, Buffer], { id: number }>(
      "SELECT id FROM kv_buckets WHERE parent_id = ? AND name = ?",
    );
    this.insertBucketStmt = db.prepare<[number, Buffer]>(
      "INSERT INTO kv_buckets (parent_id, name) VALUES (?, ?)",
    );
    this.putValueStmt = db.prepare<[number, Buffer, Buffer]>(`
      INSERT INTO kv_entries (bucket_id, key, value) VALUES (?, ?, ?)
      ON CONFLICT (bucket_id, key) DO UPDATE SET value = excluded.value
    `);
    this.iterateStmt = db.prepare<[number, number], EntryRow>(`
      SELECT key, value FROM (
        SELECT name AS key, NULL AS value FROM kv_buckets WHERE parent_id = ?
        UNION ALL
        SELECT key, value FROM kv_entries WHERE bucket_id = ?
      ) ORDER BY key
    `);
  }

  /** Open (or create) a database file. ":memory:" gives a private in-memory db. */
  static open(filename: string): SqliteKvDb {
    if (filename !== ":memory:") {
      mkdirSync(dirname(filename), { recursive: true });
    }
    const db = new Database(filename);
    db.pragma("journal_mode = WAL");
    return new SqliteKvDb(db);
  }

  view<T>(fn: (tx: ReadTx) => T): T {
    this.assertOpen();
    const state: TxState = { open: true, writable: false };
    const run = this.db.transaction(() =>
      fn({ bucket: (name) => this.childBucket(ROOT_BUCKET_ID, name, state) }),
    );
    this.readers++;
    try {
      return run.deferred();
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
    // A deferred read holds its snapshot until it ends; SQLite cannot
    // upgrade it to IMMEDIATE.
    if (this.readers > 0) {
      throw new KvError("cannot begin a write transaction inside a read transaction");
    }
    this.writing = true;
    const state: TxState = { open: true, writable: true };
    const run = this.db.transaction(() =>
      fn({
        bucket: (name) => this.childBucket(ROOT_BUCKET_ID, name, state),
        createBucketIfNotExists: (name) =>
          this.createChildBucket(ROOT_BUCKET_ID, name, state),
      }),
    );
    try {
      return run.immediate();
    } finally {
      state.open = false;
      this.writing = false;
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  // ── Bucket plumbing ──────────────────────────────────────────

  private assertOpen(): void {
    if (!this.db.open) throw new KvError("database is closed");
  }

  private check(state: TxState, write: boolean): void {
    if (!state.open) throw new KvError("transaction has ended");
    if (write && !state.writable) {
      throw new KvError("write attempted in a read-only transaction");
    }
  }

  private childBucket(
    parentId: number,
    name: Uint8Array,
    state: TxState,
  ): WriteBucket | undefined {
    this.check(state, false);
    const row = this.getBucketStmt.get(parentId, toBuffer(name));
    return row ? this.bucketHandle(row.id, state) : undefined;
  }

  private createChildBucket(
    parentId: number,
    name: Uint8Array,
    state: TxState,
  ): WriteBucket {
    this.check(state, true);
    assertKey(name);
    const existing = this.childBucket(parentId, name, state);
    if (existing) return existing;
    if (this.getValueStmt.get(parentId, toBuffer(name))) {
      throw new KvError(`bucket name ${toBuffer(name).toString("hex")} is already a key`);
    }
    const info = this.insertBucketStmt.run(parentId, toBuffer(name));
    return this.bucketHandle(Number(info.lastInsertRowid), state);
  }

  private bucketHandle(id: number, state: TxState): WriteBucket {
    return {
      get: (key) => {
        this.check(state, false);
        const row = this.getValueStmt.get(id, toBuffer(key));
        return row ? new Uint8Array(row.value) : undefined;
      },
      bucket: (name) => this.childBucket(id, name, state),
      forEach: (fn) => {
        this.check(state, false);
        for (const row of this.iterateStmt.all(id, id)) {
          fn(
            new Uint8Array(row.key),
            row.value === null ? undefined : new Uint8Array(row.value),
          );
        }
      },
      put: (key, value) => {
        this.check(state, true);
        assertKey(key);
        if (this.getBucketStmt.get(id, toBuffer(key))) {
          throw new KvError(`key ${toBuffer(key).toString("hex")} is a bucket`);
        }
        this.putValueStmt.run(id, toBuffer(key), toBuffer(value));
      },
      createBucketIfNotExists: (name) => this.createChildBucket(id, name, state),
    };
  }
}
