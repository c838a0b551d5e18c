/**
 * @invoicedb/kvdb — transactional bucket store.
 *
 * The invoice store talks to storage only through the KvDb interface.
 * SqliteKvDb persists to disk; MemoryKvDb is the in-process stand-in.
 */

export type {
  KvDb,
  ReadTx,
  WriteTx,
  ReadBucket,
  WriteBucket,
} from "./types.js";

export { KvError } from "./types.js";
export { MemoryKvDb } from "./memory-db.js";
export { SqliteKvDb } from "./sqlite-db.js";
