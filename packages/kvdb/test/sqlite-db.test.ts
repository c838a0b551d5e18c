import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SqliteKvDb } from "../src/index.js";
import { kvdbContract } from "./kvdb-contract.js";

kvdbContract("SqliteKvDb", () => SqliteKvDb.open(":memory:"));

describe("SqliteKvDb on disk", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "kvdb-sqlite-test-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("keeps committed data across a reopen", () => {
    const path = join(tmpDir, "nested", "store.db");
    const enc = (s: string) => new TextEncoder().encode(s);

    const first = SqliteKvDb.open(path);
    first.update((tx) => {
      const top = tx.createBucketIfNotExists(enc("invoices"));
      top.createBucketIfNotExists(enc("paymenthashes")).put(enc("nik"), new Uint8Array([0, 0, 0, 1]));
      top.put(new Uint8Array([0, 0, 0, 0]), new Uint8Array([7]));
    });
    first.close();

    const second = SqliteKvDb.open(path);
    second.view((tx) => {
      const top = tx.bucket(enc("invoices"));
      expect(top?.get(new Uint8Array([0, 0, 0, 0]))).toEqual(new Uint8Array([7]));
      expect(top?.bucket(enc("paymenthashes"))?.get(enc("nik"))).toEqual(
        new Uint8Array([0, 0, 0, 1]),
      );
    });
    second.close();
  });
});
