import { describe, it, expect, vi, afterEach } from "vitest";
import { MemoryKV } from "../redis";
import {
  acquireSyncLock,
  extendSyncLock,
  isSyncLocked,
  releaseSyncLock,
} from "../sync/lock";
import { SYNC_LOCK_KEY } from "../constants";

afterEach(() => {
  vi.useRealTimers();
});

describe("MemoryKV", () => {
  it("returns copies, not the stored object", async () => {
    const kv = new MemoryKV();
    const value = { list: [1, 2] };
    await kv.set("k", value);
    value.list.push(3);

    const read = await kv.get("k");
    expect(read).toEqual({ list: [1, 2] });
  });

  it("returns null for missing keys", async () => {
    await expect(new MemoryKV().get("missing")).resolves.toBeNull();
  });

  it("only sets with nx when the key is absent", async () => {
    const kv = new MemoryKV();
    await expect(kv.set("k", 1, { nx: true })).resolves.toBe(true);
    await expect(kv.set("k", 2, { nx: true })).resolves.toBe(false);
    await expect(kv.get("k")).resolves.toBe(1);
  });

  it("expires keys after their ttl", async () => {
    vi.useFakeTimers();
    const kv = new MemoryKV();
    await kv.set("k", "v", { ex: 10 });

    vi.advanceTimersByTime(10_001);

    await expect(kv.get("k")).resolves.toBeNull();
    await expect(kv.set("k", "again", { nx: true })).resolves.toBe(true);
  });

  it("deletes keys", async () => {
    const kv = new MemoryKV();
    await kv.set("k", "v");
    await expect(kv.del("k")).resolves.toBe(1);
    await expect(kv.del("k")).resolves.toBe(0);
  });
});

describe("sync lock", () => {
  it("lets only one owner hold the lock", async () => {
    const kv = new MemoryKV();
    await expect(acquireSyncLock(kv, "run-1")).resolves.toBe(true);
    await expect(acquireSyncLock(kv, "run-2")).resolves.toBe(false);
    await expect(isSyncLocked(kv)).resolves.toBe(true);
  });

  it("is released only by its owner", async () => {
    const kv = new MemoryKV();
    await acquireSyncLock(kv, "run-1");

    await expect(releaseSyncLock(kv, "run-2")).resolves.toBe(false);
    await expect(isSyncLocked(kv)).resolves.toBe(true);
    await expect(releaseSyncLock(kv, "run-1")).resolves.toBe(true);
    await expect(isSyncLocked(kv)).resolves.toBe(false);
  });

  it("can be taken over once it has expired", async () => {
    vi.useFakeTimers();
    const kv = new MemoryKV();
    await acquireSyncLock(kv, "run-1", 5);

    vi.advanceTimersByTime(5_001);

    await expect(acquireSyncLock(kv, "run-2", 5)).resolves.toBe(true);
  });

  it("extends only the owner's lock", async () => {
    vi.useFakeTimers();
    const kv = new MemoryKV();
    await acquireSyncLock(kv, "run-1", 5);

    vi.advanceTimersByTime(4_000);
    await expect(extendSyncLock(kv, "run-2", 5)).resolves.toBe(false);
    await expect(extendSyncLock(kv, "run-1", 5)).resolves.toBe(true);
    vi.advanceTimersByTime(4_000);

    await expect(isSyncLocked(kv)).resolves.toBe(true);
    await expect(kv.get(SYNC_LOCK_KEY)).resolves.toMatchObject({ ownerId: "run-1" });
  });

  it("ignores a lock record it cannot read", async () => {
    const kv = new MemoryKV();
    await kv.set(SYNC_LOCK_KEY, "garbage");
    await expect(isSyncLocked(kv)).resolves.toBe(false);
  });
});
