import { z } from "zod";
import type { KVStore } from "@/lib/redis";
import { SYNC_LOCK_KEY, SYNC_LOCK_TTL } from "@/lib/constants";

/**
 * Sync lock stored under SYNC_LOCK_KEY with a TTL.
 * Shape: { ownerId: string, expiresAt: number (epoch ms) }
 */
const LockDataSchema = z.object({
  ownerId: z.string(),
  expiresAt: z.number(),
});

type LockData = z.infer<typeof LockDataSchema>;

async function getLock(kv: KVStore): Promise<LockData | null> {
  const parsed = LockDataSchema.safeParse(await kv.get(SYNC_LOCK_KEY));
  if (!parsed.success) return null;
  if (Date.now() > parsed.data.expiresAt) return null; // expired
  return parsed.data;
}

function lockFor(ownerId: string, ttlSeconds: number): LockData {
  return { ownerId, expiresAt: Date.now() + ttlSeconds * 1000 };
}

/**
 * Try to acquire the global sync lock.
 * Returns true if the lock was acquired, false if another sync is running.
 */
export async function acquireSyncLock(
  kv: KVStore,
  ownerId: string,
  ttlSeconds: number = SYNC_LOCK_TTL
): Promise<boolean> {
  if (await getLock(kv)) return false;
  // nx: two runs racing past the check above cannot both win
  return kv.set(SYNC_LOCK_KEY, lockFor(ownerId, ttlSeconds), {
    ex: ttlSeconds,
    nx: true,
  });
}

/**
 * Release the sync lock, but only if we own it.
 */
export async function releaseSyncLock(kv: KVStore, ownerId: string): Promise<boolean> {
  const existing = await getLock(kv);
  if (existing?.ownerId === ownerId) {
    await kv.del(SYNC_LOCK_KEY);
    return true;
  }
  return false;
}

/**
 * Extend the sync lock TTL (heartbeat).
 */
export async function extendSyncLock(
  kv: KVStore,
  ownerId: string,
  ttlSeconds: number = SYNC_LOCK_TTL
): Promise<boolean> {
  const existing = await getLock(kv);
  if (existing?.ownerId === ownerId) {
    await kv.set(SYNC_LOCK_KEY, lockFor(ownerId, ttlSeconds), { ex: ttlSeconds });
    return true;
  }
  return false;
}

/**
 * Drop the lock whoever holds it. For runs that died without releasing it.
 */
export async function forceReleaseSyncLock(kv: KVStore): Promise<void> {
  await kv.del(SYNC_LOCK_KEY);
}

/**
 * Check if a sync is currently running.
 */
export async function isSyncLocked(kv: KVStore): Promise<boolean> {
  return (await getLock(kv)) !== null;
}
