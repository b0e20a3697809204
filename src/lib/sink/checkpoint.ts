import type { GroupMap } from "@/types";
import type { KVStore } from "@/lib/redis";
import type { RetryOptions } from "./retry";
import { SerialWriter, withRetry } from "./retry";
import {
  fromPersistedGroups,
  toPersistedGroups,
} from "@/lib/channels/serialize";
import type { EntrySnapshot } from "@/lib/sync/entry-store";
import { EntrySnapshotSchema } from "@/lib/sync/entry-store";
import {
  CHECKPOINT_ENTRIES_KEY,
  CHECKPOINT_GROUPS_KEY,
  CHECKPOINT_REACHABLE_KEY,
} from "@/lib/constants";
import { createLogger } from "@/lib/logger";

const logger = createLogger("checkpoint");

/**
 * Durable intermediate state of a run, kept in the KV store.
 * All writes go through one serial writer and are retried; reads are
 * validated against the persisted shapes.
 */
export class CheckpointStore {
  private readonly writer = new SerialWriter();

  constructor(
    private readonly kv: KVStore,
    private readonly retry: RetryOptions
  ) {}

  saveEntries(snapshot: EntrySnapshot): Promise<void> {
    return this.write(CHECKPOINT_ENTRIES_KEY, snapshot, Object.keys(snapshot).length);
  }

  saveReachable(snapshot: EntrySnapshot): Promise<void> {
    return this.write(CHECKPOINT_REACHABLE_KEY, snapshot, Object.keys(snapshot).length);
  }

  saveGroups(groups: GroupMap): Promise<void> {
    return this.write(CHECKPOINT_GROUPS_KEY, toPersistedGroups(groups), groups.size);
  }

  async loadEntries(): Promise<EntrySnapshot | null> {
    return this.readSnapshot(CHECKPOINT_ENTRIES_KEY);
  }

  async loadReachable(): Promise<EntrySnapshot | null> {
    return this.readSnapshot(CHECKPOINT_REACHABLE_KEY);
  }

  async loadGroups(): Promise<GroupMap | null> {
    const raw = await this.kv.get(CHECKPOINT_GROUPS_KEY);
    if (raw === null || raw === undefined) return null;
    return fromPersistedGroups(raw);
  }

  /** Wait for every queued checkpoint write to settle. */
  flush(): Promise<void> {
    return this.writer.drain();
  }

  private async readSnapshot(key: string): Promise<EntrySnapshot | null> {
    const raw = await this.kv.get(key);
    if (raw === null || raw === undefined) return null;
    return EntrySnapshotSchema.parse(raw);
  }

  private write(key: string, value: unknown, count: number): Promise<void> {
    return this.writer.run(async () => {
      await withRetry(
        `checkpoint ${key}`,
        async () => {
          await this.kv.set(key, value);
        },
        this.retry
      );
      logger.debug(`Checkpointed ${count} record(s) to ${key}`);
    });
  }
}
