import { z } from "zod";
import type { ChannelEntry } from "@/types/m3u";
import type { MergeMode } from "@/types";
import { AttributesSchema } from "@/lib/channels/serialize";

/** Persisted shape of one entry, keyed by `entryKey` in a snapshot. */
export const PersistedEntrySchema = z.object({
  sourceManifest: z.string(),
  channelName: z.string(),
  endpoint: z.string().min(1),
  attributes: AttributesSchema,
});

export const EntrySnapshotSchema = z.record(z.string(), PersistedEntrySchema);

export type PersistedEntry = z.infer<typeof PersistedEntrySchema>;
export type EntrySnapshot = z.infer<typeof EntrySnapshotSchema>;

export function entryKey(sourceManifest: string, ordinal: number): string {
  return `${sourceManifest}#${ordinal}`;
}

/**
 * Entries accumulated from every manifest, keyed by (manifest, ordinal).
 *
 * In "replace" mode a merge drops everything previously stored for that
 * manifest before inserting, so a manifest that shrank leaves nothing stale.
 * "ordinal" mode only overwrites matching ordinals and keeps the rest.
 *
 * merge() runs to completion without awaiting, so concurrent ingestion of
 * several manifests never interleaves inside a single merge.
 */
export class EntryStore {
  private entries = new Map<string, ChannelEntry>();
  private byManifest = new Map<string, Set<string>>();

  constructor(private readonly mode: MergeMode = "replace") {}

  merge(sourceManifest: string, newEntries: ChannelEntry[]): void {
    let keys = this.byManifest.get(sourceManifest);
    if (!keys) {
      keys = new Set();
      this.byManifest.set(sourceManifest, keys);
    }

    if (this.mode === "replace") {
      for (const key of keys) {
        this.entries.delete(key);
      }
      keys.clear();
    }

    for (const entry of newEntries) {
      if (entry.sourceManifest !== sourceManifest) {
        throw new Error(
          `Entry from ${entry.sourceManifest} merged under ${sourceManifest}`
        );
      }
      const key = entryKey(sourceManifest, entry.ordinal);
      this.entries.set(key, { ...entry, attributes: { ...entry.attributes } });
      keys.add(key);
    }
  }

  /**
   * Drop every entry whose manifest is not listed. Returns the number of
   * entries removed.
   */
  retainManifests(sourceManifests: string[]): number {
    const keep = new Set(sourceManifests);
    let removed = 0;
    for (const [manifest, keys] of this.byManifest) {
      if (keep.has(manifest)) continue;
      for (const key of keys) {
        if (this.entries.delete(key)) removed++;
      }
      this.byManifest.delete(manifest);
    }
    return removed;
  }

  /** Entries in insertion order; a replaced manifest moves to the end. */
  all(): ChannelEntry[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): EntrySnapshot {
    return snapshotEntries(this.all());
  }

  static restore(snapshot: EntrySnapshot, mode: MergeMode = "replace"): EntryStore {
    const store = new EntryStore(mode);
    const grouped = new Map<string, ChannelEntry[]>();

    for (const [key, record] of Object.entries(snapshot)) {
      const ordinal = ordinalFromKey(key);
      const list = grouped.get(record.sourceManifest) ?? [];
      list.push({ ...record, ordinal });
      grouped.set(record.sourceManifest, list);
    }

    for (const [manifest, list] of grouped) {
      list.sort((a, b) => a.ordinal - b.ordinal);
      store.merge(manifest, list);
    }
    return store;
  }
}

/** Persisted form of a plain list of entries, as `EntryStore.snapshot()` would give. */
export function snapshotEntries(entries: ChannelEntry[]): EntrySnapshot {
  return Object.fromEntries(
    entries.map((entry): [string, PersistedEntry] => [
      entryKey(entry.sourceManifest, entry.ordinal),
      {
        sourceManifest: entry.sourceManifest,
        channelName: entry.channelName,
        endpoint: entry.endpoint,
        attributes: { ...entry.attributes },
      },
    ])
  );
}

function ordinalFromKey(key: string): number {
  const ordinal = Number(key.substring(key.lastIndexOf("#") + 1));
  if (!Number.isInteger(ordinal) || ordinal < 0) {
    throw new Error(`Malformed entry key: ${key}`);
  }
  return ordinal;
}
