import { z } from "zod";
import type { ChannelGroup, ChannelRecord, GroupMap } from "@/types";

export const AttributesSchema = z.object({
  "tvg-id": z.string().optional(),
  "tvg-name": z.string().optional(),
  "tvg-logo": z.string().optional(),
  "group-title": z.string().optional(),
});

const ChannelRecordSchema = z.object({
  sourceManifest: z.string(),
  endpoint: z.string().min(1),
  attributes: AttributesSchema,
});

export const PersistedGroupSchema = ChannelRecordSchema.extend({
  channelName: z.string(),
  overflow: z.array(ChannelRecordSchema),
});

export type PersistedGroup = z.infer<typeof PersistedGroupSchema>;
/**
 * Groups keyed by channel name. Key order in the document carries no
 * meaning: integer-like names always enumerate first.
 */
export type PersistedGroups = Record<string, PersistedGroup>;

function copyRecord(record: ChannelRecord): ChannelRecord {
  return {
    sourceManifest: record.sourceManifest,
    endpoint: record.endpoint,
    attributes: { ...record.attributes },
  };
}

export function toPersistedGroup(group: ChannelGroup): PersistedGroup {
  return {
    ...copyRecord(group.primary),
    channelName: group.channelName,
    overflow: group.overflow.map(copyRecord),
  };
}

export function fromPersistedGroup(persisted: PersistedGroup): ChannelGroup {
  return {
    channelName: persisted.channelName,
    primary: copyRecord(persisted),
    overflow: persisted.overflow.map(copyRecord),
  };
}

/** Groups ordered by channel name, independent of the order they were decided in. */
export function sortGroups(groups: GroupMap): GroupMap {
  const names = Array.from(groups.keys()).sort();
  const sorted: GroupMap = new Map();
  for (const name of names) {
    const group = groups.get(name);
    if (group) sorted.set(name, group);
  }
  return sorted;
}

// own data properties only: a channel may be named "__proto__"
export function toPersistedGroups(groups: GroupMap): PersistedGroups {
  return Object.fromEntries(
    Array.from(sortGroups(groups), ([name, group]): [string, PersistedGroup] => [
      name,
      toPersistedGroup(group),
    ])
  );
}

/**
 * Rebuild a group map, in name order, from its persisted form.
 * @throws ZodError when a group does not match the persisted shape.
 */
export function fromPersistedGroups(raw: unknown): GroupMap {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Persisted groups must be an object keyed by channel name");
  }
  const groups: GroupMap = new Map();
  // values validated one by one so every own key, "__proto__" included, is kept
  for (const [name, value] of Object.entries(raw)) {
    const persisted = PersistedGroupSchema.parse(value);
    if (persisted.channelName !== name) {
      throw new Error(
        `Group keyed "${name}" carries channel name "${persisted.channelName}"`
      );
    }
    groups.set(name, fromPersistedGroup(persisted));
  }
  return sortGroups(groups);
}

export function serializeGroups(groups: GroupMap): string {
  return JSON.stringify(toPersistedGroups(groups), null, 2);
}

export function deserializeGroups(text: string): GroupMap {
  return fromPersistedGroups(JSON.parse(text));
}
