import type { ChannelEntry } from "@/types/m3u";
import type { ChannelGroup, ChannelRecord, GroupMap } from "@/types";

/** Class given to endpoints that are neither http nor https, or not URLs at all. */
export const UNRANKED = Number.POSITIVE_INFINITY;

/**
 * Priority class of an endpoint, lower is better:
 *   1 https on a hostname/IPv4 host
 *   2 http on a hostname/IPv4 host
 *   3 https on a bracketed IPv6 literal
 *   4 http on a bracketed IPv6 literal
 */
export function classOf(endpoint: string): number {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return UNRANKED;
  }

  const bracketed = url.hostname.startsWith("[");
  if (url.protocol === "https:") return bracketed ? 3 : 1;
  if (url.protocol === "http:") return bracketed ? 4 : 2;
  return UNRANKED;
}

/**
 * Index of the preferred record: the first one, in list order, holding the
 * best class present. Falls back to 0 when nothing ranks.
 */
export function selectPrimaryIndex(records: Pick<ChannelRecord, "endpoint">[]): number {
  let bestIndex = 0;
  let bestClass = UNRANKED;
  records.forEach((record, index) => {
    const cls = classOf(record.endpoint);
    if (cls < bestClass) {
      bestClass = cls;
      bestIndex = index;
    }
  });
  return bestIndex;
}

export function toChannelRecord(entry: ChannelEntry): ChannelRecord {
  return {
    sourceManifest: entry.sourceManifest,
    endpoint: entry.endpoint,
    attributes: { ...entry.attributes },
  };
}

/**
 * Group entries by exact channel name and pick a primary for each group.
 * Members keep their first-seen order; the primary is taken out of that
 * order and everything else becomes overflow. Pure and deterministic.
 */
export function buildGroups(entries: ChannelEntry[]): GroupMap {
  const partitions = new Map<string, ChannelRecord[]>();
  for (const entry of entries) {
    if (!entry.endpoint) continue;
    const members = partitions.get(entry.channelName);
    if (members) {
      members.push(toChannelRecord(entry));
    } else {
      partitions.set(entry.channelName, [toChannelRecord(entry)]);
    }
  }

  const groups: GroupMap = new Map();
  for (const [channelName, members] of partitions) {
    groups.set(channelName, arrangeGroup(channelName, members));
  }
  return groups;
}

export function arrangeGroup(channelName: string, members: ChannelRecord[]): ChannelGroup {
  if (members.length === 0) {
    throw new Error(`Cannot arrange empty group "${channelName}"`);
  }
  const primaryIndex = selectPrimaryIndex(members);
  return {
    channelName,
    primary: members[primaryIndex],
    overflow: members.filter((_, index) => index !== primaryIndex),
  };
}
