import { writeFile } from "node:fs/promises";
import type { ChannelRecord, GroupMap } from "@/types";
import { ATTRIBUTE_KEYS } from "@/types/m3u";
import { MANIFEST_HEADER, METADATA_DIRECTIVE } from "@/lib/constants";
import { sortGroups } from "@/lib/channels/serialize";
import { createLogger } from "@/lib/logger";

const logger = createLogger("playlist");

function extInf(channelName: string, record: ChannelRecord): string {
  const attrs: string[] = [];
  for (const key of ATTRIBUTE_KEYS) {
    const value = record.attributes[key];
    if (value !== undefined) attrs.push(`${key}="${value}"`);
  }
  const attrStr = attrs.length > 0 ? " " + attrs.join(" ") : "";
  return `${METADATA_DIRECTIVE}:-1${attrStr},${channelName}`;
}

/**
 * Generate an M3U playlist string for a group map, channels in name order.
 * With `includeOverflow` each channel's alternates follow its primary under
 * the same name, so players that fail over on duplicate names can use them.
 */
export function generatePlaylist(
  groups: GroupMap,
  options?: { includeOverflow?: boolean }
): string {
  let m3u = `${MANIFEST_HEADER}\n`;

  for (const group of sortGroups(groups).values()) {
    const records = options?.includeOverflow
      ? [group.primary, ...group.overflow]
      : [group.primary];
    for (const record of records) {
      m3u += `${extInf(group.channelName, record)}\n`;
      m3u += `${record.endpoint}\n`;
    }
  }

  return m3u;
}

/** Render the groups and write them to `path`, replacing any previous file. */
export async function writePlaylistFile(
  groups: GroupMap,
  path: string,
  options?: { includeOverflow?: boolean }
): Promise<void> {
  await writeFile(path, generatePlaylist(groups, options), "utf8");
  logger.info(`Wrote ${groups.size} channel(s) to ${path}`);
}
