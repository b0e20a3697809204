import type {
  ChannelAttributes,
  ChannelEntry,
  M3UParseResult,
} from "@/types/m3u";
import { ATTRIBUTE_KEYS } from "@/types/m3u";
import {
  MANIFEST_HEADER,
  METADATA_DIRECTIVE,
  UNKNOWN_CHANNEL_NAME,
} from "@/lib/constants";
import { FormatError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const logger = createLogger("m3u-parser");

interface PendingMetadata {
  channelName: string;
  attributes: ChannelAttributes;
}

/**
 * Parse an M3U/M3U8 playlist string into ordered channel entries.
 * Each #EXTINF line is paired with the next URL line; an #EXTINF line that is
 * followed by another #EXTINF (or the end of input) produces nothing, and so
 * does a URL line with nothing pending.
 *
 * @throws FormatError when the first line is not the #EXTM3U header. Nothing
 * is parsed in that case.
 */
export function parseM3U(content: string, sourceManifest: string): M3UParseResult {
  const lines = content.replace(/^\uFEFF/, "").split(/\r?\n/);

  if (!lines[0].trim().startsWith(MANIFEST_HEADER)) {
    throw new FormatError(sourceManifest);
  }

  const entries: ChannelEntry[] = [];
  let pending: PendingMetadata | null = null;
  let droppedMetadata = 0;
  let orphanEndpoints = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    if (trimmed.startsWith(METADATA_DIRECTIVE)) {
      if (pending) droppedMetadata++;
      pending = {
        channelName: extractDisplayName(trimmed),
        attributes: extractAttributes(trimmed),
      };
      continue;
    }

    if (trimmed.startsWith("http")) {
      if (!pending) {
        orphanEndpoints++;
        continue;
      }
      entries.push({
        sourceManifest,
        ordinal: entries.length,
        channelName: pending.channelName,
        endpoint: trimmed,
        attributes: pending.attributes,
      });
      pending = null;
    }
  }

  if (pending) droppedMetadata++;

  if (droppedMetadata > 0 || orphanEndpoints > 0) {
    logger.debug(
      `Parsed ${sourceManifest} with ${droppedMetadata} unpaired #EXTINF and ${orphanEndpoints} orphan URL line(s)`
    );
  }

  return { entries, droppedMetadata, orphanEndpoints };
}

/**
 * The display name is whatever follows the last comma on the #EXTINF line.
 * Example: #EXTINF:-1 tvg-id="ch1" group-title="News",Channel 1
 */
export function extractDisplayName(line: string): string {
  const lastCommaIndex = line.lastIndexOf(",");
  if (lastCommaIndex === -1) {
    return UNKNOWN_CHANNEL_NAME;
  }
  return line.substring(lastCommaIndex + 1).trim() || UNKNOWN_CHANNEL_NAME;
}

/**
 * Pick the recognised `key="value"` attributes off an #EXTINF line.
 * Only double-quoted values are read.
 */
export function extractAttributes(line: string): ChannelAttributes {
  const attributes: ChannelAttributes = {};
  for (const key of ATTRIBUTE_KEYS) {
    const match = line.match(new RegExp(`${key}="([^"]*?)"`));
    if (match) {
      attributes[key] = match[1];
    }
  }
  return attributes;
}
