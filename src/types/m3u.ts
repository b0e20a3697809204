// M3U parse types

export const ATTRIBUTE_KEYS = [
  "tvg-id",
  "tvg-name",
  "tvg-logo",
  "group-title",
] as const;

export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

/** Only keys present on the #EXTINF line are set; never an empty placeholder. */
export type ChannelAttributes = Partial<Record<AttributeKey, string>>;

export interface ChannelEntry {
  sourceManifest: string;
  /** 0-based position among the entries produced from `sourceManifest`. */
  ordinal: number;
  channelName: string;
  endpoint: string;
  attributes: ChannelAttributes;
}

export interface M3UParseResult {
  entries: ChannelEntry[];
  /** #EXTINF lines that never got a URL line. */
  droppedMetadata: number;
  /** URL lines with no pending #EXTINF before them. */
  orphanEndpoints: number;
}
