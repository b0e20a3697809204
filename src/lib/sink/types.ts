import type { ChannelRecord } from "@/types";

/** Primary record of a channel as handed to durable storage. */
export interface ChannelRow extends ChannelRecord {
  channelName: string;
}

/**
 * Durable storage for the final channel list. Writes are upserts and may be
 * repeated; the core never relies on transactions across calls.
 */
export interface ChannelSink {
  /** Insert or update a channel by name; resolves to its id. */
  upsertChannel(row: ChannelRow): Promise<number>;
  /** Replace the alternates stored for a channel, keeping their order. */
  upsertAlternates(channelId: number, alternates: ChannelRecord[]): Promise<void>;
  /** Remove every channel whose name is not listed; resolves to the count removed. */
  pruneChannels(keep: string[]): Promise<number>;
}
