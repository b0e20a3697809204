import type { ChannelGroup, GroupMap } from "@/types";
import type { ChannelSink } from "./types";
import type { RetryOptions } from "./retry";
import { withRetry } from "./retry";
import { sortGroups } from "@/lib/channels/serialize";
import { createLogger, getTimeTakenSincePoint } from "@/lib/logger";

const logger = createLogger("publish");

export interface PublishResult {
  channelsWritten: number;
  alternatesWritten: number;
  channelsPruned: number;
}

async function publishGroup(
  sink: ChannelSink,
  group: ChannelGroup,
  retry: RetryOptions
): Promise<void> {
  const channelId = await withRetry(
    `upsert channel "${group.channelName}"`,
    () => sink.upsertChannel({ ...group.primary, channelName: group.channelName }),
    retry
  );
  await withRetry(
    `upsert alternates of "${group.channelName}"`,
    () => sink.upsertAlternates(channelId, group.overflow),
    retry
  );
}

/**
 * Write the final group map to the sink, one channel at a time in name
 * order, then remove channels that are no longer present.
 *
 * @throws SinkWriteError when a write exhausts its retries; the caller
 * should stop the run rather than continue with a partial sink.
 */
export async function publishGroups(
  sink: ChannelSink,
  groups: GroupMap,
  options: {
    retry: RetryOptions;
    prune: boolean;
    /** Names outside `groups` that pruning must leave alone. */
    alsoKeep?: string[];
  }
): Promise<PublishResult> {
  const start = Date.now();
  let alternatesWritten = 0;

  for (const group of sortGroups(groups).values()) {
    await publishGroup(sink, group, options.retry);
    alternatesWritten += group.overflow.length;
  }

  let channelsPruned = 0;
  if (options.prune) {
    channelsPruned = await withRetry(
      "prune channels",
      () =>
        sink.pruneChannels([...groups.keys(), ...(options.alsoKeep ?? [])]),
      options.retry
    );
  }

  logger.info(
    `Published ${groups.size} channel(s) with ${alternatesWritten} alternate(s), pruned ${channelsPruned} in ${getTimeTakenSincePoint(start)}`
  );

  return { channelsWritten: groups.size, alternatesWritten, channelsPruned };
}
