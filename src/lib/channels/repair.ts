import type { ChannelGroup, GroupMap, ProbeOutcome } from "@/types";
import type { Prober } from "@/lib/probe/prober";
import { describeOutcome, isReachable } from "@/lib/probe/prober";
import { ProbePool } from "@/lib/probe/pool";
import { sortGroups } from "./serialize";
import { createLogger, getTimeTakenSincePoint } from "@/lib/logger";

const logger = createLogger("repair");

export type RepairDecision =
  | { action: "kept"; group: ChannelGroup }
  | { action: "promoted"; group: ChannelGroup }
  | { action: "removed" };

/**
 * Re-derive a group from fresh probe results.
 * `overflowOutcomes[i]` belongs to `group.overflow[i]`.
 *
 * A live primary stays and keeps only the live overflow. Otherwise the first
 * live overflow member becomes primary. With nothing live the group is removed.
 */
export function repairGroup(
  group: ChannelGroup,
  primaryOutcome: ProbeOutcome,
  overflowOutcomes: ProbeOutcome[]
): RepairDecision {
  if (overflowOutcomes.length !== group.overflow.length) {
    throw new Error(
      `Expected ${group.overflow.length} overflow outcome(s) for "${group.channelName}", got ${overflowOutcomes.length}`
    );
  }

  const liveOverflow = group.overflow.filter((_, i) =>
    isReachable(overflowOutcomes[i])
  );

  if (isReachable(primaryOutcome)) {
    return {
      action: "kept",
      group: { ...group, overflow: liveOverflow },
    };
  }

  const [promoted, ...rest] = liveOverflow;
  if (!promoted) {
    return { action: "removed" };
  }
  return {
    action: "promoted",
    group: { channelName: group.channelName, primary: promoted, overflow: rest },
  };
}

export interface RepairOptions {
  timeoutMs: number;
  concurrency: number;
  perHostLimit: number;
  /** Groups decided between two checkpoints. */
  batchSize: number;
  /** Epoch ms; once passed, no further batch is started. */
  deadline?: number;
  /** Called with everything decided so far after each batch. */
  onBatch?: (decided: GroupMap, processed: number, total: number) => Promise<void>;
  /** Checked before each batch; throw from here to abort the run. */
  beforeBatch?: () => Promise<void>;
}

export interface RepairResult {
  groups: GroupMap;
  kept: string[];
  promoted: string[];
  removed: string[];
  /** Groups never probed because the deadline passed. */
  skipped: string[];
  deadlineExceeded: boolean;
  probes: number;
  transientProbes: number;
}

/**
 * Probe every member of every group once and narrow each group to its live
 * members. Groups are handled in name order, a batch at a time; within a
 * batch all probes finish before any group is decided.
 */
export async function repairGroups(
  groups: GroupMap,
  prober: Prober,
  options: RepairOptions
): Promise<RepairResult> {
  const start = Date.now();
  const pool = new ProbePool(prober, options);
  const ordered = Array.from(sortGroups(groups).values());
  const batchSize = Math.max(1, options.batchSize);

  const result: RepairResult = {
    groups: new Map(),
    kept: [],
    promoted: [],
    removed: [],
    skipped: [],
    deadlineExceeded: false,
    probes: 0,
    transientProbes: 0,
  };

  for (let offset = 0; offset < ordered.length; offset += batchSize) {
    if (pool.deadlinePassed()) {
      result.deadlineExceeded = true;
      result.skipped = ordered.slice(offset).map((g) => g.channelName);
      logger.warn(
        `Run deadline passed; ${result.skipped.length} group(s) left unchecked`
      );
      break;
    }
    await options.beforeBatch?.();

    const batch = ordered.slice(offset, offset + batchSize);
    const endpoints = batch.flatMap((g) => [
      g.primary.endpoint,
      ...g.overflow.map((m) => m.endpoint),
    ]);
    const outcomes = await pool.probeAll(endpoints);
    result.probes += outcomes.length;
    result.transientProbes += outcomes.filter((o) => o.kind === "transient").length;

    let cursor = 0;
    for (const group of batch) {
      const primaryOutcome = outcomes[cursor];
      const overflowOutcomes = outcomes.slice(cursor + 1, cursor + 1 + group.overflow.length);
      cursor += 1 + group.overflow.length;

      const decision = repairGroup(group, primaryOutcome, overflowOutcomes);
      switch (decision.action) {
        case "kept":
          result.kept.push(group.channelName);
          result.groups.set(group.channelName, decision.group);
          break;
        case "promoted":
          logger.info(
            `${group.channelName}: primary ${describeOutcome(primaryOutcome)}, promoted ${decision.group.primary.endpoint}`
          );
          result.promoted.push(group.channelName);
          result.groups.set(group.channelName, decision.group);
          break;
        case "removed":
          logger.info(`${group.channelName}: no live endpoint, removed`);
          result.removed.push(group.channelName);
          break;
      }
    }

    await options.onBatch?.(
      sortGroups(result.groups),
      Math.min(offset + batch.length, ordered.length),
      ordered.length
    );
  }

  result.groups = sortGroups(result.groups);
  result.deadlineExceeded = result.skipped.length > 0 || pool.deadlineHits > 0;

  logger.info(
    `Repaired ${ordered.length} group(s): ${result.kept.length} kept, ${result.promoted.length} promoted, ${result.removed.length} removed, ${result.skipped.length} skipped in ${getTimeTakenSincePoint(start)}`
  );
  return result;
}
