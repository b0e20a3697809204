import { randomUUID } from "node:crypto";
import type { AppConfig } from "@/lib/config";
import type { KVStore } from "@/lib/redis";
import type { ChannelEntry } from "@/types/m3u";
import type { GroupMap, ManifestSyncStatus, SyncMode } from "@/types";
import type { Prober } from "@/lib/probe/prober";
import type { ChannelSink } from "@/lib/sink/types";
import type { ManifestFetcher } from "./manifest-fetcher";
import { parseM3U } from "./m3u-parser";
import { EntryStore, snapshotEntries } from "./entry-store";
import {
  acquireSyncLock,
  extendSyncLock,
  forceReleaseSyncLock,
  isSyncLocked,
  releaseSyncLock,
} from "./lock";
import { ProgressTracker } from "./progress";
import { ProbePool, parallelMap } from "@/lib/probe/pool";
import { isReachable } from "@/lib/probe/prober";
import { buildGroups } from "@/lib/channels/grouper";
import { repairGroups } from "@/lib/channels/repair";
import { sortGroups } from "@/lib/channels/serialize";
import { CheckpointStore } from "@/lib/sink/checkpoint";
import { publishGroups } from "@/lib/sink/publish";
import {
  FormatError,
  SinkWriteError,
  SyncCancelledError,
  errorMessage,
} from "@/lib/errors";
import { createLogger, getTimeTakenSincePoint } from "@/lib/logger";

const logger = createLogger("sync-engine");

export type SyncSettings = Omit<
  AppConfig,
  "syncMode" | "databaseUrl" | "kv" | "playlist"
>;

export interface SyncDeps {
  fetchManifest: ManifestFetcher;
  prober: Prober;
  kv: KVStore;
  /** Final destination; omitted means checkpoints only. */
  sink?: ChannelSink;
}

export interface SyncResult {
  success: boolean;
  mode: SyncMode;
  status: "completed" | "completed_with_errors" | "cancelled" | "locked" | "error";
  manifestsProcessed: number;
  entriesParsed: number;
  reachableEntries: number;
  groups: number;
  promoted: number;
  removed: number;
  skipped: number;
  transientProbes: number;
  deadlineExceeded: boolean;
  errors: string[];
}

function emptyResult(mode: SyncMode): SyncResult {
  return {
    success: false,
    mode,
    status: "error",
    manifestsProcessed: 0,
    entriesParsed: 0,
    reachableEntries: 0,
    groups: 0,
    promoted: 0,
    removed: 0,
    skipped: 0,
    transientProbes: 0,
    deadlineExceeded: false,
    errors: [],
  };
}

// ---------------------------------------------------------------------------
// Manifest ingestion
// ---------------------------------------------------------------------------

/**
 * Fetch, parse and merge every manifest into the store. A manifest that
 * cannot be fetched or lacks the #EXTM3U header is skipped; the others
 * still load.
 */
export async function ingestManifests(
  urls: string[],
  store: EntryStore,
  fetchManifest: ManifestFetcher,
  options: { concurrency: number; onManifestDone?: (status: ManifestSyncStatus) => Promise<void> }
): Promise<ManifestSyncStatus[]> {
  return parallelMap(urls, options.concurrency, async (manifest) => {
    const status: ManifestSyncStatus = {
      manifest,
      status: "syncing",
      entriesParsed: 0,
      startedAt: new Date().toISOString(),
    };

    try {
      const content = await fetchManifest(manifest);
      const { entries } = parseM3U(content, manifest);
      store.merge(manifest, entries);
      status.status = "completed";
      status.entriesParsed = entries.length;
      logger.info(`Parsed ${entries.length} entries from ${manifest}`);
    } catch (err) {
      status.status = "error";
      status.error = errorMessage(err);
      if (err instanceof FormatError) {
        logger.warn(`Skipping ${manifest}: ${err.message}`);
      } else {
        logger.error(`Failed to load ${manifest}: ${status.error}`);
      }
    }

    status.completedAt = new Date().toISOString();
    await options.onManifestDone?.(status);
    return status;
  });
}

// ---------------------------------------------------------------------------
// Initial probe pass
// ---------------------------------------------------------------------------

/**
 * Probe every entry once and keep the reachable ones in their original
 * order. The reachable set is checkpointed after every batch.
 *
 * Once the pool's deadline passes no further batch starts. Entries never
 * probed, and entries whose probe the deadline cut short, come back in
 * `pending` rather than as unreachable.
 */
export async function filterReachable(
  entries: ChannelEntry[],
  pool: ProbePool,
  options: {
    batchSize: number;
    checkpoint?: CheckpointStore;
    beforeBatch?: () => Promise<void>;
    onBatch?: (processed: number, total: number) => Promise<void>;
  }
): Promise<{ reachable: ChannelEntry[]; pending: ChannelEntry[]; transient: number }> {
  const reachable: ChannelEntry[] = [];
  const pending: ChannelEntry[] = [];
  const batchSize = Math.max(1, options.batchSize);
  let transient = 0;

  for (let offset = 0; offset < entries.length; offset += batchSize) {
    if (pool.deadlinePassed()) {
      pending.push(...entries.slice(offset));
      logger.warn(`Run deadline passed; ${entries.length - offset} entr(ies) left unprobed`);
      break;
    }
    await options.beforeBatch?.();
    const batch = entries.slice(offset, offset + batchSize);
    const outcomes = await pool.probeAll(batch.map((entry) => entry.endpoint));

    batch.forEach((entry, i) => {
      if (pool.cutShort(entry.endpoint)) {
        pending.push(entry);
      } else if (isReachable(outcomes[i])) {
        reachable.push(entry);
      }
      if (outcomes[i].kind === "transient") transient++;
    });

    await options.checkpoint?.saveReachable(snapshotEntries(reachable));
    await options.onBatch?.(offset + batch.length, entries.length);
  }

  return { reachable, pending, transient };
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

interface RunContext {
  settings: SyncSettings;
  deps: SyncDeps;
  progress: ProgressTracker;
  checkpoint: CheckpointStore;
  deadline?: number;
  result: SyncResult;
  /** Run between batches: honours a cancel request and renews the lock. */
  beforeBatch: () => Promise<void>;
}

/**
 * Wrap a run in the sync lock and progress bookkeeping. Sink failures and
 * cancellation end the run and are reported in the result; nothing else
 * escapes from here.
 */
async function withRun(
  mode: SyncMode,
  settings: SyncSettings,
  deps: SyncDeps,
  body: (ctx: RunContext) => Promise<void>
): Promise<SyncResult> {
  const lockId = randomUUID();
  const result = emptyResult(mode);

  const locked = await acquireSyncLock(deps.kv, lockId);
  if (!locked) {
    result.status = "locked";
    result.errors.push("Another sync is already running");
    return result;
  }

  const start = Date.now();
  const progress = new ProgressTracker(deps.kv);
  const ctx: RunContext = {
    settings,
    deps,
    progress,
    checkpoint: new CheckpointStore(deps.kv, settings.sinkRetry),
    deadline: settings.runDeadlineMs ? start + settings.runDeadlineMs : undefined,
    result,
    beforeBatch: async () => {
      if (await progress.isCancelRequested()) {
        throw new SyncCancelledError();
      }
      await extendSyncLock(deps.kv, lockId);
    },
  };

  try {
    await progress.update(
      {
        isRunning: true,
        status: "syncing",
        mode,
        currentStep: `Starting ${mode} sync`,
        startedAt: new Date().toISOString(),
        completedAt: undefined,
        manifests: [],
        errors: [],
        cancelRequested: false,
      },
      { immediate: true }
    );

    await body(ctx);
    await ctx.checkpoint.flush();

    result.status = result.errors.length > 0 ? "completed_with_errors" : "completed";
    result.success = true;
    await progress.update(
      {
        isRunning: false,
        status: result.status,
        currentStep: `Done. ${result.groups} channel(s) in ${getTimeTakenSincePoint(start)}`,
        completedAt: new Date().toISOString(),
      },
      { immediate: true }
    );
  } catch (err) {
    if (err instanceof SyncCancelledError) {
      result.status = "cancelled";
      logger.warn(`${mode} sync cancelled`);
    } else {
      result.status = "error";
      result.errors.push(
        err instanceof SinkWriteError
          ? `Sink write failed, run halted: ${err.message}`
          : `Sync failed: ${errorMessage(err)}`
      );
      logger.error(result.errors[result.errors.length - 1]);
    }
    await progress.update(
      {
        isRunning: false,
        status: result.status,
        currentStep: result.status === "cancelled" ? "Sync cancelled by user" : "Sync failed",
        completedAt: new Date().toISOString(),
        cancelRequested: false,
      },
      { immediate: true }
    );
  } finally {
    await progress.flush();
    await releaseSyncLock(deps.kv, lockId);
  }

  logger.info(`${mode} sync finished with status ${result.status} in ${getTimeTakenSincePoint(start)}`);
  return result;
}

/**
 * Parse all manifests, keep reachable entries, group them, then checkpoint
 * and publish the grouped channels.
 *
 * Nothing is published when no manifest loaded. Channels the run deadline
 * left unprobed keep their previous checkpoint and sink rows.
 */
export function runFullSync(settings: SyncSettings, deps: SyncDeps): Promise<SyncResult> {
  return withRun("full", settings, deps, async (ctx) => {
    const { progress, checkpoint, result } = ctx;

    const previous = await checkpoint.loadEntries();
    const store = previous
      ? EntryStore.restore(previous, settings.mergeMode)
      : new EntryStore(settings.mergeMode);
    const delisted = store.retainManifests(settings.manifestUrls);
    if (delisted > 0) {
      logger.info(`Dropped ${delisted} checkpointed entr(ies) of manifests no longer configured`);
    }

    const statuses: ManifestSyncStatus[] = [];
    await progress.update({
      currentStep: `Loading ${settings.manifestUrls.length} manifest(s)`,
      totalManifests: settings.manifestUrls.length,
      processedManifests: 0,
    });

    const loaded = await ingestManifests(settings.manifestUrls, store, deps.fetchManifest, {
      concurrency: settings.manifestFetch.concurrency,
      onManifestDone: async (status) => {
        statuses.push(status);
        if (status.error) await progress.addError(`${status.manifest}: ${status.error}`);
        await progress.update({ processedManifests: statuses.length, manifests: [...statuses] });
      },
    });

    for (const status of loaded) {
      if (status.status === "completed") {
        result.manifestsProcessed++;
        result.entriesParsed += status.entriesParsed;
      } else {
        result.errors.push(`${status.manifest}: ${status.error ?? "unknown error"}`);
      }
    }
    if (result.manifestsProcessed === 0 || store.size === 0) {
      // publishing an empty result would prune every stored channel
      result.errors.push(
        `No entries loaded (${result.manifestsProcessed} manifest(s) processed); existing channels left untouched`
      );
      logger.error(result.errors[result.errors.length - 1]);
      return;
    }
    await checkpoint.saveEntries(store.snapshot());

    const entries = store.all();
    const pool = new ProbePool(deps.prober, { ...settings.probe, deadline: ctx.deadline });
    await progress.update({
      currentStep: `Probing ${entries.length} endpoint(s)`,
      totalProbes: entries.length,
      processedProbes: 0,
    });

    const { reachable, pending, transient } = await filterReachable(entries, pool, {
      batchSize: settings.checkpointBatchSize,
      checkpoint,
      beforeBatch: ctx.beforeBatch,
      onBatch: (processed) => progress.update({ processedProbes: processed }),
    });
    result.reachableEntries = reachable.length;
    result.transientProbes = transient;
    result.deadlineExceeded = pool.deadlineHits > 0 || pending.length > 0;

    // a channel with any entry left unprobed is not decided this run
    const unchecked = Array.from(new Set(pending.map((e) => e.channelName))).sort();
    const decided = buildGroups(reachable);
    for (const name of unchecked) decided.delete(name);
    const groups = sortGroups(decided);
    result.skipped = unchecked.length;
    if (unchecked.length > 0) {
      result.errors.push(
        `Run deadline exceeded; ${unchecked.length} channel(s) were not fully probed`
      );
    }

    const previousGroups: GroupMap = (await checkpoint.loadGroups()) ?? new Map();
    const finalGroups = withPending(groups, previousGroups, unchecked);
    result.groups = finalGroups.size;
    logger.info(
      `${reachable.length}/${entries.length} endpoint(s) reachable, ${groups.size} channel group(s), ${unchecked.length} unchecked`
    );
    await checkpoint.saveGroups(finalGroups);

    if (deps.sink) {
      await progress.update({ currentStep: `Publishing ${groups.size} channel(s)` });
      await publishGroups(deps.sink, groups, {
        retry: settings.sinkRetry,
        prune: true,
        alsoKeep: unchecked,
      });
    }
  });
}

/**
 * Re-probe the checkpointed groups, promote or drop members, and publish.
 * If the run deadline cuts the pass short, unchecked groups stay in the
 * checkpoint and in the sink as they were.
 */
export function runRepairSync(settings: SyncSettings, deps: SyncDeps): Promise<SyncResult> {
  return withRun("repair", settings, deps, async (ctx) => {
    const { progress, checkpoint, result } = ctx;

    const stored = await checkpoint.loadGroups();
    if (!stored) {
      throw new Error("No grouped channels checkpointed yet; run a full sync first");
    }
    const original = sortGroups(stored);
    const names = Array.from(original.keys());

    await progress.update({
      currentStep: `Re-checking ${original.size} channel group(s)`,
      totalGroups: original.size,
      processedGroups: 0,
    });

    const repaired = await repairGroups(original, deps.prober, {
      ...settings.probe,
      batchSize: settings.checkpointBatchSize,
      deadline: ctx.deadline,
      beforeBatch: ctx.beforeBatch,
      onBatch: async (decided, processed) => {
        await checkpoint.saveGroups(withPending(decided, original, names.slice(processed)));
        await progress.update({ processedGroups: processed });
      },
    });

    result.promoted = repaired.promoted.length;
    result.removed = repaired.removed.length;
    result.skipped = repaired.skipped.length;
    result.transientProbes = repaired.transientProbes;
    result.deadlineExceeded = repaired.deadlineExceeded;
    if (repaired.deadlineExceeded) {
      result.errors.push(
        `Run deadline exceeded; ${repaired.skipped.length} group(s) were not re-checked`
      );
    }

    const finalGroups = withPending(repaired.groups, original, repaired.skipped);
    result.groups = finalGroups.size;
    await checkpoint.saveGroups(finalGroups);

    if (deps.sink) {
      await progress.update({ currentStep: `Publishing ${repaired.groups.size} channel(s)` });
      await publishGroups(deps.sink, repaired.groups, {
        retry: settings.sinkRetry,
        prune: true,
        alsoKeep: repaired.skipped,
      });
    }
  });
}

export type CancelOutcome = "cancelRequested" | "forceReset" | "notRunning";

/**
 * Ask the running sync to stop at its next batch boundary. Asking a second
 * time, when the first request went unanswered, clears the progress record
 * and the lock so a new run can start.
 */
export async function requestSyncCancel(kv: KVStore): Promise<CancelOutcome> {
  const progress = new ProgressTracker(kv);

  if (await progress.isCancelRequested()) {
    await progress.reset();
    await forceReleaseSyncLock(kv);
    logger.warn("Cancel was already requested; progress and lock force-reset");
    return "forceReset";
  }

  if (!(await isSyncLocked(kv))) {
    return "notRunning";
  }

  await progress.requestCancel();
  logger.info("Cancel requested");
  return "cancelRequested";
}

/** Decided groups plus the named, still-undecided ones carried over as they were. */
function withPending(decided: GroupMap, original: GroupMap, pending: string[]): GroupMap {
  const combined: GroupMap = new Map(decided);
  for (const name of pending) {
    const group = original.get(name);
    if (group) combined.set(name, group);
  }
  return sortGroups(combined);
}
