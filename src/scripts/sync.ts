import "dotenv/config";
import { loadConfig } from "@/lib/config";
import { createKV } from "@/lib/redis";
import { createPool } from "@/lib/db";
import { HttpProber } from "@/lib/probe/prober";
import { createManifestFetcher } from "@/lib/sync/manifest-fetcher";
import { PgChannelSink } from "@/lib/sink/pg-sink";
import { CheckpointStore } from "@/lib/sink/checkpoint";
import { writePlaylistFile } from "@/lib/playlist/generator";
import { requestSyncCancel, runFullSync, runRepairSync } from "@/lib/sync/engine";
import { createLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";

const logger = createLogger("sync");

/**
 * Scheduled entry point: everything comes from the environment.
 * SYNC_MODE=full ingests manifests; SYNC_MODE=repair re-checks the last result;
 * SYNC_MODE=cancel asks a running sync to stop.
 * With PLAYLIST_OUTPUT_PATH set, the resulting channels are also written as M3U.
 */
async function main(): Promise<number> {
  const config = loadConfig();

  if (config.syncMode === "cancel") {
    const outcome = await requestSyncCancel(createKV(config.kv));
    logger.info(`Cancel: ${outcome}`);
    return 0;
  }

  const sink = config.databaseUrl
    ? new PgChannelSink(createPool(config.databaseUrl))
    : undefined;

  try {
    await sink?.ensureSchema();

    const deps = {
      fetchManifest: createManifestFetcher({ timeoutMs: config.manifestFetch.timeoutMs }),
      prober: new HttpProber(),
      kv: createKV(config.kv),
      sink,
    };
    const result =
      config.syncMode === "repair"
        ? await runRepairSync(config, deps)
        : await runFullSync(config, deps);

    logger.info(`Result: ${JSON.stringify(result)}`);

    if (result.success && config.playlist) {
      const groups = await new CheckpointStore(deps.kv, config.sinkRetry).loadGroups();
      if (groups) {
        await writePlaylistFile(groups, config.playlist.outputPath, {
          includeOverflow: config.playlist.includeOverflow,
        });
      }
    }
    return result.success ? 0 : 1;
  } finally {
    await sink?.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error(`Sync error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
