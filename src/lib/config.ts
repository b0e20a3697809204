import { z } from "zod";
import type { SyncCommand } from "@/types";
import { ConfigError } from "@/lib/errors";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  MANIFEST_URLS: z
    .string()
    .default("")
    .transform((raw) =>
      raw
        .split(",")
        .map((url) => url.trim())
        .filter((url) => url.length > 0)
    ),
  PROBE_TIMEOUT_MS: positiveInt(10000),
  PROBE_CONCURRENCY: positiveInt(16),
  // 0 disables the per-host cap
  PROBE_PER_HOST_LIMIT: z.coerce.number().int().min(0).default(4),
  CHECKPOINT_BATCH_SIZE: positiveInt(10),
  RUN_DEADLINE_MS: z.coerce.number().int().positive().optional(),
  MANIFEST_FETCH_TIMEOUT_MS: positiveInt(30000),
  MANIFEST_CONCURRENCY: positiveInt(4),
  ENTRY_MERGE_MODE: z.enum(["replace", "ordinal"]).default("replace"),
  SINK_MAX_ATTEMPTS: positiveInt(5),
  SINK_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
  SYNC_MODE: z.enum(["full", "repair", "cancel"]).default("full"),
  DATABASE_URL: z.string().min(1).optional(),
  KV_REST_API_URL: z.string().min(1).optional(),
  KV_REST_API_TOKEN: z.string().min(1).optional(),
  PLAYLIST_OUTPUT_PATH: z.string().min(1).optional(),
  PLAYLIST_INCLUDE_OVERFLOW: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

type Env = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  manifestUrls: string[];
  syncMode: SyncCommand;
  mergeMode: Env["ENTRY_MERGE_MODE"];
  probe: {
    timeoutMs: number;
    concurrency: number;
    perHostLimit: number;
  };
  manifestFetch: {
    timeoutMs: number;
    concurrency: number;
  };
  checkpointBatchSize: number;
  runDeadlineMs?: number;
  sinkRetry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  databaseUrl?: string;
  kv?: { url: string; token: string };
  /** Where to write the rendered playlist after a successful run. */
  playlist?: { outputPath: string; includeOverflow: boolean };
}

/**
 * Build the app configuration from environment variables.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration:\n${z.prettifyError(parsed.error)}`
    );
  }
  const e = parsed.data;

  if (Boolean(e.KV_REST_API_URL) !== Boolean(e.KV_REST_API_TOKEN)) {
    throw new ConfigError(
      "KV_REST_API_URL and KV_REST_API_TOKEN must be set together"
    );
  }

  return {
    manifestUrls: e.MANIFEST_URLS,
    syncMode: e.SYNC_MODE,
    mergeMode: e.ENTRY_MERGE_MODE,
    probe: {
      timeoutMs: e.PROBE_TIMEOUT_MS,
      concurrency: e.PROBE_CONCURRENCY,
      perHostLimit: e.PROBE_PER_HOST_LIMIT,
    },
    manifestFetch: {
      timeoutMs: e.MANIFEST_FETCH_TIMEOUT_MS,
      concurrency: e.MANIFEST_CONCURRENCY,
    },
    checkpointBatchSize: e.CHECKPOINT_BATCH_SIZE,
    runDeadlineMs: e.RUN_DEADLINE_MS,
    sinkRetry: {
      maxAttempts: e.SINK_MAX_ATTEMPTS,
      baseDelayMs: e.SINK_RETRY_BASE_MS,
    },
    databaseUrl: e.DATABASE_URL,
    kv:
      e.KV_REST_API_URL && e.KV_REST_API_TOKEN
        ? { url: e.KV_REST_API_URL, token: e.KV_REST_API_TOKEN }
        : undefined,
    playlist: e.PLAYLIST_OUTPUT_PATH
      ? {
          outputPath: e.PLAYLIST_OUTPUT_PATH,
          includeOverflow: e.PLAYLIST_INCLUDE_OVERFLOW,
        }
      : undefined,
  };
}
