// App-wide constants

export const MANIFEST_HEADER = "#EXTM3U";
export const METADATA_DIRECTIVE = "#EXTINF";
export const UNKNOWN_CHANNEL_NAME = "Unknown";

export const SYNC_LOCK_KEY = "sync:lock";
export const SYNC_LOCK_TTL = 3600; // seconds; a repair pass over a large list is slow

export const SYNC_PROGRESS_KEY = "sync:progress";
export const SYNC_PROGRESS_TTL = 86400; // 1 day

export const CHECKPOINT_ENTRIES_KEY = "checkpoint:entries";
export const CHECKPOINT_REACHABLE_KEY = "checkpoint:reachable";
export const CHECKPOINT_GROUPS_KEY = "checkpoint:groups";

export const DB_INSERT_BATCH_SIZE = 5000; // alternates per INSERT statement
