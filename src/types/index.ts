// Shared app types

import type { ChannelAttributes } from "./m3u";

export type MergeMode = "replace" | "ordinal";
export type SyncMode = "full" | "repair";
/** What the entry script is asked to do: run a sync, or stop the running one. */
export type SyncCommand = SyncMode | "cancel";

/** One endpoint of a channel, as carried by a group. */
export interface ChannelRecord {
  sourceManifest: string;
  endpoint: string;
  attributes: ChannelAttributes;
}

export interface ChannelGroup {
  channelName: string;
  primary: ChannelRecord;
  overflow: ChannelRecord[];
}

/** Groups keyed by exact channel name. */
export type GroupMap = Map<string, ChannelGroup>;

export type UnreachableReason = "httpStatus" | "timeout" | "networkError";

export type ProbeOutcome =
  | { kind: "reachable" }
  | { kind: "unreachable"; reason: "httpStatus"; status: number }
  | { kind: "unreachable"; reason: "timeout" }
  | { kind: "unreachable"; reason: "networkError"; detail: string }
  | { kind: "transient"; detail: string };

export interface ManifestSyncStatus {
  manifest: string;
  status: "pending" | "syncing" | "completed" | "error";
  entriesParsed: number;
  error?: string;
  startedAt?: string;
  completedAt?: string;
}

export interface SyncProgress {
  isRunning: boolean;
  status: string;
  mode?: SyncMode;
  currentStep?: string;
  totalManifests?: number;
  processedManifests?: number;
  totalProbes?: number;
  processedProbes?: number;
  totalGroups?: number;
  processedGroups?: number;
  manifests: ManifestSyncStatus[];
  errors: string[];
  cancelRequested?: boolean;
  startedAt?: string;
  completedAt?: string;
}
