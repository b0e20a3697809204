import type { ChannelRecord, ProbeOutcome } from "@/types";
import type { ChannelEntry } from "@/types/m3u";
import type { Prober } from "@/lib/probe/prober";
import type { ChannelRow, ChannelSink } from "@/lib/sink/types";

export const REACHABLE: ProbeOutcome = { kind: "reachable" };
export const NOT_FOUND: ProbeOutcome = { kind: "unreachable", reason: "httpStatus", status: 404 };

/** Answers from a fixed table; unknown endpoints are 404. Records every call. */
export class FakeProber implements Prober {
  calls: string[] = [];

  constructor(private readonly outcomes: Record<string, ProbeOutcome> = {}) {}

  async probe(endpoint: string): Promise<ProbeOutcome> {
    this.calls.push(endpoint);
    return this.outcomes[endpoint] ?? NOT_FOUND;
  }
}

export function liveProber(...endpoints: string[]): FakeProber {
  return new FakeProber(Object.fromEntries(endpoints.map((e) => [e, REACHABLE])));
}

export function entry(
  channelName: string,
  endpoint: string,
  ordinal = 0,
  sourceManifest = "https://lists.example/a.m3u"
): ChannelEntry {
  return { sourceManifest, ordinal, channelName, endpoint, attributes: {} };
}

export function record(endpoint: string, sourceManifest = "https://lists.example/a.m3u"): ChannelRecord {
  return { sourceManifest, endpoint, attributes: {} };
}

export class RecordingSink implements ChannelSink {
  channels = new Map<string, { id: number; row: ChannelRow }>();
  alternates = new Map<number, ChannelRecord[]>();
  pruneCalls: string[][] = [];
  private nextId = 1;

  async upsertChannel(row: ChannelRow): Promise<number> {
    const existing = this.channels.get(row.channelName);
    const id = existing?.id ?? this.nextId++;
    this.channels.set(row.channelName, { id, row });
    return id;
  }

  async upsertAlternates(channelId: number, alternates: ChannelRecord[]): Promise<void> {
    this.alternates.set(channelId, alternates);
  }

  async pruneChannels(keep: string[]): Promise<number> {
    this.pruneCalls.push(keep);
    let removed = 0;
    for (const name of [...this.channels.keys()]) {
      if (!keep.includes(name)) {
        this.channels.delete(name);
        removed++;
      }
    }
    return removed;
  }
}
