import { describe, it, expect } from "vitest";
import type { PoolClientLike, PoolLike, QueryResultLike } from "../db";
import { PgChannelSink } from "../sink/pg-sink";
import { record } from "./fakes";

interface Call {
  text: string;
  values?: unknown[];
}

/** Records every statement; answers from a queue of canned results. */
class FakePool implements PoolLike {
  calls: Call[] = [];
  clientCalls: Call[] = [];
  released: Array<Error | boolean | undefined> = [];
  ended = false;
  failOn?: RegExp;
  private results: QueryResultLike[] = [];

  respondWith(...results: QueryResultLike[]): void {
    this.results.push(...results);
  }

  async query(text: string, values?: unknown[]): Promise<QueryResultLike> {
    this.calls.push({ text, values });
    return this.results.shift() ?? { rows: [], rowCount: 0 };
  }

  async connect(): Promise<PoolClientLike> {
    return {
      query: async (text: string, values?: unknown[]) => {
        this.clientCalls.push({ text, values });
        if (this.failOn?.test(text)) {
          throw new Error(`${text.trim().split(/\s+/)[0]} failed`);
        }
        return { rows: [], rowCount: 0 };
      },
      release: (err?: Error | boolean) => {
        this.released.push(err);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

describe("PgChannelSink", () => {
  it("upserts a channel by name and returns its id", async () => {
    const pool = new FakePool();
    pool.respondWith({ rows: [{ id: 42 }], rowCount: 1 });
    const sink = new PgChannelSink(pool);

    const id = await sink.upsertChannel({
      channelName: "News",
      sourceManifest: "https://lists.example/a.m3u",
      endpoint: "https://n.example/1",
      attributes: { "tvg-id": "n1", "group-title": "News" },
    });

    expect(id).toBe(42);
    expect(pool.calls).toHaveLength(1);
    expect(pool.calls[0].text).toContain('ON CONFLICT ("channel_name") DO UPDATE');
    expect(pool.calls[0].values).toEqual([
      "News",
      "https://lists.example/a.m3u",
      "https://n.example/1",
      "n1",
      null,
      null,
      "News",
    ]);
  });

  it("fails when the upsert returns no id", async () => {
    const sink = new PgChannelSink(new FakePool());
    await expect(
      sink.upsertChannel({ channelName: "News", ...record("https://n.example/1") })
    ).rejects.toThrow('Upsert of "News" returned no id');
  });

  it("replaces alternates inside one transaction", async () => {
    const pool = new FakePool();
    const sink = new PgChannelSink(pool);

    await sink.upsertAlternates(7, [record("http://a.example/2"), record("http://a.example/3")]);

    expect(pool.clientCalls.map((c) => c.text.trim().split(/\s+/)[0])).toEqual([
      "BEGIN",
      "DELETE",
      "INSERT",
      "COMMIT",
    ]);
    expect(pool.clientCalls[1].values).toEqual([7]);
    expect(pool.clientCalls[2].values).toEqual([
      [7, 7],
      [0, 1],
      ["https://lists.example/a.m3u", "https://lists.example/a.m3u"],
      ["http://a.example/2", "http://a.example/3"],
      [null, null],
      [null, null],
      [null, null],
      [null, null],
    ]);
    expect(pool.released).toEqual([undefined]);
  });

  it("clears alternates without inserting when there are none", async () => {
    const pool = new FakePool();
    await new PgChannelSink(pool).upsertAlternates(7, []);
    expect(pool.clientCalls.map((c) => c.text.trim().split(/\s+/)[0])).toEqual([
      "BEGIN",
      "DELETE",
      "COMMIT",
    ]);
  });

  it("rolls back and releases the client on failure", async () => {
    const pool = new FakePool();
    pool.failOn = /^\s*INSERT/;
    const sink = new PgChannelSink(pool);

    await expect(sink.upsertAlternates(7, [record("http://a.example/2")])).rejects.toThrow(
      "INSERT failed"
    );
    expect(pool.clientCalls.map((c) => c.text.trim().split(/\s+/)[0])).toEqual([
      "BEGIN",
      "DELETE",
      "INSERT",
      "ROLLBACK",
    ]);
    expect(pool.released).toHaveLength(1);
    expect(pool.released[0]).toMatchObject({ message: "INSERT failed" });
  });

  it("keeps the original error when the rollback fails too", async () => {
    const pool = new FakePool();
    pool.failOn = /^\s*(INSERT|ROLLBACK)/;
    const sink = new PgChannelSink(pool);

    await expect(sink.upsertAlternates(7, [record("http://a.example/2")])).rejects.toThrow(
      "INSERT failed"
    );
    expect(pool.released).toHaveLength(1);
    expect(pool.released[0]).toBeInstanceOf(Error);
    expect(pool.released[0]).toMatchObject({ message: "INSERT failed" });
  });

  it("prunes channels not in the keep list", async () => {
    const pool = new FakePool();
    pool.respondWith({ rows: [], rowCount: 3 });

    await expect(new PgChannelSink(pool).pruneChannels(["News", "Sports"])).resolves.toBe(3);
    expect(pool.calls[0].values).toEqual([["News", "Sports"]]);
  });

  it("applies the bundled schema", async () => {
    const pool = new FakePool();
    await new PgChannelSink(pool).ensureSchema();
    expect(pool.calls[0].text).toContain('CREATE TABLE IF NOT EXISTS "channels"');
  });

  it("ends the pool on close", async () => {
    const pool = new FakePool();
    await new PgChannelSink(pool).close();
    expect(pool.ended).toBe(true);
  });
});
