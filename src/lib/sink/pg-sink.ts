import { readFile } from "node:fs/promises";
import type { ChannelRecord } from "@/types";
import type { PoolLike } from "@/lib/db";
import type { ChannelRow, ChannelSink } from "./types";
import { DB_INSERT_BATCH_SIZE } from "@/lib/constants";
import { createLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";

const logger = createLogger("pg-sink");

const SCHEMA_URL = new URL("./schema.sql", import.meta.url);

/**
 * PostgreSQL-backed sink: one row per channel in "channels" and its ordered
 * alternates in "channel_sources".
 */
export class PgChannelSink implements ChannelSink {
  constructor(private readonly pool: PoolLike) {}

  async ensureSchema(): Promise<void> {
    const sql = await readFile(SCHEMA_URL, "utf8");
    await this.pool.query(sql);
  }

  async upsertChannel(row: ChannelRow): Promise<number> {
    const result = await this.pool.query(
      `INSERT INTO "channels" ("channel_name", "source_url", "stream_url", "tvg_id", "tvg_name", "tvg_logo", "group_title", "updated_at")
       VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
       ON CONFLICT ("channel_name") DO UPDATE SET
         "source_url" = EXCLUDED."source_url",
         "stream_url" = EXCLUDED."stream_url",
         "tvg_id" = EXCLUDED."tvg_id",
         "tvg_name" = EXCLUDED."tvg_name",
         "tvg_logo" = EXCLUDED."tvg_logo",
         "group_title" = EXCLUDED."group_title",
         "updated_at" = NOW()
       RETURNING "id"`,
      [
        row.channelName,
        row.sourceManifest,
        row.endpoint,
        row.attributes["tvg-id"] ?? null,
        row.attributes["tvg-name"] ?? null,
        row.attributes["tvg-logo"] ?? null,
        row.attributes["group-title"] ?? null,
      ]
    );

    const id = Number(result.rows[0]?.id);
    if (!Number.isInteger(id)) {
      throw new Error(`Upsert of "${row.channelName}" returned no id`);
    }
    return id;
  }

  /**
   * Delete-then-insert inside one transaction, using unnest for bulk inserts.
   */
  async upsertAlternates(
    channelId: number,
    alternates: ChannelRecord[]
  ): Promise<void> {
    const client = await this.pool.connect();
    let failure: Error | boolean | undefined;
    try {
      await client.query("BEGIN");
      await client.query(
        `DELETE FROM "channel_sources" WHERE "parent_channel_id" = $1`,
        [channelId]
      );

      for (let i = 0; i < alternates.length; i += DB_INSERT_BATCH_SIZE) {
        const batch = alternates.slice(i, i + DB_INSERT_BATCH_SIZE);
        await client.query(
          `INSERT INTO "channel_sources" ("parent_channel_id", "position", "source_url", "stream_url", "tvg_id", "tvg_name", "tvg_logo", "group_title")
           SELECT * FROM unnest(
             $1::int[], $2::int[], $3::text[], $4::text[],
             $5::text[], $6::text[], $7::text[], $8::text[]
           )`,
          [
            batch.map(() => channelId),
            batch.map((_, j) => i + j),
            batch.map((alt) => alt.sourceManifest),
            batch.map((alt) => alt.endpoint),
            batch.map((alt) => alt.attributes["tvg-id"] ?? null),
            batch.map((alt) => alt.attributes["tvg-name"] ?? null),
            batch.map((alt) => alt.attributes["tvg-logo"] ?? null),
            batch.map((alt) => alt.attributes["group-title"] ?? null),
          ]
        );
      }

      await client.query("COMMIT");
    } catch (err) {
      failure = err instanceof Error ? err : true;
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        logger.warn(
          `Rollback of alternates for channel ${channelId} failed: ${errorMessage(rollbackErr)}`
        );
      }
      throw err;
    } finally {
      client.release(failure);
    }
  }

  async pruneChannels(keep: string[]): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM "channels" WHERE NOT ("channel_name" = ANY($1::text[]))`,
      [keep]
    );
    return result.rowCount ?? 0;
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
