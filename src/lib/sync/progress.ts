import type { KVStore } from "@/lib/redis";
import type { SyncProgress } from "@/types";
import { SYNC_PROGRESS_KEY, SYNC_PROGRESS_TTL } from "@/lib/constants";
import { createLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";

const logger = createLogger("progress");

/** Minimum interval between KV writes (ms) */
const FLUSH_INTERVAL_MS = 1000;

const DEFAULT_PROGRESS: SyncProgress = {
  isRunning: false,
  status: "idle",
  manifests: [],
  errors: [],
};

function isProgress(value: unknown): value is SyncProgress {
  return (
    typeof value === "object" &&
    value !== null &&
    "isRunning" in value &&
    "status" in value &&
    "errors" in value &&
    Array.isArray(value.errors)
  );
}

/**
 * Run progress with an in-memory copy that is always current.
 * Writes are throttled: at most one KV write per flush interval, unless a
 * caller asks for an immediate write (start/end events).
 */
export class ProgressTracker {
  private cached: SyncProgress | null = null;
  private dirty = false;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private lastFlushTime = 0;

  constructor(
    private readonly kv: KVStore,
    private readonly flushIntervalMs: number = FLUSH_INTERVAL_MS
  ) {}

  /**
   * Current progress. Pass `force: true` to read through to the KV store.
   */
  async get(options?: { force?: boolean }): Promise<SyncProgress> {
    if (this.cached && !options?.force) return { ...this.cached };
    const raw = await this.kv.get(SYNC_PROGRESS_KEY);
    const progress = isProgress(raw) ? raw : { ...DEFAULT_PROGRESS };
    this.cached = progress;
    return { ...progress };
  }

  async update(
    update: Partial<SyncProgress>,
    options?: { immediate?: boolean }
  ): Promise<void> {
    const current = this.cached ?? (await this.get());
    this.cached = { ...current, ...update };
    this.dirty = true;

    if (options?.immediate) {
      this.cancelTimer();
      await this.write();
    } else {
      this.scheduleFlush();
    }
  }

  async addError(error: string): Promise<void> {
    const current = this.cached ?? (await this.get());
    this.cached = { ...current, errors: [...current.errors, error] };
    this.dirty = true;
    this.scheduleFlush();
  }

  /** Write anything pending and drop the in-memory copy. Call at the end of a run. */
  async flush(): Promise<void> {
    this.cancelTimer();
    if (this.dirty) {
      await this.write();
    }
    this.cached = null;
  }

  async reset(): Promise<void> {
    this.cancelTimer();
    this.cached = { ...DEFAULT_PROGRESS };
    this.dirty = false;
    await this.kv.set(SYNC_PROGRESS_KEY, DEFAULT_PROGRESS, { ex: SYNC_PROGRESS_TTL });
  }

  /**
   * Flag the running sync for cancellation. Written straight to the KV so a
   * run in another process sees it.
   */
  async requestCancel(): Promise<void> {
    const raw = await this.kv.get(SYNC_PROGRESS_KEY);
    const progress = isProgress(raw) ? raw : { ...DEFAULT_PROGRESS };
    await this.kv.set(
      SYNC_PROGRESS_KEY,
      { ...progress, cancelRequested: true },
      { ex: SYNC_PROGRESS_TTL }
    );
    if (this.cached) {
      this.cached.cancelRequested = true;
    }
  }

  /** Reads the KV directly, not the cache. */
  async isCancelRequested(): Promise<boolean> {
    const raw = await this.kv.get(SYNC_PROGRESS_KEY);
    const cancelled = isProgress(raw) && raw.cancelRequested === true;
    if (cancelled && this.cached) {
      this.cached.cancelRequested = true;
    }
    return cancelled;
  }

  private async write(): Promise<void> {
    if (!this.cached) return;
    this.dirty = false;
    this.lastFlushTime = Date.now();

    // Keep a cancel flag set by another process, unless this run explicitly
    // cleared it (at start).
    const stored = await this.kv.get(SYNC_PROGRESS_KEY);
    if (
      isProgress(stored) &&
      stored.cancelRequested === true &&
      this.cached.cancelRequested !== false
    ) {
      this.cached.cancelRequested = true;
    }

    const written = this.cached;
    await this.kv.set(SYNC_PROGRESS_KEY, written, { ex: SYNC_PROGRESS_TTL });
    // an explicit clear applies to this write only; later writes pick up a
    // cancel requested in the meantime
    if (written.cancelRequested === false) {
      written.cancelRequested = undefined;
    }
  }

  private scheduleFlush(): void {
    if (this.flushTimer) return;
    const elapsed = Date.now() - this.lastFlushTime;
    const delay = Math.max(0, this.flushIntervalMs - elapsed);
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      if (!this.dirty) return;
      this.write().catch((err) => {
        logger.warn(`Failed to write sync progress: ${errorMessage(err)}`);
      });
    }, delay);
  }

  private cancelTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
