import { describe, it, expect } from "vitest";
import { MemoryKV } from "../redis";
import { ProgressTracker } from "../sync/progress";
import { SYNC_PROGRESS_KEY } from "../constants";

describe("ProgressTracker", () => {
  it("starts idle", async () => {
    const progress = await new ProgressTracker(new MemoryKV()).get();
    expect(progress).toEqual({ isRunning: false, status: "idle", manifests: [], errors: [] });
  });

  it("writes immediate updates straight through", async () => {
    const kv = new MemoryKV();
    const tracker = new ProgressTracker(kv);

    await tracker.update({ isRunning: true, status: "ingesting" }, { immediate: true });

    await expect(kv.get(SYNC_PROGRESS_KEY)).resolves.toMatchObject({
      isRunning: true,
      status: "ingesting",
    });
  });

  it("holds throttled updates until flushed", async () => {
    const kv = new MemoryKV();
    const tracker = new ProgressTracker(kv, 60_000);
    await tracker.update({ isRunning: true }, { immediate: true });

    await tracker.update({ status: "probing" });
    await tracker.addError("one bad manifest");
    await expect(kv.get(SYNC_PROGRESS_KEY)).resolves.toMatchObject({ status: "idle", errors: [] });

    await tracker.flush();
    await expect(kv.get(SYNC_PROGRESS_KEY)).resolves.toMatchObject({
      status: "probing",
      errors: ["one bad manifest"],
    });
  });

  it("sees a cancel requested by another tracker", async () => {
    const kv = new MemoryKV();
    const running = new ProgressTracker(kv);
    await running.update({ isRunning: true, cancelRequested: false }, { immediate: true });

    await new ProgressTracker(kv).requestCancel();

    await expect(running.isCancelRequested()).resolves.toBe(true);
  });

  it("does not overwrite a cancel flag set elsewhere", async () => {
    const kv = new MemoryKV();
    const running = new ProgressTracker(kv);
    await running.update({ isRunning: true, cancelRequested: false }, { immediate: true });

    await new ProgressTracker(kv).requestCancel();
    await running.update({ status: "probing" }, { immediate: true });

    await expect(kv.get(SYNC_PROGRESS_KEY)).resolves.toMatchObject({
      status: "probing",
      cancelRequested: true,
    });
  });

  it("resets to idle", async () => {
    const kv = new MemoryKV();
    const tracker = new ProgressTracker(kv);
    await tracker.update({ isRunning: true, status: "probing" }, { immediate: true });

    await tracker.reset();

    await expect(kv.get(SYNC_PROGRESS_KEY)).resolves.toEqual({
      isRunning: false,
      status: "idle",
      manifests: [],
      errors: [],
    });
  });
});
