import { describe, expect, it } from "vitest";
import { computeCutoff } from "../../src/services/cleanup-service";
import { AppError } from "../../src/shared/errors";
import { NOW, daysAgo } from "../support/fakes";
import { createHarness } from "../support/harness";

const USER = "user-1";
const MB = 1024 * 1024;

function enableAutoDelete(h: ReturnType<typeof createHarness>, userId = USER, retentionDays = 30) {
  h.settings.records.set(userId, {
    anomalyThreshold: 0.5,
    frameSamplingRate: 10,
    autoDeleteOldVideos: true,
    videoRetentionDays: retentionDays,
  });
}

describe("computeCutoff", () => {
  it("subtracts whole days in milliseconds", () => {
    expect(computeCutoff(NOW, 30).toISOString()).toBe("2026-01-30T12:00:00.000Z");
  });
});

describe("CleanupService", () => {
  it("previews and deletes a video older than the retention window but keeps a newer one", async () => {
    const h = createHarness();
    enableAutoDelete(h);
    const old = h.videos.seed({ id: "old", userId: USER, originalName: "old.mp4", fileSize: 5 * MB, createdAt: daysAgo(31) });
    h.videos.seed({ id: "recent", userId: USER, fileSize: 2 * MB, createdAt: daysAgo(29) });
    h.storage.blobs.set(old.filePath, Buffer.from("x"));
    await h.events.insertMany([
      {
        videoId: "old",
        userId: USER,
        eventType: "loitering",
        anomalyScore: 0.55,
        confidence: 0.8,
        timestampSeconds: 4,
        frameNumber: 120,
        description: "Anomaly detected: loitering with score 0.55",
        isAlert: false,
      },
    ]);

    const preview = await h.services.cleanup.preview(USER);
    expect(preview).toEqual({
      videosToDelete: 1,
      spaceToFreeMb: 5,
      cutoffDate: daysAgo(30),
      retentionDays: 30,
      videos: [{ id: "old", name: "old.mp4", sizeMb: 5, createdAt: daysAgo(31) }],
    });

    const result = await h.services.cleanup.run(USER);
    expect(result).toEqual({ videosDeleted: 1, filesDeleted: 1, spaceFreedMb: 5 });
    expect(await h.videos.findById("old")).toBeNull();
    expect(await h.videos.findById("recent")).not.toBeNull();
    expect(await h.events.listByVideo("old")).toEqual([]);
    expect(h.storage.blobs.has(old.filePath)).toBe(false);
  });

  it("keeps a video created exactly at the cutoff", async () => {
    const h = createHarness();
    enableAutoDelete(h);
    h.videos.seed({ id: "edge", userId: USER, createdAt: daysAgo(30) });

    expect((await h.services.cleanup.preview(USER)).videosToDelete).toBe(0);
  });

  it("previews nothing while auto-delete is disabled", async () => {
    const h = createHarness();
    h.videos.seed({ id: "old", userId: USER, createdAt: daysAgo(90) });

    expect(await h.services.cleanup.preview(USER)).toEqual({
      videosToDelete: 0,
      spaceToFreeMb: 0,
      cutoffDate: null,
      retentionDays: 30,
      videos: [],
      message: "Auto-delete is not enabled",
    });
  });

  it("refuses to run while auto-delete is disabled", async () => {
    const h = createHarness();
    const error: unknown = await h.services.cleanup.run(USER).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ status: 400, message: "Auto-delete is not enabled for this user" });
  });

  it("counts a record whose file could not be removed as deleted without freeing its space", async () => {
    const h = createHarness();
    enableAutoDelete(h);
    const old = h.videos.seed({ id: "old", userId: USER, fileSize: 1234567, createdAt: daysAgo(40) });
    h.storage.failDeleteFor.add(old.filePath);

    const result = await h.services.cleanup.run(USER);

    expect(result).toEqual({ videosDeleted: 1, filesDeleted: 0, spaceFreedMb: 0 });
    expect(await h.videos.findById("old")).toBeNull();
  });

  it("runs for every user that opted in", async () => {
    const h = createHarness();
    enableAutoDelete(h, "user-1");
    enableAutoDelete(h, "user-2", 7);
    h.settings.records.set("user-3", {
      anomalyThreshold: 0.5,
      frameSamplingRate: 10,
      autoDeleteOldVideos: false,
      videoRetentionDays: 1,
    });
    h.videos.seed({ id: "a", userId: "user-1", fileSize: MB, createdAt: daysAgo(45) });
    h.videos.seed({ id: "b", userId: "user-2", fileSize: MB, createdAt: daysAgo(3) });
    h.videos.seed({ id: "c", userId: "user-3", fileSize: MB, createdAt: daysAgo(45) });

    const report = await h.services.cleanup.runScheduled();

    expect(report).toEqual({
      usersProcessed: 2,
      videosDeleted: 1,
      filesDeleted: 1,
      spaceFreedMb: 1,
      errors: [],
    });
    expect(await h.videos.findById("b")).not.toBeNull();
    expect(await h.videos.findById("c")).not.toBeNull();
  });
});
