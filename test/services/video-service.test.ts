import { describe, expect, it, vi } from "vitest";
import { Readable } from "node:stream";
import { AppError } from "../../src/shared/errors";
import { createHarness, type Harness } from "../support/harness";

const USER = "user-1";

function seedStored(h: Harness, id: string, status: "uploaded" | "processing" | "completed" | "failed") {
  const video = h.videos.seed({ id, userId: USER, status });
  h.storage.blobs.set(video.filePath, Buffer.from("frames"));
  return video;
}

async function expectAppError(promise: Promise<unknown>, status: number, message: string) {
  const error: unknown = await promise.then(
    () => null,
    (reason: unknown) => reason
  );
  expect(error).toBeInstanceOf(AppError);
  expect(error).toMatchObject({ status, message });
}

describe("VideoService.upload", () => {
  it("stores the blob and registers an uploaded video", async () => {
    const h = createHarness();
    const video = await h.services.videos.upload(USER, {
      filename: "Lobby Cam.MP4",
      contentType: "video/mp4",
      data: Buffer.from("fake-video"),
    });

    expect(video.status).toBe("uploaded");
    expect(video.originalName).toBe("Lobby Cam.MP4");
    expect(video.filename).toBe(`${video.id}.mp4`);
    expect(video.filePath).toBe(`${USER}/${video.id}.mp4`);
    expect(video.fileUrl).toBe(`http://files.test/${USER}/${video.id}.mp4`);
    expect(video.fileSize).toBe(10);
    expect(h.storage.blobs.get(video.filePath)?.toString()).toBe("fake-video");
  });

  it("rejects non-video content types", async () => {
    const h = createHarness();
    await expectAppError(
      h.services.videos.upload(USER, { filename: "a.mp4", contentType: "application/pdf", data: Buffer.from("x") }),
      400,
      "File must be a video"
    );
  });

  it("rejects unsupported extensions", async () => {
    const h = createHarness();
    await expectAppError(
      h.services.videos.upload(USER, { filename: "clip.txt", contentType: "video/mp4", data: Buffer.from("x") }),
      400,
      "Unsupported video format. Allowed: mp4, mov, avi, webm, mkv"
    );
  });

  it("rejects empty payloads", async () => {
    const h = createHarness();
    await expectAppError(
      h.services.videos.upload(USER, { filename: "clip.mp4", contentType: "video/mp4", data: Buffer.alloc(0) }),
      400,
      "Uploaded file is empty"
    );
  });

  it("rejects files over the size limit with 413", async () => {
    const h = createHarness({ maxVideoSizeMb: 1 });
    await expectAppError(
      h.services.videos.upload(USER, {
        filename: "clip.mp4",
        contentType: "video/mp4",
        data: Buffer.alloc(1024 * 1024 + 1),
      }),
      413,
      "File size exceeds 1MB limit"
    );
    expect(h.storage.blobs.size).toBe(0);
  });

  it("removes the stored blob when the record insert fails", async () => {
    const h = createHarness();
    h.videos.failCreate = new Error("db down");

    await expect(
      h.services.videos.upload(USER, { filename: "clip.mp4", contentType: "video/mp4", data: Buffer.from("x") })
    ).rejects.toThrow("db down");
    expect(h.storage.blobs.size).toBe(0);
  });
});

describe("VideoService.ingest", () => {
  it("streams a dropped file into storage", async () => {
    const h = createHarness();
    const video = await h.services.videos.ingest(USER, "door.webm", 3, () => Readable.from([Buffer.from("abc")]));

    expect(video?.filename).toBe(`${video?.id}.webm`);
    expect(h.storage.blobs.get(`${USER}/${video?.id}.webm`)?.toString()).toBe("abc");
  });

  it("ignores unsupported files without opening them", async () => {
    const h = createHarness();
    let opened = false;
    const video = await h.services.videos.ingest(USER, "notes.txt", 3, () => {
      opened = true;
      return Readable.from([]);
    });

    expect(video).toBeNull();
    expect(opened).toBe(false);
  });
});

describe("VideoService.requestProcessing", () => {
  it("moves an uploaded video to processing immediately", async () => {
    const h = createHarness();
    seedStored(h, "v1", "uploaded");

    const result = await h.services.videos.requestProcessing(USER, "v1");

    expect(result.started).toBe(true);
    expect(result.video.status).toBe("processing");
    expect((await h.videos.findById("v1"))?.status).toBe("processing");
  });

  it("rejects a video that is already processing", async () => {
    const h = createHarness();
    seedStored(h, "v1", "processing");
    await expectAppError(h.services.videos.requestProcessing(USER, "v1"), 409, "Video is already being processed");
  });

  it("leaves a completed video alone unless reprocessing is requested", async () => {
    const h = createHarness();
    seedStored(h, "v1", "completed");

    const result = await h.services.videos.requestProcessing(USER, "v1");

    expect(result.started).toBe(false);
    expect((await h.videos.findById("v1"))?.status).toBe("completed");
  });

  it("clears previous events when reprocessing", async () => {
    const h = createHarness();
    seedStored(h, "v1", "completed");
    await h.events.insertMany([
      {
        videoId: "v1",
        userId: USER,
        eventType: "running",
        anomalyScore: 0.6,
        confidence: 0.9,
        timestampSeconds: 1,
        frameNumber: 30,
        description: "Anomaly detected: running with score 0.60",
        isAlert: false,
      },
    ]);

    const result = await h.services.videos.requestProcessing(USER, "v1", { reprocess: true });

    expect(result.started).toBe(true);
    expect(result.video.status).toBe("processing");
    expect(await h.events.listByVideo("v1")).toEqual([]);
  });

  it("keeps the previous events when a concurrent request wins the transition", async () => {
    const h = createHarness();
    seedStored(h, "v1", "completed");
    await h.events.insertMany([
      {
        videoId: "v1",
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
    vi.spyOn(h.videos, "transitionStatus").mockResolvedValueOnce(null);

    await expectAppError(
      h.services.videos.requestProcessing(USER, "v1", { reprocess: true }),
      409,
      "Video is already being processed"
    );
    expect(await h.events.listByVideo("v1")).toHaveLength(1);
  });

  it("retries a failed video and clears its error", async () => {
    const h = createHarness();
    h.videos.seed({ id: "v1", userId: USER, status: "failed", errorMessage: "model unavailable" });
    h.storage.blobs.set(`${USER}/v1.mp4`, Buffer.from("frames"));

    const result = await h.services.videos.requestProcessing(USER, "v1");

    expect(result.video.status).toBe("processing");
    expect(result.video.errorMessage).toBeNull();
  });

  it("reports a missing stored file", async () => {
    const h = createHarness();
    h.videos.seed({ id: "v1", userId: USER });
    await expectAppError(h.services.videos.requestProcessing(USER, "v1"), 404, "Video file not found in storage");
  });

  it("distinguishes unknown videos from other owners' videos", async () => {
    const h = createHarness();
    seedStored(h, "v1", "uploaded");
    await expectAppError(h.services.videos.requestProcessing(USER, "missing"), 404, "Video not found");
    await expectAppError(h.services.videos.requestProcessing("user-2", "v1"), 403, "Access denied");
  });
});

describe("VideoService.markFailed", () => {
  it("fails a video stuck in processing", async () => {
    const h = createHarness();
    seedStored(h, "v1", "processing");

    expect(await h.services.videos.markFailed("v1", "worker crashed")).toBe(true);
    expect(await h.videos.findById("v1")).toMatchObject({ status: "failed", errorMessage: "worker crashed" });
  });

  it("leaves a video that already left processing untouched", async () => {
    const h = createHarness();
    seedStored(h, "v1", "completed");

    expect(await h.services.videos.markFailed("v1", "late failure")).toBe(false);
    expect(await h.videos.findById("v1")).toMatchObject({ status: "completed", errorMessage: null });
  });
});

describe("VideoService.delete", () => {
  it("removes the video together with its events and stored file", async () => {
    const h = createHarness();
    const video = seedStored(h, "v1", "completed");
    seedStored(h, "v2", "completed");
    await h.events.insertMany(
      ["v1", "v1", "v2"].map((videoId, index) => ({
        videoId,
        userId: USER,
        eventType: "intrusion",
        anomalyScore: 0.85,
        confidence: 0.9,
        timestampSeconds: index,
        frameNumber: index * 30,
        description: "Anomaly detected: intrusion with score 0.85",
        isAlert: true,
      }))
    );

    const result = await h.services.videos.delete(USER, "v1");

    expect(result).toEqual({ eventsDeleted: 2, fileDeleted: true });
    expect(await h.videos.findById("v1")).toBeNull();
    expect(await h.events.listByVideo("v1")).toEqual([]);
    expect(await h.events.listByVideo("v2")).toHaveLength(1);
    expect(h.storage.blobs.has(video.filePath)).toBe(false);
  });

  it("still removes the record when the file cannot be deleted", async () => {
    const h = createHarness();
    const video = seedStored(h, "v1", "uploaded");
    h.storage.failDeleteFor.add(video.filePath);

    const result = await h.services.videos.delete(USER, "v1");

    expect(result).toEqual({ eventsDeleted: 0, fileDeleted: false });
    expect(await h.videos.findById("v1")).toBeNull();
    expect(h.logger.warn).toHaveBeenCalledWith("Failed to delete stored video file", {
      videoId: "v1",
      key: video.filePath,
      error: `Storage unavailable for ${video.filePath}`,
    });
  });
});

describe("VideoService.streamTarget", () => {
  it("returns local bytes with the video content type", async () => {
    const h = createHarness();
    seedStored(h, "v1", "completed");

    const target = await h.services.videos.streamTarget(USER, "v1");

    expect(target).toEqual({ kind: "bytes", data: Buffer.from("frames"), contentType: "video/mp4" });
  });

  it("redirects supabase-hosted videos to their public URL", async () => {
    const h = createHarness();
    h.videos.seed({
      id: "v1",
      userId: USER,
      storageProvider: "supabase",
      fileUrl: "https://project.supabase.test/storage/v1/object/public/videos/user-1/v1.mp4",
    });

    const target = await h.services.videos.streamTarget(USER, "v1");

    expect(target).toEqual({
      kind: "redirect",
      url: "https://project.supabase.test/storage/v1/object/public/videos/user-1/v1.mp4",
    });
  });
});
