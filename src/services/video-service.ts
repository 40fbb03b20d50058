import type { Readable } from "node:stream";
import type {
  DetectionEvent,
  VideoRecord,
} from "../shared/interfaces";
import type { VideoRepository } from "../repositories/video-repository";
import type { EventRepository } from "../repositories/event-repository";
import type { StorageAdapter } from "../shared/storage";
import type { ServiceLogger } from "../shared/logger";
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  PayloadTooLargeError,
  errorMessage,
} from "../shared/errors";
import {
  VIDEO_CONTENT_TYPES,
  generateVideoFilename,
  generateVideoId,
  megabytesToBytes,
  videoFormatOf,
  videoStorageKey,
} from "../shared/storage-utils";
import { sourcesFor } from "./lifecycle";

export interface VideoUpload {
  filename: string;
  contentType: string;
  data: Buffer;
}

export interface VideoServiceDeps {
  videos: VideoRepository;
  events: EventRepository;
  storage: StorageAdapter;
  logger: ServiceLogger;
  maxVideoSizeMb: number;
  newId?: () => string;
}

export type ProcessRequestResult =
  | { started: true; video: VideoRecord }
  | { started: false; video: VideoRecord };

export type StreamTarget =
  | { kind: "redirect"; url: string }
  | { kind: "bytes"; data: Buffer; contentType: string };

export class VideoService {
  private readonly newId: () => string;

  constructor(private readonly deps: VideoServiceDeps) {
    this.newId = deps.newId ?? generateVideoId;
  }

  /** Loads a video and checks that `userId` owns it. */
  async getOwned(userId: string, videoId: string): Promise<VideoRecord> {
    const video = await this.deps.videos.findById(videoId);
    if (!video) throw new NotFoundError("Video not found");
    if (video.userId !== userId) throw new ForbiddenError();
    return video;
  }

  async list(userId: string, limit: number): Promise<VideoRecord[]> {
    return this.deps.videos.listByUser(userId, limit);
  }

  async upload(userId: string, upload: VideoUpload): Promise<VideoRecord> {
    if (!upload.contentType.startsWith("video/")) {
      throw new BadRequestError("File must be a video");
    }
    const format = videoFormatOf(upload.filename);
    if (!format) {
      throw new BadRequestError(
        "Unsupported video format. Allowed: mp4, mov, avi, webm, mkv"
      );
    }
    if (upload.data.length === 0) {
      throw new BadRequestError("Uploaded file is empty");
    }
    const { maxVideoSizeMb } = this.deps;
    if (upload.data.length > megabytesToBytes(maxVideoSizeMb)) {
      throw new PayloadTooLargeError(`File size exceeds ${maxVideoSizeMb}MB limit`);
    }

    return this.register(userId, upload.filename, upload.data.length, (key) =>
      this.deps.storage.saveBuffer(upload.data, key, VIDEO_CONTENT_TYPES[format])
    );
  }

  /** Registers a file picked up from disk; unsupported names resolve to null. */
  async ingest(
    userId: string,
    originalName: string,
    size: number,
    open: () => Readable
  ): Promise<VideoRecord | null> {
    const format = videoFormatOf(originalName);
    if (!format) return null;
    return this.register(userId, originalName, size, (key) =>
      this.deps.storage.saveStream(open(), key, VIDEO_CONTENT_TYPES[format])
    );
  }

  private async register(
    userId: string,
    originalName: string,
    size: number,
    save: (key: string) => Promise<string>
  ): Promise<VideoRecord> {
    const { storage, logger } = this.deps;
    const id = this.newId();
    const filename = generateVideoFilename(id, originalName);
    const key = await save(videoStorageKey(userId, filename));

    try {
      const video = await this.deps.videos.create({
        id,
        userId,
        filename,
        originalName,
        filePath: key,
        fileUrl: await storage.getPublicUrl(key),
        fileSize: size,
        durationSeconds: null,
        fps: null,
        resolution: null,
        storageProvider: storage.provider,
      });
      logger.info("Video uploaded", { videoId: id, userId, size });
      return video;
    } catch (error) {
      logger.error("Video record insert failed, removing stored file", {
        videoId: id,
        key,
        error: errorMessage(error),
      });
      await storage.delete(key).catch((cleanupError: unknown) => {
        logger.warn("Failed to remove orphaned upload", {
          key,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }
  }

  /**
   * Moves a video to `processing`. A completed video is only reprocessed when
   * asked to, and a reprocess drops the events of the previous run.
   */
  async requestProcessing(
    userId: string,
    videoId: string,
    { reprocess = false }: { reprocess?: boolean } = {}
  ): Promise<ProcessRequestResult> {
    const video = await this.getOwned(userId, videoId);

    if (video.status === "processing") {
      throw new ConflictError("Video is already being processed");
    }
    if (video.status === "completed" && !reprocess) {
      return { started: false, video };
    }
    if (!(await this.deps.storage.exists(video.filePath))) {
      throw new NotFoundError("Video file not found in storage");
    }

    const updated = await this.deps.videos.transitionStatus(
      video.id,
      sourcesFor("processing"),
      "processing",
      { errorMessage: null }
    );
    if (!updated) {
      throw new ConflictError("Video is already being processed");
    }

    if (video.status !== "uploaded") {
      const removed = await this.deps.events.deleteByVideo(video.id);
      this.deps.logger.info("Cleared previous detection events", {
        videoId,
        removed,
      });
    }

    this.deps.logger.info("Video processing requested", { videoId, userId, reprocess });
    return { started: true, video: updated };
  }

  /**
   * Closes a run that crashed before it could record its own outcome.
   * Returns false when the video had already left `processing`.
   */
  async markFailed(videoId: string, message: string): Promise<boolean> {
    const updated = await this.deps.videos.transitionStatus(videoId, ["processing"], "failed", {
      errorMessage: message,
    });
    if (updated) {
      this.deps.logger.warn("Video marked as failed", { videoId, error: message });
    }
    return updated !== null;
  }

  /** Deletes events first, then the stored file, then the record. */
  async delete(userId: string, videoId: string): Promise<{ eventsDeleted: number; fileDeleted: boolean }> {
    const video = await this.getOwned(userId, videoId);
    return this.remove(video);
  }

  async remove(video: VideoRecord): Promise<{ eventsDeleted: number; fileDeleted: boolean }> {
    const { events, storage, videos, logger } = this.deps;
    const eventsDeleted = await events.deleteByVideo(video.id);

    let fileDeleted = false;
    try {
      await storage.delete(video.filePath);
      fileDeleted = true;
    } catch (error) {
      logger.warn("Failed to delete stored video file", {
        videoId: video.id,
        key: video.filePath,
        error: errorMessage(error),
      });
    }

    await videos.delete(video.id);
    logger.info("Video deleted", { videoId: video.id, eventsDeleted, fileDeleted });
    return { eventsDeleted, fileDeleted };
  }

  async events(userId: string, videoId: string): Promise<DetectionEvent[]> {
    await this.getOwned(userId, videoId);
    return this.deps.events.listByVideo(videoId);
  }

  async streamTarget(userId: string, videoId: string): Promise<StreamTarget> {
    const video = await this.getOwned(userId, videoId);
    const { storage } = this.deps;

    if (video.storageProvider === "supabase") {
      return {
        kind: "redirect",
        url: video.fileUrl ?? (await storage.getPublicUrl(video.filePath)),
      };
    }
    if (!(await storage.exists(video.filePath))) {
      throw new NotFoundError("Video file not found");
    }
    const format = videoFormatOf(video.filename) ?? "mp4";
    return {
      kind: "bytes",
      data: await storage.getBuffer(video.filePath),
      contentType: VIDEO_CONTENT_TYPES[format],
    };
  }
}
