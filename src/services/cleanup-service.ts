import type { VideoRecord } from "../shared/interfaces";
import type { VideoRepository } from "../repositories/video-repository";
import type { SettingsRepository } from "../repositories/settings-repository";
import type { ServiceLogger } from "../shared/logger";
import { BadRequestError, errorMessage } from "../shared/errors";
import { bytesToMb } from "../shared/storage-utils";
import type { SettingsService } from "./settings-service";
import type { VideoService } from "./video-service";

const DAY_MS = 24 * 60 * 60 * 1000;

export function computeCutoff(now: Date, retentionDays: number): Date {
  return new Date(now.getTime() - retentionDays * DAY_MS);
}

export interface CleanupCandidate {
  id: string;
  name: string;
  sizeMb: number;
  createdAt: Date;
}

export interface CleanupPreview {
  videosToDelete: number;
  spaceToFreeMb: number;
  cutoffDate: Date | null;
  retentionDays: number;
  videos: CleanupCandidate[];
  message?: string;
}

export interface CleanupResult {
  videosDeleted: number;
  filesDeleted: number;
  spaceFreedMb: number;
}

export interface ScheduledCleanupReport extends CleanupResult {
  usersProcessed: number;
  errors: string[];
}

export interface CleanupServiceDeps {
  videos: VideoRepository;
  settingsRepository: SettingsRepository;
  settings: SettingsService;
  videoService: VideoService;
  logger: ServiceLogger;
  now?: () => Date;
}

export class CleanupService {
  private readonly now: () => Date;

  constructor(private readonly deps: CleanupServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private async expired(userId: string, retentionDays: number) {
    const cutoff = computeCutoff(this.now(), retentionDays);
    const videos = await this.deps.videos.listCreatedBefore(userId, cutoff);
    return { cutoff, videos };
  }

  async preview(userId: string): Promise<CleanupPreview> {
    const settings = await this.deps.settings.get(userId);
    if (!settings.autoDeleteOldVideos) {
      return {
        videosToDelete: 0,
        spaceToFreeMb: 0,
        cutoffDate: null,
        retentionDays: settings.videoRetentionDays,
        videos: [],
        message: "Auto-delete is not enabled",
      };
    }

    const { cutoff, videos } = await this.expired(userId, settings.videoRetentionDays);
    const totalBytes = videos.reduce((sum, video) => sum + video.fileSize, 0);
    return {
      videosToDelete: videos.length,
      spaceToFreeMb: bytesToMb(totalBytes),
      cutoffDate: cutoff,
      retentionDays: settings.videoRetentionDays,
      videos: videos.map((video) => ({
        id: video.id,
        name: video.originalName,
        sizeMb: bytesToMb(video.fileSize),
        createdAt: video.createdAt,
      })),
    };
  }

  async run(userId: string): Promise<CleanupResult> {
    const settings = await this.deps.settings.get(userId);
    if (!settings.autoDeleteOldVideos) {
      throw new BadRequestError("Auto-delete is not enabled for this user");
    }
    return this.purge(userId, settings.videoRetentionDays);
  }

  /** Cleanup for every user that opted into auto-delete. */
  async runScheduled(): Promise<ScheduledCleanupReport> {
    const report: ScheduledCleanupReport = {
      usersProcessed: 0,
      videosDeleted: 0,
      filesDeleted: 0,
      spaceFreedMb: 0,
      errors: [],
    };

    const users = await this.deps.settingsRepository.listAutoDeleteEnabled();
    for (const user of users) {
      try {
        const result = await this.purge(user.userId, user.videoRetentionDays);
        report.usersProcessed += 1;
        report.videosDeleted += result.videosDeleted;
        report.filesDeleted += result.filesDeleted;
        report.spaceFreedMb += result.spaceFreedMb;
      } catch (error) {
        report.errors.push(`User ${user.userId}: ${errorMessage(error)}`);
      }
    }
    report.spaceFreedMb = Math.round(report.spaceFreedMb * 100) / 100;
    return report;
  }

  private async purge(userId: string, retentionDays: number): Promise<CleanupResult> {
    const { videos, cutoff } = await this.expired(userId, retentionDays);
    const { logger } = this.deps;
    let videosDeleted = 0;
    let filesDeleted = 0;
    let bytesFreed = 0;

    for (const video of videos) {
      const removed = await this.removeOne(video);
      if (!removed) continue;
      videosDeleted += 1;
      if (removed.fileDeleted) {
        filesDeleted += 1;
        bytesFreed += video.fileSize;
      }
    }

    logger.info("Cleanup finished", {
      userId,
      cutoff: cutoff.toISOString(),
      videosDeleted,
      filesDeleted,
    });
    return { videosDeleted, filesDeleted, spaceFreedMb: bytesToMb(bytesFreed) };
  }

  private async removeOne(video: VideoRecord) {
    try {
      return await this.deps.videoService.remove(video);
    } catch (error) {
      this.deps.logger.error("Failed to delete expired video", {
        videoId: video.id,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
