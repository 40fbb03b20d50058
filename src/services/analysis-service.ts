import type { VideoRepository } from "../repositories/video-repository";
import type { EventRepository } from "../repositories/event-repository";
import type { StorageAdapter } from "../shared/storage";
import type { ServiceLogger } from "../shared/logger";
import type { DetectionEvent } from "../shared/interfaces";
import { errorMessage } from "../shared/errors";
import {
  PROCESSING_STATS_KEY,
  SYSTEM_STATE_GROUP,
  readProcessingStats,
  type StateStore,
} from "../shared/state";
import { VIDEO_CONTENT_TYPES, videoFormatOf } from "../shared/storage-utils";
import { buildDetectionEvents } from "./detection";
import type { AnomalyScorer } from "./scorer";
import type { SettingsService } from "./settings-service";
import { summarizeEvents, type EventSummary } from "./analytics-service";

export type AnalysisOutcome =
  | { status: "skipped"; reason: string }
  | { status: "completed"; userId: string; eventsCreated: number; alerts: number }
  | { status: "failed"; userId: string; error: string };

export interface AnalysisServiceDeps {
  videos: VideoRepository;
  events: EventRepository;
  storage: StorageAdapter;
  settings: SettingsService;
  scorer: AnomalyScorer;
  logger: ServiceLogger;
  alertThreshold: number;
  now?: () => number;
}

export interface VideoAnalysis {
  summary: EventSummary;
  events: DetectionEvent[];
}

export class AnalysisService {
  private readonly now: () => number;

  constructor(private readonly deps: AnalysisServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Scores a video that is in `processing` and closes its lifecycle as
   * completed or failed. Scoring failures are reported in the outcome; an
   * error while recording the failure is thrown.
   */
  async analyze(videoId: string, state: StateStore): Promise<AnalysisOutcome> {
    const { videos, events, storage, settings, scorer, logger } = this.deps;

    const video = await videos.findById(videoId);
    if (!video) {
      return { status: "skipped", reason: "Video not found" };
    }
    if (video.status !== "processing") {
      return { status: "skipped", reason: `Video is ${video.status}` };
    }

    const startedAt = this.now();
    try {
      const userSettings = await settings.get(video.userId);
      const data = await storage.getBuffer(video.filePath);
      const format = videoFormatOf(video.filename) ?? "mp4";

      logger.info("Scoring video", {
        videoId,
        size: data.length,
        threshold: userSettings.anomalyThreshold,
      });

      const result = await scorer.score({
        video: data,
        mimeType: VIDEO_CONTENT_TYPES[format],
        fileName: video.originalName,
        frameSamplingRate: userSettings.frameSamplingRate,
        anomalyThreshold: userSettings.anomalyThreshold,
      });

      const detections = buildDetectionEvents(result.observations, {
        videoId: video.id,
        userId: video.userId,
        anomalyThreshold: userSettings.anomalyThreshold,
        alertThreshold: this.deps.alertThreshold,
        frameSamplingRate: userSettings.frameSamplingRate,
        fps: result.media?.fps ?? video.fps,
      });
      const inserted = await events.insertMany(detections);
      const alerts = inserted.filter((event) => event.isAlert).length;

      await videos.transitionStatus(video.id, ["processing"], "completed", {
        ...result.media,
        errorMessage: null,
      });

      await this.recordStats(state, {
        succeeded: true,
        eventsDetected: inserted.length,
        alerts,
        elapsedMs: this.now() - startedAt,
      });

      logger.info("Video analysis completed", {
        videoId,
        eventsCreated: inserted.length,
        alerts,
      });
      return { status: "completed", userId: video.userId, eventsCreated: inserted.length, alerts };
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Video analysis failed", { videoId, error: message });

      await videos.transitionStatus(video.id, ["processing"], "failed", {
        errorMessage: message,
      });
      await this.recordStats(state, {
        succeeded: false,
        eventsDetected: 0,
        alerts: 0,
        elapsedMs: this.now() - startedAt,
      });
      return { status: "failed", userId: video.userId, error: message };
    }
  }

  async videoAnalysis(videoId: string): Promise<VideoAnalysis> {
    const videoEvents = await this.deps.events.listByVideo(videoId);
    return { summary: summarizeEvents(videoEvents), events: videoEvents };
  }

  private async recordStats(
    state: StateStore,
    run: { succeeded: boolean; eventsDetected: number; alerts: number; elapsedMs: number }
  ): Promise<void> {
    const stats = await readProcessingStats(state);
    await state.set(SYSTEM_STATE_GROUP, PROCESSING_STATS_KEY, {
      videosProcessed: stats.videosProcessed + (run.succeeded ? 1 : 0),
      videosFailed: stats.videosFailed + (run.succeeded ? 0 : 1),
      eventsDetected: stats.eventsDetected + run.eventsDetected,
      alertsRaised: stats.alertsRaised + run.alerts,
      processingTimeTotalMs: stats.processingTimeTotalMs + run.elapsedMs,
      lastProcessedAt: new Date(this.now()).toISOString(),
    });
  }
}
