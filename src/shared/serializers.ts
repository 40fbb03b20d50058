import type {
  AuthSession,
  AuthUser,
  DetectionEvent,
  UserSettings,
  VideoRecord,
} from "./interfaces";
import type { EventSummary, UserStats } from "../services/analytics-service";
import type { CleanupPreview, CleanupResult, ScheduledCleanupReport } from "../services/cleanup-service";
import type { SystemStatus } from "../services/system-service";

export function serializeVideo(video: VideoRecord) {
  return {
    id: video.id,
    user_id: video.userId,
    filename: video.filename,
    original_name: video.originalName,
    file_path: video.filePath,
    file_url: video.fileUrl,
    file_size: video.fileSize,
    duration_seconds: video.durationSeconds,
    fps: video.fps,
    resolution: video.resolution,
    upload_status: video.status,
    storage_provider: video.storageProvider,
    error_message: video.errorMessage,
    created_at: video.createdAt.toISOString(),
    updated_at: video.updatedAt.toISOString(),
  };
}

export function serializeEvent(event: DetectionEvent) {
  return {
    id: event.id,
    video_id: event.videoId,
    user_id: event.userId,
    event_type: event.eventType,
    anomaly_score: event.anomalyScore,
    confidence: event.confidence,
    timestamp_seconds: event.timestampSeconds,
    frame_number: event.frameNumber,
    description: event.description,
    is_alert: event.isAlert,
    is_false_positive: event.isFalsePositive,
    feedback_score: event.feedbackScore,
    feedback_comments: event.feedbackComments,
    created_at: event.createdAt.toISOString(),
  };
}

export function serializeSettings(settings: UserSettings) {
  return {
    anomaly_threshold: settings.anomalyThreshold,
    frame_sampling_rate: settings.frameSamplingRate,
    auto_delete_old_videos: settings.autoDeleteOldVideos,
    video_retention_days: settings.videoRetentionDays,
  };
}

export function serializeUser(user: AuthUser) {
  return { id: user.id, email: user.email, full_name: user.fullName };
}

export function serializeSession(session: AuthSession) {
  return {
    access_token: session.accessToken,
    refresh_token: session.refreshToken,
    token_type: "bearer",
    expires_in: session.expiresIn,
    user: serializeUser(session.user),
  };
}

export function serializeSummary(summary: EventSummary) {
  return {
    total_events: summary.totalEvents,
    anomaly_types: summary.anomalyTypes,
    max_score: summary.maxScore,
    avg_score: summary.avgScore,
    high_risk_events: summary.highRiskEvents,
  };
}

export function serializeStats(stats: UserStats) {
  return {
    total_videos: stats.totalVideos,
    videos_by_status: stats.videosByStatus,
    total_events: stats.totalEvents,
    total_alerts: stats.totalAlerts,
    events_by_type: stats.eventsByType,
    average_score: stats.averageScore,
    feedback_count: stats.feedbackCount,
    false_positive_rate: stats.falsePositiveRate,
  };
}

export function serializePreview(preview: CleanupPreview) {
  return {
    videos_to_delete: preview.videosToDelete,
    space_to_free_mb: preview.spaceToFreeMb,
    cutoff_date: preview.cutoffDate ? preview.cutoffDate.toISOString() : null,
    retention_days: preview.retentionDays,
    videos: preview.videos.map((video) => ({
      id: video.id,
      name: video.name,
      size_mb: video.sizeMb,
      created_at: video.createdAt.toISOString(),
    })),
    ...(preview.message ? { message: preview.message } : {}),
  };
}

export function serializeCleanupResult(result: CleanupResult) {
  return {
    videos_deleted: result.videosDeleted,
    files_deleted: result.filesDeleted,
    space_freed_mb: result.spaceFreedMb,
  };
}

export function serializeScheduledReport(report: ScheduledCleanupReport) {
  return {
    users_processed: report.usersProcessed,
    ...serializeCleanupResult(report),
    errors: report.errors,
  };
}

export function serializeSystemStatus(status: SystemStatus) {
  return {
    status: status.status,
    queue_size: status.queueSize,
    is_processing: status.isProcessing,
    statistics: {
      videos_processed: status.statistics.videosProcessed,
      videos_failed: status.statistics.videosFailed,
      events_detected: status.statistics.eventsDetected,
      alerts_raised: status.statistics.alertsRaised,
      processing_time_total_ms: status.statistics.processingTimeTotalMs,
      last_processed_at: status.statistics.lastProcessedAt,
    },
    current_threshold: status.currentThreshold,
    timestamp: status.timestamp.toISOString(),
  };
}
