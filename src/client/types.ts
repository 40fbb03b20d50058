import type {
  serializeCleanupResult,
  serializeEvent,
  serializePreview,
  serializeSession,
  serializeSettings,
  serializeStats,
  serializeSummary,
  serializeSystemStatus,
  serializeUser,
  serializeVideo,
} from "../shared/serializers";

export type VideoResponse = ReturnType<typeof serializeVideo>;
export type EventResponse = ReturnType<typeof serializeEvent>;
export type SettingsResponse = ReturnType<typeof serializeSettings>;
export type UserResponse = ReturnType<typeof serializeUser>;
export type SessionResponse = ReturnType<typeof serializeSession>;
export type AnalysisSummaryResponse = ReturnType<typeof serializeSummary>;
export type StatsResponse = ReturnType<typeof serializeStats>;
export type SystemStatusResponse = ReturnType<typeof serializeSystemStatus>;
export type CleanupPreviewResponse = ReturnType<typeof serializePreview>;
export type CleanupRunResponse = ReturnType<typeof serializeCleanupResult> & { message: string };

export interface VideoAnalysisResponse {
  video: VideoResponse;
  analysis_summary: AnalysisSummaryResponse;
  events: EventResponse[];
}

export interface ProcessResponse {
  message: string;
  video_id: string;
  status: "processing" | "completed";
}

export interface FeedbackRequest {
  is_false_positive: boolean;
  feedback_score: number;
  comments?: string;
}

export type SettingsUpdate = Partial<SettingsResponse>;
