export type SupportedVideoFormat = "mp4" | "mov" | "avi" | "webm" | "mkv";

export type VideoStatus = "uploaded" | "processing" | "completed" | "failed";

export type StorageProvider = "local" | "supabase";

export type AnomalyType =
  | "normal"
  | "loitering"
  | "running"
  | "crowd_gathering"
  | "intrusion"
  | "fighting"
  | (string & {});

export interface VideoRecord {
  id: string;
  userId: string;
  filename: string;
  originalName: string;
  filePath: string;
  fileUrl: string | null;
  fileSize: number;
  durationSeconds: number | null;
  fps: number | null;
  resolution: string | null;
  status: VideoStatus;
  storageProvider: StorageProvider;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewVideo = Omit<
  VideoRecord,
  "createdAt" | "updatedAt" | "errorMessage" | "status"
> & { status?: VideoStatus };

export interface MediaFacts {
  durationSeconds?: number | null;
  fps?: number | null;
  resolution?: string | null;
}

export interface DetectionEvent {
  id: string;
  videoId: string;
  userId: string;
  eventType: AnomalyType;
  anomalyScore: number;
  confidence: number;
  timestampSeconds: number;
  frameNumber: number;
  description: string;
  isAlert: boolean;
  isFalsePositive: boolean | null;
  feedbackScore: number | null;
  feedbackComments: string | null;
  createdAt: Date;
}

export type NewDetectionEvent = Omit<
  DetectionEvent,
  "id" | "createdAt" | "isFalsePositive" | "feedbackScore" | "feedbackComments"
>;

export interface EventFeedback {
  isFalsePositive: boolean;
  feedbackScore: number;
  comments?: string | null;
}

export interface UserSettings {
  anomalyThreshold: number;
  frameSamplingRate: number;
  autoDeleteOldVideos: boolean;
  videoRetentionDays: number;
}

export interface UserSettingsRecord extends UserSettings {
  userId: string;
}

export interface UserProfile {
  id: string;
  email: string;
  fullName: string | null;
  createdAt: Date;
}

export interface AuthUser {
  id: string;
  email: string;
  fullName: string | null;
}

export interface AuthSession {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  user: AuthUser;
}

export interface ProcessingRequestedData {
  videoId: string;
  userId: string;
}

export interface ProcessingCompletedData {
  videoId: string;
  userId: string;
  eventsCreated: number;
  alerts: number;
}

export interface ProcessingFailedData {
  videoId: string;
  userId?: string;
  error: string;
  step: string;
}

export interface FileDetectedData {
  fileName: string;
  filePath: string;
}
