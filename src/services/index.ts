import { connectMongo } from "../db";
import { getConfig, type AppConfig } from "../shared/config";
import { AppError } from "../shared/errors";
import type { ServiceLogger } from "../shared/logger";
import { getStorage, type StorageAdapter } from "../shared/storage";
import { MongoVideoRepository, type VideoRepository } from "../repositories/video-repository";
import { MongoEventRepository, type EventRepository } from "../repositories/event-repository";
import { MongoSettingsRepository, type SettingsRepository } from "../repositories/settings-repository";
import { MongoProfileRepository, type ProfileRepository } from "../repositories/profile-repository";
import { GeminiAnomalyScorer } from "../helper/gemini-scorer";
import { SupabaseAuthProvider } from "../helper/supabase-auth";
import { AnalysisService } from "./analysis-service";
import { AnalyticsService } from "./analytics-service";
import { AuthService, type AuthProvider } from "./auth-service";
import { CleanupService } from "./cleanup-service";
import { EventService } from "./event-service";
import type { AnomalyScorer } from "./scorer";
import { SettingsService } from "./settings-service";
import { SystemService } from "./system-service";
import { VideoService } from "./video-service";

export interface ServiceDeps {
  config: Pick<AppConfig, "MAX_VIDEO_SIZE_MB" | "ALERT_SCORE_THRESHOLD">;
  logger: ServiceLogger;
  videos: VideoRepository;
  events: EventRepository;
  settings: SettingsRepository;
  profiles: ProfileRepository;
  storage: StorageAdapter;
  scorer: AnomalyScorer;
  auth: AuthProvider;
  now?: () => Date;
}

export interface Services {
  auth: AuthService;
  videos: VideoService;
  events: EventService;
  settings: SettingsService;
  cleanup: CleanupService;
  analysis: AnalysisService;
  analytics: AnalyticsService;
  system: SystemService;
}

export function createServices(deps: ServiceDeps): Services {
  const { logger } = deps;
  const now = deps.now ?? (() => new Date());
  const settings = new SettingsService(deps.settings, logger);
  const videos = new VideoService({
    videos: deps.videos,
    events: deps.events,
    storage: deps.storage,
    logger,
    maxVideoSizeMb: deps.config.MAX_VIDEO_SIZE_MB,
  });

  return {
    auth: new AuthService(deps.auth, deps.profiles, logger),
    videos,
    events: new EventService(deps.events, logger),
    settings,
    cleanup: new CleanupService({
      videos: deps.videos,
      settingsRepository: deps.settings,
      settings,
      videoService: videos,
      logger,
      now,
    }),
    analysis: new AnalysisService({
      videos: deps.videos,
      events: deps.events,
      storage: deps.storage,
      settings,
      scorer: deps.scorer,
      logger,
      alertThreshold: deps.config.ALERT_SCORE_THRESHOLD,
      now: () => now().getTime(),
    }),
    analytics: new AnalyticsService(deps.videos, deps.events),
    system: new SystemService(deps.videos, settings, now),
  };
}

class MissingScorer implements AnomalyScorer {
  async score(): Promise<never> {
    throw new Error("GEMINI_API_KEY environment variable is not set");
  }
}

class MissingAuthProvider implements AuthProvider {
  private fail(): never {
    throw new AppError(503, "Authentication provider is not configured");
  }
  async signUp(): Promise<never> {
    return this.fail();
  }
  async signIn(): Promise<never> {
    return this.fail();
  }
  async refresh(): Promise<never> {
    return this.fail();
  }
  async signOut(): Promise<never> {
    return this.fail();
  }
  async getUser(): Promise<never> {
    return this.fail();
  }
}

let authProvider: AuthProvider | null = null;
let scorer: AnomalyScorer | null = null;

/** Production wiring: MongoDB repositories, configured storage, Gemini and Supabase Auth. */
export async function getServices(logger: ServiceLogger): Promise<Services> {
  await connectMongo();
  const config = getConfig();

  if (!authProvider) {
    authProvider =
      config.SUPABASE_URL && config.SUPABASE_ANON_KEY
        ? new SupabaseAuthProvider(config.SUPABASE_URL, config.SUPABASE_ANON_KEY)
        : new MissingAuthProvider();
  }
  if (!scorer) {
    scorer = config.GEMINI_API_KEY
      ? new GeminiAnomalyScorer(config.GEMINI_API_KEY, config.GEMINI_MODEL)
      : new MissingScorer();
  }

  return createServices({
    config,
    logger,
    videos: new MongoVideoRepository(),
    events: new MongoEventRepository(),
    settings: new MongoSettingsRepository(),
    profiles: new MongoProfileRepository(),
    storage: getStorage(config),
    scorer,
    auth: authProvider,
  });
}
