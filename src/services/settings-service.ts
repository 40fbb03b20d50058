import type { UserSettings } from "../shared/interfaces";
import type { SettingsRepository } from "../repositories/settings-repository";
import type { ServiceLogger } from "../shared/logger";
import { BadRequestError } from "../shared/errors";

export const DEFAULT_SETTINGS: Readonly<UserSettings> = {
  anomalyThreshold: 0.5,
  frameSamplingRate: 10,
  autoDeleteOldVideos: false,
  videoRetentionDays: 30,
};

export type SettingsPatch = Partial<UserSettings>;

function validate(settings: UserSettings): void {
  const { anomalyThreshold, frameSamplingRate, videoRetentionDays } = settings;
  if (!(anomalyThreshold >= 0 && anomalyThreshold <= 1)) {
    throw new BadRequestError("anomaly_threshold must be between 0 and 1");
  }
  if (!Number.isInteger(frameSamplingRate) || frameSamplingRate < 1) {
    throw new BadRequestError("frame_sampling_rate must be a positive integer");
  }
  if (!Number.isInteger(videoRetentionDays) || videoRetentionDays < 1) {
    throw new BadRequestError("video_retention_days must be a positive integer");
  }
}

export class SettingsService {
  constructor(
    private readonly settings: SettingsRepository,
    private readonly logger: ServiceLogger
  ) {}

  async get(userId: string): Promise<UserSettings> {
    return (await this.settings.findByUser(userId)) ?? { ...DEFAULT_SETTINGS };
  }

  /** Merges the patch into the stored (or default) row and saves it. */
  async update(userId: string, patch: SettingsPatch): Promise<UserSettings> {
    const current = await this.get(userId);
    const next: UserSettings = {
      anomalyThreshold: patch.anomalyThreshold ?? current.anomalyThreshold,
      frameSamplingRate: patch.frameSamplingRate ?? current.frameSamplingRate,
      autoDeleteOldVideos: patch.autoDeleteOldVideos ?? current.autoDeleteOldVideos,
      videoRetentionDays: patch.videoRetentionDays ?? current.videoRetentionDays,
    };
    validate(next);

    const saved = await this.settings.upsert(userId, next);
    this.logger.info("Settings updated", { userId, fields: Object.keys(patch) });
    return saved;
  }
}
