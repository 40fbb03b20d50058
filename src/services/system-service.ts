import type { VideoRepository } from "../repositories/video-repository";
import { readProcessingStats, type ProcessingStats, type StateStore } from "../shared/state";
import type { SettingsService } from "./settings-service";

export interface SystemStatus {
  status: "running";
  queueSize: number;
  isProcessing: boolean;
  statistics: ProcessingStats;
  currentThreshold: number;
  timestamp: Date;
}

export class SystemService {
  constructor(
    private readonly videos: VideoRepository,
    private readonly settings: SettingsService,
    private readonly now: () => Date = () => new Date()
  ) {}

  async status(userId: string, state: StateStore): Promise<SystemStatus> {
    const [queueSize, statistics, settings] = await Promise.all([
      this.videos.countByStatus("processing", userId),
      readProcessingStats(state),
      this.settings.get(userId),
    ]);
    return {
      status: "running",
      queueSize,
      isProcessing: queueSize > 0,
      statistics,
      currentThreshold: settings.anomalyThreshold,
      timestamp: this.now(),
    };
  }
}
