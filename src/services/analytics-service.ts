import type { DetectionEvent, VideoStatus } from "../shared/interfaces";
import type { VideoRepository } from "../repositories/video-repository";
import type { EventRepository } from "../repositories/event-repository";

/** Events above this score count as high risk in summaries. */
export const HIGH_RISK_SCORE = 0.8;

export interface EventSummary {
  totalEvents: number;
  anomalyTypes: Record<string, number>;
  maxScore: number;
  avgScore: number;
  highRiskEvents: number;
}

const round = (value: number, digits = 4) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export function summarizeEvents(events: readonly DetectionEvent[]): EventSummary {
  const anomalyTypes: Record<string, number> = {};
  let maxScore = 0;
  let totalScore = 0;
  let highRiskEvents = 0;

  for (const event of events) {
    anomalyTypes[event.eventType] = (anomalyTypes[event.eventType] ?? 0) + 1;
    maxScore = Math.max(maxScore, event.anomalyScore);
    totalScore += event.anomalyScore;
    if (event.anomalyScore > HIGH_RISK_SCORE) highRiskEvents += 1;
  }

  return {
    totalEvents: events.length,
    anomalyTypes,
    maxScore,
    avgScore: events.length ? round(totalScore / events.length) : 0,
    highRiskEvents,
  };
}

export interface UserStats {
  totalVideos: number;
  videosByStatus: Record<VideoStatus, number>;
  totalEvents: number;
  totalAlerts: number;
  eventsByType: Record<string, number>;
  averageScore: number;
  feedbackCount: number;
  falsePositiveRate: number;
}

export class AnalyticsService {
  constructor(
    private readonly videos: VideoRepository,
    private readonly events: EventRepository
  ) {}

  async userStats(userId: string): Promise<UserStats> {
    const [videos, events] = await Promise.all([
      this.videos.listByUser(userId),
      this.events.listByUser(userId, {}),
    ]);

    const videosByStatus: Record<VideoStatus, number> = {
      uploaded: 0,
      processing: 0,
      completed: 0,
      failed: 0,
    };
    for (const video of videos) videosByStatus[video.status] += 1;

    const summary = summarizeEvents(events);
    const reviewed = events.filter((event) => event.isFalsePositive !== null);
    const falsePositives = reviewed.filter((event) => event.isFalsePositive === true);

    return {
      totalVideos: videos.length,
      videosByStatus,
      totalEvents: summary.totalEvents,
      totalAlerts: events.filter((event) => event.isAlert).length,
      eventsByType: summary.anomalyTypes,
      averageScore: summary.avgScore,
      feedbackCount: reviewed.length,
      falsePositiveRate: reviewed.length ? round(falsePositives.length / reviewed.length) : 0,
    };
  }
}
