import type { AnomalyType, NewDetectionEvent } from "../shared/interfaces";
import type { AnomalyObservation } from "./scorer";

export const DEFAULT_FPS = 30;

export interface DetectionOptions {
  videoId: string;
  userId: string;
  anomalyThreshold: number;
  alertThreshold: number;
  frameSamplingRate: number;
  fps?: number | null;
}

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export function classifyAnomalyType(score: number): AnomalyType {
  if (score < 0.3) return "normal";
  if (score < 0.5) return "loitering";
  if (score < 0.7) return "running";
  if (score < 0.8) return "crowd_gathering";
  if (score < 0.9) return "intrusion";
  return "fighting";
}

function normalizeLabel(label: string | undefined): string | null {
  const normalized = label
    ?.trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return normalized ? normalized : null;
}

export function describeDetection(type: AnomalyType, score: number): string {
  return `Anomaly detected: ${type} with score ${score.toFixed(2)}`;
}

/**
 * Snaps observations onto the sampling grid, keeps the strongest observation
 * per sampled frame and returns one event per frame scoring above the
 * threshold, in frame order.
 */
export function buildDetectionEvents(
  observations: readonly AnomalyObservation[],
  options: DetectionOptions
): NewDetectionEvent[] {
  const fps = options.fps && options.fps > 0 ? options.fps : DEFAULT_FPS;
  const samplingRate = Math.max(1, Math.floor(options.frameSamplingRate));
  const strongest = new Map<number, AnomalyObservation>();

  for (const observation of observations) {
    if (!Number.isFinite(observation.timestampSeconds) || observation.timestampSeconds < 0) {
      continue;
    }
    const frame = Math.round(observation.timestampSeconds * fps);
    const sampledFrame = frame - (frame % samplingRate);
    const current = strongest.get(sampledFrame);
    if (!current || observation.anomalyScore > current.anomalyScore) {
      strongest.set(sampledFrame, observation);
    }
  }

  return [...strongest.entries()]
    .sort(([a], [b]) => a - b)
    .filter(([, observation]) => clamp01(observation.anomalyScore) > options.anomalyThreshold)
    .map(([frameNumber, observation]) => {
      const anomalyScore = clamp01(observation.anomalyScore);
      const eventType = normalizeLabel(observation.label) ?? classifyAnomalyType(anomalyScore);
      return {
        videoId: options.videoId,
        userId: options.userId,
        eventType,
        anomalyScore,
        confidence: clamp01(observation.confidence),
        timestampSeconds: frameNumber / fps,
        frameNumber,
        description: describeDetection(eventType, anomalyScore),
        isAlert: anomalyScore > options.alertThreshold,
      };
    });
}
