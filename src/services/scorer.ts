import type { MediaFacts } from "../shared/interfaces";

export interface AnomalyObservation {
  timestampSeconds: number;
  anomalyScore: number;
  confidence: number;
  label?: string;
}

export interface ScoringRequest {
  video: Buffer;
  mimeType: string;
  fileName: string;
  frameSamplingRate: number;
  anomalyThreshold: number;
}

export interface ScoringResult {
  observations: AnomalyObservation[];
  media?: MediaFacts;
}

/** Turns a stored video into scored observations. */
export interface AnomalyScorer {
  score(request: ScoringRequest): Promise<ScoringResult>;
}
