import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { z } from "zod";
import type {
  AnomalyScorer,
  ScoringRequest,
  ScoringResult,
} from "../services/scorer";

const responseSchema = z.object({
  duration_seconds: z.number().nonnegative().nullish(),
  fps: z.number().positive().nullish(),
  resolution: z
    .string()
    .regex(/^\d+x\d+$/)
    .nullish(),
  observations: z
    .array(
      z.object({
        timestamp_seconds: z.number().nonnegative(),
        anomaly_score: z.number(),
        confidence: z.number(),
        label: z.string().nullish(),
      })
    )
    .default([]),
});

export function buildScoringPrompt(request: ScoringRequest): string {
  return `You are a video-surveillance analyst reviewing "${request.fileName}".
Sample the footage roughly every ${request.frameSamplingRate} frames and score how anomalous each sampled moment is.

Scores range from 0 (ordinary activity) to 1 (clear threat). Typical labels:
loitering, running, crowd_gathering, intrusion, fighting.
Only moments scoring above ${request.anomalyThreshold} matter, but include any you are unsure about.

Return ONLY valid JSON in this exact format:
{
  "duration_seconds": 12.5,
  "fps": 30,
  "resolution": "1920x1080",
  "observations": [
    { "timestamp_seconds": 3.2, "anomaly_score": 0.74, "confidence": 0.9, "label": "running" }
  ]
}`;
}

/** Parses the model's JSON reply, tolerating a fenced code block around it. */
export function parseScoringResponse(text: string): ScoringResult {
  const cleaned = text.replace(/```json\n?|```/g, "").trim();
  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch {
    throw new Error("Scoring model returned malformed JSON");
  }

  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Scoring model returned an unexpected shape: ${parsed.error.issues[0].message}`);
  }

  const { observations, duration_seconds, fps, resolution } = parsed.data;
  return {
    observations: observations.map((observation) => ({
      timestampSeconds: observation.timestamp_seconds,
      anomalyScore: observation.anomaly_score,
      confidence: observation.confidence,
      label: observation.label ?? undefined,
    })),
    media: {
      durationSeconds: duration_seconds ?? undefined,
      fps: fps ?? undefined,
      resolution: resolution ?? undefined,
    },
  };
}

/** Scores footage with a Gemini multimodal model from an inline video part. */
export class GeminiAnomalyScorer implements AnomalyScorer {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({
      model: modelName,
      generationConfig: {
        temperature: 0.2,
        responseMimeType: "application/json",
      },
    });
  }

  async score(request: ScoringRequest): Promise<ScoringResult> {
    const response = await this.model.generateContent({
      contents: [
        {
          role: "user",
          parts: [
            {
              inlineData: {
                mimeType: request.mimeType,
                data: request.video.toString("base64"),
              },
            },
            { text: buildScoringPrompt(request) },
          ],
        },
      ],
    });
    return parseScoringResponse(response.response.text());
  }
}
