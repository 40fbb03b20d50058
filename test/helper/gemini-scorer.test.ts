import { describe, expect, it } from "vitest";
import { buildScoringPrompt, parseScoringResponse } from "../../src/helper/gemini-scorer";

describe("parseScoringResponse", () => {
  it("reads observations and media facts from fenced JSON", () => {
    const text = [
      "```json",
      '{"fps":25,"observations":[{"timestamp_seconds":1.5,"anomaly_score":0.7,"confidence":0.9,"label":"running"}]}',
      "```",
    ].join("\n");

    const result = parseScoringResponse(text);
    expect(result.observations).toEqual([
      { timestampSeconds: 1.5, anomalyScore: 0.7, confidence: 0.9, label: "running" },
    ]);
    expect(result.media).toEqual({ fps: 25 });
  });

  it("leaves media facts the model did not report undefined", () => {
    const media = parseScoringResponse('{"duration_seconds":null,"observations":[]}').media;
    expect(media?.durationSeconds).toBeUndefined();
    expect(media?.fps).toBeUndefined();
    expect(media?.resolution).toBeUndefined();
  });

  it("treats a missing observation list as empty", () => {
    expect(parseScoringResponse('{"resolution":"640x480"}').observations).toEqual([]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseScoringResponse("not json")).toThrow("Scoring model returned malformed JSON");
  });

  it("rejects an unexpected shape", () => {
    const text = '{"observations":[{"timestamp_seconds":-1,"anomaly_score":0.5,"confidence":1}]}';
    expect(() => parseScoringResponse(text)).toThrow(/^Scoring model returned an unexpected shape/);
  });
});

describe("buildScoringPrompt", () => {
  it("carries the sampling rate and threshold", () => {
    const prompt = buildScoringPrompt({
      video: Buffer.alloc(0),
      mimeType: "video/mp4",
      fileName: "gate.mp4",
      frameSamplingRate: 15,
      anomalyThreshold: 0.6,
    });

    expect(prompt).toContain('reviewing "gate.mp4"');
    expect(prompt).toContain("roughly every 15 frames");
    expect(prompt).toContain("Only moments scoring above 0.6 matter");
  });
});
