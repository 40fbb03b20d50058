import { describe, expect, it } from "vitest";
import { buildDetectionEvents, classifyAnomalyType, describeDetection } from "../../src/services/detection";

const base = {
  videoId: "video-1",
  userId: "user-1",
  anomalyThreshold: 0.5,
  alertThreshold: 0.8,
  frameSamplingRate: 10,
};

describe("classifyAnomalyType", () => {
  it.each([
    [0.29, "normal"],
    [0.3, "loitering"],
    [0.5, "running"],
    [0.7, "crowd_gathering"],
    [0.8, "intrusion"],
    [0.9, "fighting"],
  ])("maps %s to %s", (score, type) => {
    expect(classifyAnomalyType(score)).toBe(type);
  });
});

describe("buildDetectionEvents", () => {
  it("keeps the strongest observation per sampled frame above the threshold", () => {
    const events = buildDetectionEvents(
      [
        { timestampSeconds: 1.0, anomalyScore: 0.85, confidence: 0.9 },
        { timestampSeconds: 1.1, anomalyScore: 0.95, confidence: 0.8, label: "Person Fighting" },
        { timestampSeconds: 2.0, anomalyScore: 0.4, confidence: 0.6 },
        { timestampSeconds: 0.5, anomalyScore: 0.6, confidence: 0.7 },
      ],
      { ...base, fps: 30 }
    );

    expect(events).toEqual([
      {
        videoId: "video-1",
        userId: "user-1",
        eventType: "running",
        anomalyScore: 0.6,
        confidence: 0.7,
        timestampSeconds: 10 / 30,
        frameNumber: 10,
        description: "Anomaly detected: running with score 0.60",
        isAlert: false,
      },
      {
        videoId: "video-1",
        userId: "user-1",
        eventType: "person_fighting",
        anomalyScore: 0.95,
        confidence: 0.8,
        timestampSeconds: 1,
        frameNumber: 30,
        description: "Anomaly detected: person_fighting with score 0.95",
        isAlert: true,
      },
    ]);
  });

  it("defaults to 30 fps and clamps scores into [0, 1]", () => {
    const [event] = buildDetectionEvents(
      [{ timestampSeconds: 2, anomalyScore: 1.4, confidence: -0.2 }],
      { ...base, fps: null }
    );

    expect(event.frameNumber).toBe(60);
    expect(event.anomalyScore).toBe(1);
    expect(event.confidence).toBe(0);
    expect(event.eventType).toBe("fighting");
    expect(event.description).toBe("Anomaly detected: fighting with score 1.00");
  });

  it("drops scores equal to the threshold and negative timestamps", () => {
    const events = buildDetectionEvents(
      [
        { timestampSeconds: 3, anomalyScore: 0.5, confidence: 1 },
        { timestampSeconds: -1, anomalyScore: 0.99, confidence: 1 },
      ],
      base
    );
    expect(events).toEqual([]);
  });

  it("formats descriptions with two decimals", () => {
    expect(describeDetection("loitering", 0.456)).toBe("Anomaly detected: loitering with score 0.46");
  });
});
