import { Schema } from "mongoose";
import { registerModel } from "./register";

export interface DetectionEventDocument {
  _id: string;
  videoId: string;
  userId: string;
  eventType: string;
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

const DetectionEventSchema = new Schema<DetectionEventDocument>(
  {
    _id: { type: String, required: true },
    videoId: { type: String, required: true, index: true },
    userId: { type: String, required: true, index: true },
    eventType: { type: String, required: true, index: true },
    anomalyScore: { type: Number, required: true, min: 0, max: 1 },
    confidence: { type: Number, required: true, min: 0, max: 1 },
    timestampSeconds: { type: Number, required: true },
    frameNumber: { type: Number, required: true },
    description: { type: String, default: "" },
    isAlert: { type: Boolean, default: false },
    isFalsePositive: { type: Boolean, default: null },
    feedbackScore: { type: Number, default: null, min: -1, max: 1 },
    feedbackComments: { type: String, default: null },
    createdAt: { type: Date },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

export const DetectionEvent = registerModel<DetectionEventDocument>(
  "DetectionEvent",
  DetectionEventSchema
);
