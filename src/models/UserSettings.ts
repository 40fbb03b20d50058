import { Schema } from "mongoose";
import { registerModel } from "./register";

export interface UserSettingsDocument {
  userId: string;
  anomalyThreshold: number;
  frameSamplingRate: number;
  autoDeleteOldVideos: boolean;
  videoRetentionDays: number;
}

const UserSettingsSchema = new Schema<UserSettingsDocument>(
  {
    userId: { type: String, required: true, unique: true, index: true },
    anomalyThreshold: { type: Number, default: 0.5, min: 0, max: 1 },
    frameSamplingRate: { type: Number, default: 10, min: 1 },
    autoDeleteOldVideos: { type: Boolean, default: false, index: true },
    videoRetentionDays: { type: Number, default: 30, min: 1 },
  },
  {
    timestamps: true,
  }
);

export const UserSettingsModel = registerModel<UserSettingsDocument>(
  "UserSettings",
  UserSettingsSchema
);
