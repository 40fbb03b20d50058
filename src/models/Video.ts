import { Schema } from "mongoose";
import type { StorageProvider, VideoStatus } from "../shared/interfaces";
import { registerModel } from "./register";

export interface VideoDocument {
  _id: string;
  userId: string;
  filename: string;
  originalName: string;
  filePath: string;
  fileUrl: string | null;
  fileSize: number;
  durationSeconds: number | null;
  fps: number | null;
  resolution: string | null;
  status: VideoStatus;
  storageProvider: StorageProvider;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const VideoSchema = new Schema<VideoDocument>(
  {
    _id: { type: String, required: true },
    userId: { type: String, required: true, index: true },
    filename: { type: String, required: true },
    originalName: { type: String, required: true },
    filePath: { type: String, required: true },
    fileUrl: { type: String, default: null },
    fileSize: { type: Number, required: true, default: 0 },
    durationSeconds: { type: Number, default: null },
    fps: { type: Number, default: null },
    resolution: { type: String, default: null },
    status: {
      type: String,
      enum: ["uploaded", "processing", "completed", "failed"],
      default: "uploaded",
      index: true,
    },
    storageProvider: {
      type: String,
      enum: ["local", "supabase"],
      default: "local",
    },
    errorMessage: { type: String, default: null },
    createdAt: { type: Date },
    updatedAt: { type: Date },
  },
  {
    timestamps: true,
  }
);

VideoSchema.index({ userId: 1, createdAt: -1 });

export const Video = registerModel<VideoDocument>("Video", VideoSchema);
