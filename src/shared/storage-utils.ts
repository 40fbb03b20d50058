import { randomUUID } from "node:crypto";
import type { SupportedVideoFormat } from "./interfaces";

const BYTES_PER_MB = 1024 * 1024;

export const SUPPORTED_VIDEO_FORMATS: readonly SupportedVideoFormat[] = [
  "mp4",
  "mov",
  "avi",
  "webm",
  "mkv",
];

export const VIDEO_CONTENT_TYPES: Record<SupportedVideoFormat, string> = {
  mp4: "video/mp4",
  mov: "video/quicktime",
  avi: "video/x-msvideo",
  webm: "video/webm",
  mkv: "video/x-matroska",
};

export function videoFormatOf(filename: string): SupportedVideoFormat | null {
  const ext = filename.includes(".")
    ? filename.split(".").pop()?.toLowerCase()
    : undefined;
  return SUPPORTED_VIDEO_FORMATS.find((format) => format === ext) ?? null;
}

export function generateVideoFilename(
  videoId: string,
  originalFilename: string
): string {
  const ext = videoFormatOf(originalFilename) ?? "mp4";
  return `${videoId}.${ext}`;
}

export function generateVideoId(): string {
  return randomUUID();
}

/** Storage keys are scoped per owner: `<userId>/<stored filename>`. */
export function videoStorageKey(userId: string, filename: string): string {
  return `${userId}/${filename}`;
}

export function bytesToMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

export function megabytesToBytes(megabytes: number): number {
  return megabytes * BYTES_PER_MB;
}
