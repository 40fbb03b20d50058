import type { VideoStatus } from "../shared/interfaces";

/**
 * Allowed `upload_status` moves. Status only advances, except that a finished
 * video (completed or failed) may go back to processing for a reprocess.
 */
export const STATUS_TRANSITIONS: Readonly<Record<VideoStatus, readonly VideoStatus[]>> = {
  uploaded: ["processing"],
  processing: ["completed", "failed"],
  completed: ["processing"],
  failed: ["processing"],
};

const ALL_STATUSES: readonly VideoStatus[] = ["uploaded", "processing", "completed", "failed"];

export function canTransition(from: VideoStatus, to: VideoStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

/** Every status a video may be in when it moves to `to`. */
export function sourcesFor(to: VideoStatus): VideoStatus[] {
  return ALL_STATUSES.filter((from) => canTransition(from, to));
}
