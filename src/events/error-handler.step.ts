import type { EventConfig, EventHandler } from "motia";
import { getServices } from "../services";
import { PIPELINE_FLOW, type StepContext } from "../shared/http";
import type { ProcessingFailedData } from "../shared/interfaces";

export const config: EventConfig = {
  name: "ErrorHandler",
  type: "event",
  description: "Record pipeline failures and close crashed runs as failed",
  flows: [PIPELINE_FLOW],
  subscribes: ["video.processing.failed", "ingest.file.failed"],
  emits: [],
};

export interface ErrorLog {
  videoId: string | null;
  fileName: string | null;
  step: string;
  error: string;
  timestamp: string;
}

export const ERROR_GROUP = "pipeline-errors";
const MAX_ERRORS_KEPT = 50;

type FailureInput = Partial<ProcessingFailedData> & { fileName?: string };

export const handler = (async (
  input: FailureInput,
  { logger, state, traceId }: Pick<StepContext, "logger" | "state" | "traceId">
): Promise<void> => {
  const errorLog: ErrorLog = {
    videoId: input.videoId ?? null,
    fileName: input.fileName ?? null,
    step: input.step ?? "unknown",
    error: input.error ?? "An unexpected error occurred",
    timestamp: new Date().toISOString(),
  };

  logger.error("Pipeline failure", { traceId, ...errorLog });

  const existing = (await state.get<ErrorLog[]>(ERROR_GROUP, "recent")) ?? [];
  const recent = [errorLog, ...existing].slice(0, MAX_ERRORS_KEPT);
  await state.set(ERROR_GROUP, "recent", recent);

  if (errorLog.videoId) {
    await state.set(traceId, "status", {
      status: "failed",
      videoId: errorLog.videoId,
      error: errorLog.error,
      failedStep: errorLog.step,
      failedAt: errorLog.timestamp,
    });
  }

  logger.info("Error handled and logged", { traceId, totalErrors: recent.length });

  if (errorLog.videoId) {
    // A run that crashed before closing its lifecycle is still `processing`.
    const { videos } = await getServices(logger);
    await videos.markFailed(errorLog.videoId, errorLog.error);
  }
}) satisfies EventHandler<FailureInput, never>;
