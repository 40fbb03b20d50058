import type { EventConfig, EventHandler } from "motia";
import { getServices } from "../services";
import { errorMessage } from "../shared/errors";
import { PIPELINE_FLOW, type StepContext } from "../shared/http";
import type {
  ProcessingCompletedData,
  ProcessingFailedData,
  ProcessingRequestedData,
} from "../shared/interfaces";

export const config: EventConfig = {
  name: "Analyze-Video",
  type: "event",
  description: "Score a video for anomalies and store its detection events",
  flows: [PIPELINE_FLOW],
  subscribes: ["video.processing.requested"],
  emits: [
    { topic: "video.processing.completed", label: "Analysis Completed" },
    { topic: "video.processing.failed", label: "Analysis Failed", conditional: true },
  ],
};

type AnalysisEmit =
  | { topic: "video.processing.completed"; data: ProcessingCompletedData }
  | { topic: "video.processing.failed"; data: ProcessingFailedData };

export const handler = (async (
  input: ProcessingRequestedData,
  { logger, emit, state }: StepContext<AnalysisEmit>
): Promise<void> => {
  const { videoId, userId } = input;
  logger.info("Starting video analysis", { videoId, userId });

  try {
    const { analysis } = await getServices(logger);
    const outcome = await analysis.analyze(videoId, state);

    switch (outcome.status) {
      case "skipped":
        logger.warn("Video analysis skipped", { videoId, reason: outcome.reason });
        return;
      case "completed":
        await emit({
          topic: "video.processing.completed",
          data: {
            videoId,
            userId: outcome.userId,
            eventsCreated: outcome.eventsCreated,
            alerts: outcome.alerts,
          },
        });
        return;
      case "failed":
        await emit({
          topic: "video.processing.failed",
          data: { videoId, userId: outcome.userId, error: outcome.error, step: "analyze-video" },
        });
        return;
    }
  } catch (error) {
    const message = errorMessage(error);
    logger.error("Video analysis crashed", { videoId, error: message });

    // The error handler retries this if the database is still unreachable.
    try {
      const { videos } = await getServices(logger);
      await videos.markFailed(videoId, message);
    } catch (markError) {
      logger.error("Could not mark crashed video as failed", {
        videoId,
        error: errorMessage(markError),
      });
    }

    await emit({
      topic: "video.processing.failed",
      data: { videoId, userId, error: message, step: "analyze-video" },
    });
  }
}) satisfies EventHandler<ProcessingRequestedData, AnalysisEmit>;
