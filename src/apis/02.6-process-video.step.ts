import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { errorMessage } from "../shared/errors";
import type { ProcessingRequestedData } from "../shared/interfaces";
import {
  API_FLOW,
  API_PREFIX,
  PIPELINE_FLOW,
  bearerToken,
  firstValue,
  respond,
  type HttpResponse,
  type RouteRequest,
  type StepContext,
} from "../shared/http";

export const config: ApiRouteConfig = {
  name: "Process-Video",
  type: "api",
  path: `${API_PREFIX}/videos/:id/process`,
  method: "POST",
  description: "Start (or restart) anomaly analysis for a video",
  flows: [API_FLOW, PIPELINE_FLOW],
  emits: [{ topic: "video.processing.requested", label: "Processing Requested" }],
};

type ProcessEmit = { topic: "video.processing.requested"; data: ProcessingRequestedData };

export const handler = (async (
  req: RouteRequest,
  { logger, emit }: Pick<StepContext<ProcessEmit>, "logger" | "emit">
): Promise<HttpResponse> =>
  respond(logger, "Failed to start processing", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const reprocess = firstValue(req.queryParams.reprocess) === "true";
    const videoId = req.pathParams.id;

    const result = await videos.requestProcessing(user.id, videoId, { reprocess });
    if (!result.started) {
      return {
        status: 200,
        body: { message: "Video already processed", video_id: videoId, status: "completed" },
      };
    }

    try {
      await emit({
        topic: "video.processing.requested",
        data: { videoId, userId: user.id },
      });
    } catch (error) {
      await videos.markFailed(videoId, `Failed to queue processing: ${errorMessage(error)}`);
      throw error;
    }
    return {
      status: 202,
      body: { message: "Processing started", video_id: videoId, status: "processing" },
    };
  })) satisfies ApiRouteHandler<unknown, HttpResponse, ProcessEmit>;
