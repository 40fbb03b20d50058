import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeEvent, serializeSummary, serializeVideo } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Video-Analysis",
  type: "api",
  path: `${API_PREFIX}/videos/:id/analysis`,
  method: "GET",
  description: "Detection summary and events of a processed video",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load analysis", async () => {
    const { videos, analysis, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const video = await videos.getOwned(user.id, req.pathParams.id);
    const { summary, events } = await analysis.videoAnalysis(video.id);

    return {
      status: 200,
      body: {
        video: serializeVideo(video),
        analysis_summary: serializeSummary(summary),
        events: events.map(serializeEvent),
      },
    };
  });
