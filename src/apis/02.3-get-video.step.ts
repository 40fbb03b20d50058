import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeVideo } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Get-Video",
  type: "api",
  path: `${API_PREFIX}/videos/:id`,
  method: "GET",
  description: "One video, polled by the dashboard while it processes",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load video", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const video = await videos.getOwned(user.id, req.pathParams.id);
    return { status: 200, body: serializeVideo(video) };
  });
