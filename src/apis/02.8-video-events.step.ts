import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeEvent } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Video-Events",
  type: "api",
  path: `${API_PREFIX}/videos/:id/events`,
  method: "GET",
  description: "Detection events of one video in timeline order",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load video events", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const events = await videos.events(user.id, req.pathParams.id);
    return { status: 200, body: { events: events.map(serializeEvent) } };
  });
