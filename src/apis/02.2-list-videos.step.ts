import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, queryInt, respond, type HttpResponse } from "../shared/http";
import { serializeVideo } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "List-Videos",
  type: "api",
  path: `${API_PREFIX}/videos`,
  method: "GET",
  description: "The caller's videos, newest first",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to list videos", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const limit = queryInt(req, "limit", 50);
    const list = await videos.list(user.id, limit);
    return { status: 200, body: { videos: list.map(serializeVideo) } };
  });
