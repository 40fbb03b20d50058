import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeStats } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Analytics-Stats",
  type: "api",
  path: `${API_PREFIX}/analytics/stats`,
  method: "GET",
  description: "Video and detection aggregates for the dashboard",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load statistics", async () => {
    const { analytics, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    return { status: 200, body: serializeStats(await analytics.userStats(user.id)) };
  });
