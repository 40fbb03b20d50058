import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeSystemStatus } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "System-Status",
  type: "api",
  path: `${API_PREFIX}/system/status`,
  method: "GET",
  description: "Processing queue, pipeline statistics and the active threshold",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (
  req,
  { logger, state }
) =>
  respond(logger, "Failed to load system status", async () => {
    const { system, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    return { status: 200, body: serializeSystemStatus(await system.status(user.id, state)) };
  });
