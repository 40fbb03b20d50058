import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeCleanupResult } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Cleanup-Run",
  type: "api",
  path: `${API_PREFIX}/cleanup/run`,
  method: "POST",
  description: "Delete videos older than the retention window",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Cleanup failed", async () => {
    const { cleanup, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const result = await cleanup.run(user.id);
    return {
      status: 200,
      body: { message: "Cleanup completed", ...serializeCleanupResult(result) },
    };
  });
