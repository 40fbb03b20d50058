import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializePreview } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Cleanup-Preview",
  type: "api",
  path: `${API_PREFIX}/cleanup/preview`,
  method: "GET",
  description: "Videos a cleanup run would delete under the retention policy",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to preview cleanup", async () => {
    const { cleanup, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    return { status: 200, body: serializePreview(await cleanup.preview(user.id)) };
  });
