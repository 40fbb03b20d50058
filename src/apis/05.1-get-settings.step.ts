import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeSettings } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Get-Settings",
  type: "api",
  path: `${API_PREFIX}/settings`,
  method: "GET",
  description: "Detection and retention settings, defaults until first saved",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load settings", async () => {
    const { settings, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    return { status: 200, body: serializeSettings(await settings.get(user.id)) };
  });
