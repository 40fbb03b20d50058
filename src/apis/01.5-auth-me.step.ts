import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";
import { serializeUser } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Auth-Me",
  type: "api",
  path: `${API_PREFIX}/auth/me`,
  method: "GET",
  description: "Profile of the authenticated user",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to load user", async () => {
    const { auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    return { status: 200, body: serializeUser(await auth.me(user)) };
  });
