import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";

export const config: ApiRouteConfig = {
  name: "Auth-Logout",
  type: "api",
  path: `${API_PREFIX}/auth/logout`,
  method: "POST",
  description: "Revoke the caller's session",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Logout failed", async () => {
    const { auth } = await getServices(logger);
    await auth.logout(bearerToken(req));
    return { status: 200, body: { message: "Logged out successfully" } };
  });
