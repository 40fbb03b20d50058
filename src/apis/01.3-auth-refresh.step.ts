import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeSession } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Auth-Refresh",
  type: "api",
  path: `${API_PREFIX}/auth/refresh`,
  method: "POST",
  description: "Trade a refresh token for a new session",
  flows: [API_FLOW],
  emits: [],
};

const refreshSchema = z.object({ refresh_token: z.string().min(1) });

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Token refresh failed", async () => {
    const { refresh_token } = parseBody(refreshSchema, req.body);
    const { auth } = await getServices(logger);
    return { status: 200, body: serializeSession(await auth.refresh(refresh_token)) };
  });
