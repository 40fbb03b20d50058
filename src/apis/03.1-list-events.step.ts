import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import {
  API_FLOW,
  API_PREFIX,
  bearerToken,
  firstValue,
  queryInt,
  respond,
  type HttpResponse,
} from "../shared/http";
import { serializeEvent } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "List-Events",
  type: "api",
  path: `${API_PREFIX}/events`,
  method: "GET",
  description: "The caller's detection events, newest first",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to list events", async () => {
    const services = await getServices(logger);
    const user = await services.auth.authenticate(bearerToken(req));
    const events = await services.events.list(user.id, {
      limit: queryInt(req, "limit", 100),
      eventType: firstValue(req.queryParams.event_type) || undefined,
    });
    return { status: 200, body: { events: events.map(serializeEvent) } };
  });
