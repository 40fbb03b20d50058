import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { API_FLOW, API_PREFIX, type HttpResponse } from "../shared/http";

export const config: ApiRouteConfig = {
  name: "Health",
  type: "api",
  path: `${API_PREFIX}/health`,
  method: "GET",
  description: "Liveness probe",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async () => ({
  status: 200,
  body: { status: "healthy", timestamp: new Date().toISOString() },
});
