import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import {
  API_FLOW,
  API_PREFIX,
  bearerToken,
  firstValue,
  respond,
  type HttpResponse,
  type RouteRequest,
  type StepContext,
} from "../shared/http";

export const config: ApiRouteConfig = {
  name: "Stream-Video",
  type: "api",
  path: `${API_PREFIX}/videos/:id/stream`,
  method: "GET",
  description: "Video bytes, or a redirect to the public object URL",
  flows: [API_FLOW],
  emits: [],
};

export const handler = (async (
  req: RouteRequest,
  { logger }: Pick<StepContext, "logger">
): Promise<HttpResponse> =>
  respond(logger, "Failed to stream video", async (): Promise<HttpResponse> => {
    const { videos, auth } = await getServices(logger);
    // <video> elements cannot set headers, so the token may come as ?token=
    const token = bearerToken(req) ?? firstValue(req.queryParams.token) ?? null;
    const user = await auth.authenticate(token);

    const target = await videos.streamTarget(user.id, req.pathParams.id);
    if (target.kind === "redirect") {
      return { status: 302, headers: { Location: target.url }, body: null };
    }
    return {
      status: 200,
      headers: {
        "Content-Type": target.contentType,
        "Content-Length": String(target.data.length),
        "Accept-Ranges": "bytes",
      },
      body: target.data,
    };
  })) satisfies ApiRouteHandler<unknown, HttpResponse, never>;
