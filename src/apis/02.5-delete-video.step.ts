import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, respond, type HttpResponse } from "../shared/http";

export const config: ApiRouteConfig = {
  name: "Delete-Video",
  type: "api",
  path: `${API_PREFIX}/videos/:id`,
  method: "DELETE",
  description: "Delete a video with its detection events and stored file",
  flows: [API_FLOW],
  emits: [],
};

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to delete video", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const { eventsDeleted } = await videos.delete(user.id, req.pathParams.id);
    return {
      status: 200,
      body: { message: "Video deleted successfully", events_deleted: eventsDeleted },
    };
  });
